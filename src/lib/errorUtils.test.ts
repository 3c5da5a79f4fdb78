import { describe, it, expect } from 'vitest'
import {
  ChopsticksError,
  IllegalMoveError,
  InvalidStateError,
  NoLegalMovesError,
} from '../game/errors'
import { isChopsticksError, toErrorResponse } from './errorUtils'

describe('errorUtils', () => {
  describe('isChopsticksError', () => {
    it('matches library errors and optional codes', () => {
      const err = new NoLegalMovesError('done')
      expect(isChopsticksError(err)).toBe(true)
      expect(isChopsticksError(err, 'NO_LEGAL_MOVES')).toBe(true)
      expect(isChopsticksError(err, 'ILLEGAL_MOVE')).toBe(false)
      expect(isChopsticksError(new Error('other'))).toBe(false)
    })
  })

  describe('toErrorResponse', () => {
    it('wraps the message and code in a failed result', () => {
      expect(toErrorResponse(new IllegalMoveError('Illegal move: split to 0/3'))).toEqual({
        success: false,
        error: 'Illegal move: split to 0/3',
        code: 'ILLEGAL_MOVE',
      })
    })
  })

  describe('ChopsticksError', () => {
    it('keeps the subclass identity', () => {
      const err = new InvalidStateError('bad hands', { player: 0 })
      expect(err).toBeInstanceOf(InvalidStateError)
      expect(err).toBeInstanceOf(ChopsticksError)
      expect(err).toBeInstanceOf(Error)
      expect(err.name).toBe('InvalidStateError')
    })

    it('serializes to JSON', () => {
      expect(new InvalidStateError('bad hands', { player: 0 }).toJSON()).toEqual({
        error: true,
        type: 'InvalidStateError',
        code: 'INVALID_STATE',
        message: 'bad hands',
        context: { player: 0 },
      })
    })
  })
})
