import { describe, it, expect } from 'vitest'
import {
  CANONICAL_STATE_COUNT,
  assertValidState,
  canonicalize,
  compareStates,
  createState,
  enumerateStates,
  formatHands,
  initialState,
  isTerminal,
  liveHands,
  parseState,
  stateKey,
  statesEqual,
  winner,
  type State,
} from './chopsticks'
import { InvalidStateError } from './errors'

const bothDead: State = { turn: 0, hands: [[0, 0], [0, 0]] }
const outOfRange: State = { turn: 0, hands: [[0, 9], [0, 1]] }

describe('Chopsticks State', () => {
  describe('createState', () => {
    it('sorts each player pair ascending', () => {
      const state = createState(0, [3, 1], [2, 0])
      expect(state.hands).toEqual([
        [1, 3],
        [0, 2],
      ])
      expect(state.turn).toBe(0)
    })

    it('rejects hand values outside [0, 4]', () => {
      expect(() => createState(0, [5, 1], [1, 1])).toThrow(InvalidStateError)
      expect(() => createState(0, [1, 1], [-1, 1])).toThrow(InvalidStateError)
      expect(() => createState(1, [1.5, 1], [1, 1])).toThrow(InvalidStateError)
    })

    it('rejects a position where both players are dead', () => {
      expect(() => createState(0, [0, 0], [0, 0])).toThrow('Both players cannot have every hand dead')
    })

    it('records the offending player in the error context', () => {
      try {
        createState(0, [1, 1], [1, 7])
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidStateError)
        if (err instanceof InvalidStateError) {
          expect(err.code).toBe('INVALID_STATE')
          expect(err.context).toEqual({ player: 1, hands: [1, 7] })
        }
      }
    })
  })

  describe('initialState', () => {
    it('starts with one finger per hand and player 0 to move', () => {
      expect(stateKey(initialState())).toBe('0:11|11')
    })
  })

  describe('canonicalize', () => {
    it('sorts an unsorted state without modifying it', () => {
      const raw: State = { turn: 1, hands: [[4, 2], [3, 0]] }
      const canonical = canonicalize(raw)
      expect(canonical.hands).toEqual([
        [2, 4],
        [0, 3],
      ])
      expect(raw.hands[0]).toEqual([4, 2])
    })

    it('is idempotent for every state', () => {
      for (const state of enumerateStates()) {
        const once = canonicalize(state)
        expect(canonicalize(once)).toEqual(once)
      }
    })

    it('validates hand values', () => {
      const raw: State = { turn: 0, hands: [[1, 9], [1, 1]] }
      expect(() => canonicalize(raw)).toThrow(InvalidStateError)
    })
  })

  describe('stateKey and parseState', () => {
    it('keys symmetric states identically', () => {
      expect(stateKey(createState(1, [2, 1], [3, 0]))).toBe('1:12|03')
      expect(stateKey(createState(1, [1, 2], [0, 3]))).toBe('1:12|03')
    })

    it('parses a key with a turn prefix', () => {
      const state = parseState('1:21|03')
      expect(stateKey(state)).toBe('1:12|03')
    })

    it('parses bare hand notation with an explicit turn', () => {
      expect(parseState('11|11', 1).turn).toBe(1)
      expect(parseState('11|11').turn).toBe(0)
    })

    it('rejects malformed text', () => {
      expect(() => parseState('bad')).toThrow(InvalidStateError)
      expect(() => parseState('2:11|11')).toThrow(InvalidStateError)
      expect(() => parseState('15|11')).toThrow(InvalidStateError)
    })

    it('formats hands in ab|cd notation', () => {
      expect(formatHands(createState(0, [4, 0], [2, 3]))).toBe('04|23')
    })
  })

  describe('isTerminal', () => {
    it('is false for the opening position', () => {
      expect(isTerminal(initialState())).toBe(false)
    })

    it('is true when either player has both hands dead', () => {
      expect(isTerminal(createState(0, [0, 0], [1, 2]))).toBe(true)
      expect(isTerminal(createState(0, [0, 3], [0, 0]))).toBe(true)
    })

    it('is false with a single dead hand', () => {
      expect(isTerminal(createState(0, [0, 1], [0, 4]))).toBe(false)
    })

    it('rejects states built by hand that createState would refuse', () => {
      expect(() => isTerminal(bothDead)).toThrow(InvalidStateError)
      expect(() => isTerminal({ turn: 1, hands: [[0, 0], [7, 7]] })).toThrow('Hand value 7 for player 1')
    })
  })

  describe('assertValidState', () => {
    it('accepts unsorted valid hands', () => {
      expect(() => assertValidState({ turn: 1, hands: [[3, 0], [4, 2]] })).not.toThrow()
    })

    it('rejects out-of-range values and double knockouts', () => {
      expect(() => assertValidState(outOfRange)).toThrow('Hand value 9 for player 0 is outside [0, 4]')
      expect(() => assertValidState(bothDead)).toThrow('Both players cannot have every hand dead')
    })
  })

  describe('winner', () => {
    it('returns the opponent of the dead player whoever is to move', () => {
      expect(winner(createState(0, [0, 0], [1, 2]))).toBe(1)
      expect(winner(createState(1, [0, 0], [1, 2]))).toBe(1)
      expect(winner(createState(0, [0, 3], [0, 0]))).toBe(0)
      expect(winner(createState(1, [0, 3], [0, 0]))).toBe(0)
    })

    it('throws on a live position', () => {
      expect(() => winner(initialState())).toThrow(InvalidStateError)
    })

    it('throws on malformed states', () => {
      expect(() => winner(bothDead)).toThrow(InvalidStateError)
      expect(() => winner(outOfRange)).toThrow(InvalidStateError)
    })
  })

  describe('enumerateStates', () => {
    it('lists every valid canonical state once', () => {
      const states = enumerateStates()
      expect(states).toHaveLength(CANONICAL_STATE_COUNT)
      expect(CANONICAL_STATE_COUNT).toBe(448)
      expect(new Set(states.map(stateKey)).size).toBe(states.length)
    })

    it('is ordered by compareStates', () => {
      const states = enumerateStates()
      for (let i = 1; i < states.length; i++) {
        expect(compareStates(states[i - 1], states[i])).toBeLessThan(0)
      }
    })

    it('starts and ends with the expected states', () => {
      const states = enumerateStates()
      expect(stateKey(states[0])).toBe('0:00|01')
      expect(stateKey(states[states.length - 1])).toBe('1:44|44')
    })
  })

  describe('helpers', () => {
    it('compares states by turn first', () => {
      expect(compareStates(createState(0, [4, 4], [4, 4]), createState(1, [0, 1], [1, 1]))).toBeLessThan(0)
    })

    it('treats symmetric states as equal', () => {
      expect(statesEqual(createState(0, [3, 1], [1, 2]), createState(0, [1, 3], [2, 1]))).toBe(true)
    })

    it('lists live hands', () => {
      expect(liveHands([0, 3])).toEqual([3])
      expect(liveHands([2, 2])).toEqual([2, 2])
    })
  })
})
