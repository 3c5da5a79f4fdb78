/**
 * Game record bookkeeping for human-vs-AI and AI-vs-AI drivers.
 *
 * Tracks the move and position history of a single game so callers can
 * render it, replay it, and notice repeated positions.
 */

import {
  type Player,
  type State,
  initialState,
  isTerminal,
  stateKey,
  winner as terminalWinner,
} from './chopsticks'
import { type Move, applyMove } from './moves'
import { NoLegalMovesError } from './errors'

export interface GameRecord {
  position: State
  winner: Player | null
  moveHistory: Move[]
  /** Keys of every position reached, starting with the opening position */
  positionHistory: string[]
}

/**
 * Creates a new game record. Starting from a finished position is allowed;
 * the winner is filled in immediately.
 */
export function createGame(start: State = initialState()): GameRecord {
  return {
    position: start,
    winner: isTerminal(start) ? terminalWinner(start) : null,
    moveHistory: [],
    positionHistory: [stateKey(start)],
  }
}

/**
 * Makes a move and returns the updated record. The input is not modified.
 *
 * @throws NoLegalMovesError if the game is over
 * @throws IllegalMoveError if the move is not legal
 */
export function makeMove(game: GameRecord, move: Move): GameRecord {
  if (game.winner !== null) {
    throw new NoLegalMovesError(`Game is over; player ${game.winner} has won`)
  }

  const position = applyMove(game.position, move)

  return {
    position,
    winner: isTerminal(position) ? terminalWinner(position) : null,
    moveHistory: [...game.moveHistory, move],
    positionHistory: [...game.positionHistory, stateKey(position)],
  }
}

/**
 * Replays a list of moves from a start position.
 */
export function replayMoves(moves: Move[], start: State = initialState()): GameRecord {
  let game = createGame(start)
  for (const move of moves) {
    game = makeMove(game, move)
  }
  return game
}

/**
 * True when the current position already appeared earlier in the game.
 */
export function isRepetition(game: GameRecord): boolean {
  const current = game.positionHistory[game.positionHistory.length - 1]
  return game.positionHistory.indexOf(current) < game.positionHistory.length - 1
}
