/**
 * Chopsticks Game State
 *
 * A pure TypeScript model of a two-hand Chopsticks position. This module
 * holds no move or search logic; it only defines the canonical state and the
 * questions that can be asked of one.
 */

import { InvalidStateError } from './errors'

// Hand values wrap modulo 5; a hand at 0 is dead
export const FINGERS_MODULUS = 5
export const MAX_FINGERS = FINGERS_MODULUS - 1

// Player identifiers
export type Player = 0 | 1

// A player's two hands. Canonical states keep each pair sorted ascending
export type Hands = readonly [number, number]

export interface State {
  readonly turn: Player
  readonly hands: readonly [Hands, Hands]
}

/** Sorted pairs from [0,4] per player */
const PAIRS_PER_PLAYER = ((MAX_FINGERS + 1) * (MAX_FINGERS + 2)) / 2

/**
 * Number of valid canonical states: two turns times every pair combination,
 * minus the two where both players are dead. No resolved distance can reach it.
 */
export const CANONICAL_STATE_COUNT = 2 * PAIRS_PER_PLAYER * PAIRS_PER_PLAYER - 2

const STATE_PATTERN = /^(?:([01]):)?([0-9])([0-9])\|([0-9])([0-9])$/

export function otherPlayer(player: Player): Player {
  return player === 0 ? 1 : 0
}

export function isValidHandValue(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_FINGERS
}

export function isDead(hands: Hands): boolean {
  return hands[0] === 0 && hands[1] === 0
}

/**
 * Returns the live hand values of a pair, in pair order.
 */
export function liveHands(hands: Hands): number[] {
  return hands.filter((value) => value !== 0)
}

export function sortHands(hands: Hands): Hands {
  return hands[0] <= hands[1] ? [hands[0], hands[1]] : [hands[1], hands[0]]
}

function assertValidHands(hands: Hands, player: Player): void {
  for (const value of hands) {
    if (!isValidHandValue(value)) {
      throw new InvalidStateError(
        `Hand value ${value} for player ${player} is outside [0, ${MAX_FINGERS}]`,
        { player, hands: [...hands] }
      )
    }
  }
}

function assertValidPosition(turn: Player, player0: Hands, player1: Hands): void {
  if (turn !== 0 && turn !== 1) {
    throw new InvalidStateError(`Turn must be 0 or 1, got ${String(turn)}`)
  }
  assertValidHands(player0, 0)
  assertValidHands(player1, 1)
  if (isDead(player0) && isDead(player1)) {
    throw new InvalidStateError('Both players cannot have every hand dead', {
      hands: [[...player0], [...player1]],
    })
  }
}

/**
 * Checks a state built outside createState, in any hand order.
 *
 * @throws InvalidStateError if a value is out of range or both players are dead
 */
export function assertValidState(state: State): void {
  assertValidPosition(state.turn, state.hands[0], state.hands[1])
}

/**
 * Creates a canonical state from any pair of hands, validating it.
 *
 * @param turn - Player to move
 * @param player0 - Player 0's hands, in any order
 * @param player1 - Player 1's hands, in any order
 * @throws InvalidStateError if a value is out of range or both players are dead
 */
export function createState(turn: Player, player0: Hands, player1: Hands): State {
  assertValidPosition(turn, player0, player1)

  return {
    turn,
    hands: [sortHands(player0), sortHands(player1)],
  }
}

/**
 * The standard opening: one finger on every hand, player 0 to move.
 */
export function initialState(): State {
  return createState(0, [1, 1], [1, 1])
}

/**
 * Sorts each player's pair so interchangeable hands compare equal.
 * Returns a new state; the input is never modified.
 */
export function canonicalize(state: State): State {
  return createState(state.turn, state.hands[0], state.hands[1])
}

/**
 * Total order over canonical states: turn, then player 0's pair, then
 * player 1's pair.
 */
export function compareStates(a: State, b: State): number {
  if (a.turn !== b.turn) return a.turn - b.turn
  for (const player of [0, 1] as const) {
    for (const hand of [0, 1] as const) {
      const diff = a.hands[player][hand] - b.hands[player][hand]
      if (diff !== 0) return diff
    }
  }
  return 0
}

export function statesEqual(a: State, b: State): boolean {
  return compareStates(canonicalize(a), canonicalize(b)) === 0
}

/**
 * Formats both players' hands in `ab|cd` notation.
 *
 * @example
 * formatHands(initialState()) // '11|11'
 */
export function formatHands(state: State): string {
  const [p0, p1] = canonicalize(state).hands
  return `${p0[0]}${p0[1]}|${p1[0]}${p1[1]}`
}

/**
 * Memo key for a state: `<turn>:<ab>|<cd>`.
 */
export function stateKey(state: State): string {
  const canonical = canonicalize(state)
  return `${canonical.turn}:${formatHands(canonical)}`
}

/**
 * Parses `T:ab|cd` or `ab|cd` notation back into a canonical state.
 *
 * @param text - State string
 * @param turn - Player to move when the text carries no turn prefix
 * @throws InvalidStateError on malformed text or hand values
 */
export function parseState(text: string, turn: Player = 0): State {
  const match = STATE_PATTERN.exec(text.trim())
  if (!match) {
    throw new InvalidStateError(`Cannot parse state "${text}"`, { text })
  }

  const [, turnDigit, a, b, c, d] = match
  const parsedTurn: Player = turnDigit === undefined ? turn : turnDigit === '1' ? 1 : 0
  return createState(parsedTurn, [Number(a), Number(b)], [Number(c), Number(d)])
}

/**
 * True when either player has lost both hands.
 *
 * @throws InvalidStateError on a malformed state
 */
export function isTerminal(state: State): boolean {
  assertValidState(state)
  return isDead(state.hands[0]) || isDead(state.hands[1])
}

/**
 * The player who still has a live hand in a finished game. Whose turn it
 * is plays no part.
 *
 * @throws InvalidStateError if the game is not over
 */
export function winner(state: State): Player {
  if (!isTerminal(state)) {
    throw new InvalidStateError('winner is only defined for terminal states', {
      state: stateKey(state),
    })
  }
  return isDead(state.hands[0]) ? 1 : 0
}

/**
 * Every valid canonical state, in compareStates order.
 */
export function enumerateStates(): State[] {
  const pairs: Hands[] = []
  for (let low = 0; low <= MAX_FINGERS; low++) {
    for (let high = low; high <= MAX_FINGERS; high++) {
      pairs.push([low, high])
    }
  }

  const states: State[] = []
  for (const turn of [0, 1] as const) {
    for (const p0 of pairs) {
      for (const p1 of pairs) {
        if (isDead(p0) && isDead(p1)) continue
        states.push({ turn, hands: [p0, p1] })
      }
    }
  }
  return states
}
