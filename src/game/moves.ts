/**
 * Move Generator
 *
 * Enumerates the legal transitions from a position. Moves are identified by
 * hand values rather than hand positions, since a player's two hands are
 * interchangeable.
 */

import {
  type Hands,
  type Player,
  type State,
  FINGERS_MODULUS,
  MAX_FINGERS,
  canonicalize,
  isTerminal,
  liveHands,
  otherPlayer,
  sortHands,
  stateKey,
} from './chopsticks'
import { IllegalMoveError, NoLegalMovesError } from './errors'

/**
 * One of the mover's live hands taps one of the opponent's live hands.
 */
export interface TapMove {
  readonly kind: 'tap'
  /** Value of the attacking hand */
  readonly attacker: number
  /** Value of the hand being tapped */
  readonly target: number
}

/**
 * The mover redistributes their fingers into a new pair with the same sum.
 */
export interface SplitMove {
  readonly kind: 'split'
  /** The mover's pair after the split, sorted ascending */
  readonly hands: Hands
}

export type Move = TapMove | SplitMove

export interface Transition {
  readonly move: Move
  /** Canonical position after the move, opponent to move */
  readonly state: State
}

function withHands(state: State, player: Player, hands: Hands): State {
  const next: [Hands, Hands] = [state.hands[0], state.hands[1]]
  next[player] = sortHands(hands)
  return { turn: otherPlayer(state.turn), hands: next }
}

function distinct(values: number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b)
}

function tapTransitions(state: State): Transition[] {
  const mover = state.turn
  const opponent = otherPlayer(mover)
  const opponentHands = state.hands[opponent]
  const transitions: Transition[] = []

  for (const attacker of distinct(liveHands(state.hands[mover]))) {
    for (const target of distinct(liveHands(opponentHands))) {
      const tapped = (target + attacker) % FINGERS_MODULUS
      const other = opponentHands[0] === target ? opponentHands[1] : opponentHands[0]
      transitions.push({
        move: { kind: 'tap', attacker, target },
        state: withHands(state, opponent, [tapped, other]),
      })
    }
  }

  return transitions
}

function splitTransitions(state: State): Transition[] {
  const mover = state.turn
  const [low, high] = state.hands[mover]
  const total = low + high
  const transitions: Transition[] = []

  for (let newLow = 0; newLow * 2 <= total; newLow++) {
    const newHigh = total - newLow
    if (newHigh > MAX_FINGERS) continue
    if (newLow === low && newHigh === high) continue
    transitions.push({
      move: { kind: 'split', hands: [newLow, newHigh] },
      state: withHands(state, mover, [newLow, newHigh]),
    })
  }

  return transitions
}

/**
 * Returns every legal move and its resulting state.
 *
 * Ordering is stable: taps first, by attacker then target value, followed
 * by splits by the low value of the new pair.
 *
 * @throws NoLegalMovesError if the game is already over
 */
export function legalMoves(state: State): Transition[] {
  const current = canonicalize(state)
  if (isTerminal(current)) {
    throw new NoLegalMovesError('No legal moves from a terminal state', {
      state: stateKey(current),
    })
  }

  return [...tapTransitions(current), ...splitTransitions(current)]
}

export function movesEqual(a: Move, b: Move): boolean {
  if (a.kind === 'tap' && b.kind === 'tap') {
    return a.attacker === b.attacker && a.target === b.target
  }
  if (a.kind === 'split' && b.kind === 'split') {
    const [a0, a1] = sortHands(a.hands)
    const [b0, b1] = sortHands(b.hands)
    return a0 === b0 && a1 === b1
  }
  return false
}

/**
 * Applies a caller-supplied move. Split pairs may be given in either order.
 *
 * @throws NoLegalMovesError if the game is already over
 * @throws IllegalMoveError if the move is not legal in this position
 */
export function applyMove(state: State, move: Move): State {
  const transition = legalMoves(state).find((t) => movesEqual(t.move, move))
  if (!transition) {
    throw new IllegalMoveError(`Illegal move: ${describeMove(move)}`, {
      state: stateKey(state),
      move,
    })
  }
  return transition.state
}

/**
 * Human-readable move description.
 *
 * @example
 * describeMove({ kind: 'tap', attacker: 1, target: 4 }) // 'tap 1 -> 4'
 * describeMove({ kind: 'split', hands: [1, 2] })        // 'split to 1/2'
 */
export function describeMove(move: Move): string {
  if (move.kind === 'tap') {
    return `tap ${move.attacker} -> ${move.target}`
  }
  return `split to ${move.hands[0]}/${move.hands[1]}`
}
