/**
 * Move Selector
 *
 * The AI policy: resolve every successor, score it for the mover, play the
 * best one. Ties go to the earliest move in generation order so the choice
 * is reproducible.
 */

import { type Player, type State, canonicalize, stateKey } from '../game/chopsticks'
import { type Move, type Transition, describeMove, legalMoves } from '../game/moves'
import { ChopsticksError } from '../game/errors'
import { type ErrorResponse, toErrorResponse } from '../lib/errorUtils'
import { type SolverConfig, DEFAULT_SOLVER_CONFIG } from '../lib/config'
import {
  type ResolvedValue,
  GraphSolver,
  describeValue,
  valueBeforeMove,
  valuesEqual,
} from './solver'
import { type ScoringWeights, DEFAULT_SCORING_WEIGHTS, scoreValue } from './scoring'
import { PredeterminedTable } from './predetermined'

export type ValueSource = 'predetermined' | 'solver'

export interface Evaluation {
  /** Value for the player to move */
  value: ResolvedValue
  source: ValueSource
}

export interface RankedMove {
  move: Move
  /** Position after the move */
  state: State
  /** Value of the move for the player making it */
  value: ResolvedValue
  score: number
  source: ValueSource
}

export interface PositionAnalysis {
  state: State
  mover: Player
  value: ResolvedValue
  score: number
  /** Moves by score, best first; equal scores keep generation order */
  rankedMoves: RankedMove[]
  /** Every move sharing the best score, in generation order */
  optimalMoves: Move[]
}

export interface MoveSelectorOptions {
  solver?: GraphSolver
  /** Shortcut table; null disables it */
  table?: PredeterminedTable | null
  weights?: ScoringWeights
  /** Check every table hit against the solver and prefer the solver */
  verifyPredetermined?: boolean
}

export class MoveSelector {
  readonly solver: GraphSolver
  readonly weights: ScoringWeights
  private readonly table: PredeterminedTable | null
  private readonly verifyPredetermined: boolean

  constructor(options: MoveSelectorOptions = {}) {
    this.solver = options.solver ?? new GraphSolver()
    this.table = options.table ?? null
    this.weights = options.weights ?? DEFAULT_SCORING_WEIGHTS
    this.verifyPredetermined = options.verifyPredetermined ?? false
  }

  /**
   * Value of a position for its mover, from the table when possible.
   *
   * @throws InvalidStateError on a malformed state
   */
  evaluate(state: State): Evaluation {
    const predetermined = this.table?.lookup(state) ?? null
    if (predetermined === null) {
      return { value: this.solver.resolve(state), source: 'solver' }
    }

    if (this.verifyPredetermined) {
      const solved = this.solver.resolve(state)
      if (!valuesEqual(solved, predetermined)) {
        console.warn(
          `[MoveSelector] Predetermined value for ${stateKey(state)} (${describeValue(predetermined)}) ` +
            `disagrees with solver (${describeValue(solved)}); using solver`
        )
        return { value: solved, source: 'solver' }
      }
    }

    return { value: predetermined, source: 'predetermined' }
  }

  /**
   * Scores every legal move for the mover, in generation order.
   *
   * @throws NoLegalMovesError on a terminal state
   */
  rankMoves(state: State): RankedMove[] {
    return legalMoves(state).map((transition) => this.rankTransition(transition))
  }

  /**
   * Picks the highest-scoring move; the first in generation order wins ties.
   *
   * @throws NoLegalMovesError on a terminal state
   */
  chooseMove(state: State): Move {
    return this.bestMove(state).move
  }

  /**
   * The ranked entry behind chooseMove.
   *
   * @throws NoLegalMovesError on a terminal state
   */
  bestMove(state: State): RankedMove {
    let best: RankedMove | null = null
    for (const ranked of this.rankMoves(state)) {
      if (best === null || ranked.score > best.score) {
        best = ranked
      }
    }
    if (best === null) {
      throw new Error(`No ranked moves for ${stateKey(state)}`)
    }
    return best
  }

  /**
   * Full breakdown of a position for analysis displays.
   *
   * @throws NoLegalMovesError on a terminal state
   */
  analyze(state: State): PositionAnalysis {
    const canonical = canonicalize(state)
    const rankedMoves = this.rankMoves(canonical)
      .map((ranked, index) => ({ ranked, index }))
      .sort((a, b) => b.ranked.score - a.ranked.score || a.index - b.index)
      .map(({ ranked }) => ranked)

    const bestScore = rankedMoves[0].score
    const { value } = this.evaluate(canonical)

    return {
      state: canonical,
      mover: canonical.turn,
      value,
      score: scoreValue(value, this.weights),
      rankedMoves,
      optimalMoves: rankedMoves.filter((m) => m.score === bestScore).map((m) => m.move),
    }
  }

  private rankTransition({ move, state }: Transition): RankedMove {
    const { value: successorValue, source } = this.evaluate(state)
    const value = valueBeforeMove(successorValue)
    return { move, state, value, score: scoreValue(value, this.weights), source }
  }
}

/**
 * Builds a selector from a validated configuration.
 */
export function createMoveSelector(config: SolverConfig = DEFAULT_SOLVER_CONFIG): MoveSelector {
  const solver = new GraphSolver({ debug: config.debug })
  return new MoveSelector({
    solver,
    table: config.usePredetermined ? PredeterminedTable.build(solver) : null,
    weights: config.scoring,
    verifyPredetermined: config.verifyPredetermined,
  })
}

// ============================================================================
// DEFAULT SELECTOR
// ============================================================================

let defaultSelector: MoveSelector | null = null

/**
 * The process-wide selector, created on first use.
 */
export function getDefaultSelector(): MoveSelector {
  if (defaultSelector === null) {
    defaultSelector = createMoveSelector()
  }
  return defaultSelector
}

/**
 * Drops the process-wide selector and its memo table.
 */
export function resetDefaultSelector(): void {
  defaultSelector = null
}

/**
 * Picks the best move for the player to move.
 *
 * @throws NoLegalMovesError on a terminal state
 */
export function chooseMove(state: State, selector: MoveSelector = getDefaultSelector()): Move {
  return selector.chooseMove(state)
}

export type MoveSuggestion =
  | { success: true; move: Move; description: string; value: ResolvedValue }
  | ErrorResponse

/**
 * UI-facing variant of chooseMove that reports library errors as a result
 * object. Anything that is not a ChopsticksError is rethrown.
 */
export function suggestMove(
  state: State,
  selector: MoveSelector = getDefaultSelector()
): MoveSuggestion {
  try {
    const { move, value } = selector.bestMove(state)
    return { success: true, move, description: describeMove(move), value }
  } catch (err) {
    if (err instanceof ChopsticksError) {
      return toErrorResponse(err)
    }
    throw err
  }
}
