/**
 * Predetermined Classification
 *
 * Shortcuts that classify positions without live search: a couple of rules
 * that follow directly from the game's theory, and a table of precomputed
 * values for every canonical position. The solver stays the ground truth;
 * everything here must agree with it.
 */

import { z } from 'zod'
import {
  type State,
  FINGERS_MODULUS,
  isTerminal,
  liveHands,
  otherPlayer,
  parseState,
  stateKey,
} from '../game/chopsticks'
import { InvalidStateError } from '../game/errors'
import { type ResolvedValue, GraphSolver, terminalValue, valuesEqual, win } from './solver'

// ============================================================================
// RULE-BASED CLASSIFICATION
// ============================================================================

/**
 * Classifies positions whose value is known without search:
 * - finished games
 * - the opponent has one live hand and the mover can tap it to exactly 5,
 *   which ends the game on the spot (win in 1, the fastest possible)
 *
 * @returns The value for the mover, or null when no rule applies
 * @throws InvalidStateError on a malformed state
 */
export function classifyByRule(state: State): ResolvedValue | null {
  if (isTerminal(state)) {
    return terminalValue(state)
  }

  const targets = liveHands(state.hands[otherPlayer(state.turn)])
  if (targets.length !== 1) return null

  const [target] = targets
  const killingBlow = liveHands(state.hands[state.turn]).some(
    (attacker) => (attacker + target) % FINGERS_MODULUS === 0
  )
  return killingBlow ? win(1) : null
}

// ============================================================================
// PRECOMPUTED TABLE
// ============================================================================

const resolvedValueSchema = z.discriminatedUnion('outcome', [
  z.object({ outcome: z.literal('win'), distance: z.number().int().nonnegative() }),
  z.object({ outcome: z.literal('loss'), distance: z.number().int().nonnegative() }),
  z.object({ outcome: z.literal('draw') }),
])

export const predeterminedTableSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.string().regex(/^[01]:[0-4]{2}\|[0-4]{2}$/), resolvedValueSchema),
})

export type PredeterminedTableJSON = z.infer<typeof predeterminedTableSchema>

/**
 * Precomputed values keyed by canonical state key.
 *
 * @example
 * const table = PredeterminedTable.build(new GraphSolver())
 * const saved = JSON.stringify(table.toJSON())
 * const restored = PredeterminedTable.fromJSON(JSON.parse(saved))
 */
export class PredeterminedTable {
  private constructor(private readonly values: Map<string, ResolvedValue>) {}

  /**
   * Solves every position and captures the results.
   */
  static build(solver: GraphSolver = new GraphSolver()): PredeterminedTable {
    solver.solveAll()
    return new PredeterminedTable(new Map(solver.entries()))
  }

  /**
   * Loads a table from parsed JSON.
   *
   * @throws InvalidStateError if the data is malformed or a key is not canonical
   */
  static fromJSON(data: unknown): PredeterminedTable {
    const result = predeterminedTableSchema.safeParse(data)
    if (!result.success) {
      throw new InvalidStateError('Malformed predetermined table', {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      })
    }

    const values = new Map<string, ResolvedValue>()
    for (const [key, value] of Object.entries(result.data.entries)) {
      if (stateKey(parseState(key)) !== key) {
        throw new InvalidStateError(`Table key "${key}" is not canonical`, { key })
      }
      values.set(key, value)
    }
    return new PredeterminedTable(values)
  }

  get size(): number {
    return this.values.size
  }

  /**
   * Looks up a position: rules first, then the table.
   */
  lookup(state: State): ResolvedValue | null {
    return classifyByRule(state) ?? this.values.get(stateKey(state)) ?? null
  }

  /**
   * Lists the keys whose table value differs from the solver's.
   */
  verifyAgainst(solver: GraphSolver): string[] {
    const mismatches: string[] = []
    for (const [key, value] of this.values) {
      if (!valuesEqual(value, solver.resolve(parseState(key)))) {
        mismatches.push(key)
      }
    }
    return mismatches
  }

  toJSON(): PredeterminedTableJSON {
    return {
      version: 1,
      entries: Object.fromEntries(this.values),
    }
  }
}
