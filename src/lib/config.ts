/**
 * Solver configuration
 *
 * zod schemas for everything tunable about the solver and its move policy.
 */

import { z } from 'zod'
import { CANONICAL_STATE_COUNT } from '../game/chopsticks'
import { InvalidConfigError } from '../game/errors'
import { DEFAULT_SCORING_WEIGHTS, scoreBands } from '../ai/scoring'

export const scoringWeightsSchema = z
  .object({
    winBase: z.number().finite(),
    lossBase: z.number().finite(),
    survivalWeight: z.number().finite().positive('Survival weight must be positive'),
  })
  .refine((w) => scoreBands(w, CANONICAL_STATE_COUNT).lowestWin > 0, {
    message: `winBase must exceed ${CANONICAL_STATE_COUNT} so every win scores above a draw`,
    path: ['winBase'],
  })
  .refine((w) => scoreBands(w, CANONICAL_STATE_COUNT).highestLoss < 0, {
    message: 'lossBase + survivalWeight * max distance must stay below the draw score',
    path: ['lossBase'],
  })

export const solverConfigSchema = z.object({
  scoring: scoringWeightsSchema.default(DEFAULT_SCORING_WEIGHTS),
  /** Consult the predetermined table before searching */
  usePredetermined: z.boolean().default(true),
  /** Cross-check every table hit against the solver */
  verifyPredetermined: z.boolean().default(false),
  /** Upper bound on plies in a bot battle */
  maxPlies: z.number().int().positive().default(500),
  debug: z.boolean().default(false),
})

export type SolverConfig = z.infer<typeof solverConfigSchema>
export type SolverConfigInput = z.input<typeof solverConfigSchema>

/**
 * Validates a configuration object, filling in defaults.
 *
 * @throws InvalidConfigError listing every zod issue
 */
export function parseSolverConfig(input: unknown = {}): SolverConfig {
  const result = solverConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new InvalidConfigError(`Invalid solver configuration: ${issues.join('; ')}`, { issues })
  }
  return result.data
}

export const DEFAULT_SOLVER_CONFIG: SolverConfig = parseSolverConfig({})

const envFlagSchema = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1')

const envSchema = z.object({
  CHOPSTICKS_SURVIVAL_WEIGHT: z.coerce.number().optional(),
  CHOPSTICKS_MAX_PLIES: z.coerce.number().optional(),
  CHOPSTICKS_USE_PREDETERMINED: envFlagSchema.optional(),
  CHOPSTICKS_VERIFY_PREDETERMINED: envFlagSchema.optional(),
  CHOPSTICKS_DEBUG: envFlagSchema.optional(),
})

/**
 * Builds a configuration from environment variables. Unset variables keep
 * their defaults.
 *
 * @throws InvalidConfigError on unparseable or out-of-range values
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): SolverConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new InvalidConfigError(`Invalid environment: ${issues.join('; ')}`, { issues })
  }

  const vars = result.data
  const input: SolverConfigInput = {}
  if (vars.CHOPSTICKS_SURVIVAL_WEIGHT !== undefined) {
    input.scoring = { ...DEFAULT_SCORING_WEIGHTS, survivalWeight: vars.CHOPSTICKS_SURVIVAL_WEIGHT }
  }
  if (vars.CHOPSTICKS_MAX_PLIES !== undefined) input.maxPlies = vars.CHOPSTICKS_MAX_PLIES
  if (vars.CHOPSTICKS_USE_PREDETERMINED !== undefined) {
    input.usePredetermined = vars.CHOPSTICKS_USE_PREDETERMINED
  }
  if (vars.CHOPSTICKS_VERIFY_PREDETERMINED !== undefined) {
    input.verifyPredetermined = vars.CHOPSTICKS_VERIFY_PREDETERMINED
  }
  if (vars.CHOPSTICKS_DEBUG !== undefined) input.debug = vars.CHOPSTICKS_DEBUG

  return parseSolverConfig(input)
}
