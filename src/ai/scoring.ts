/**
 * Scoring Function
 *
 * Maps a resolved value to a scalar so moves can be ranked. Wins score above
 * every draw, draws above every loss. Within the win band faster is better;
 * within the loss band the survival term rewards holding out longer.
 */

import type { Player } from '../game/chopsticks'
import { type ResolvedValue, flipPerspective } from './solver'

export interface ScoringWeights {
  /** Score of an immediate win; each ply of distance subtracts one */
  winBase: number
  /** Score of an immediate loss */
  lossBase: number
  /** Bonus per ply of distance in a lost position */
  survivalWeight: number
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  winBase: 1000,
  lossBase: -1000,
  survivalWeight: 1,
}

/**
 * Scores a value from the perspective it is expressed in.
 */
export function scoreValue(
  value: ResolvedValue,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  switch (value.outcome) {
    case 'win':
      return weights.winBase - value.distance
    case 'loss':
      return weights.lossBase + weights.survivalWeight * value.distance
    case 'draw':
      return 0
  }
}

/**
 * Scores a position's value for either player.
 *
 * @param value - Value relative to the player to move
 * @param mover - Player to move in the scored position
 * @param perspective - Player the score is for
 */
export function score(
  value: ResolvedValue,
  mover: Player,
  perspective: Player,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  return scoreValue(perspective === mover ? value : flipPerspective(value), weights)
}

/**
 * Lowest win score and highest loss score reachable for distances below
 * `maxDistance`. Used to check that the bands cannot overlap the draw score.
 */
export function scoreBands(
  weights: ScoringWeights,
  maxDistance: number
): { lowestWin: number; highestLoss: number } {
  return {
    lowestWin: weights.winBase - maxDistance,
    highestLoss: weights.lossBase + weights.survivalWeight * maxDistance,
  }
}
