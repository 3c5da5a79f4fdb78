/**
 * Bot Battle
 *
 * Plays two move selectors against each other without any rendering. A game
 * ends when a player loses both hands, when a position repeats, or at the
 * ply limit.
 */

import { type Player, type State, initialState } from '../game/chopsticks'
import type { Move } from '../game/moves'
import { createGame, isRepetition, makeMove } from '../game/play'
import { type SolverConfig, DEFAULT_SOLVER_CONFIG } from '../lib/config'
import { type MoveSelector, createMoveSelector, getDefaultSelector } from './moveSelector'

export type BattleOutcome = 'win' | 'draw-by-repetition' | 'ply-limit'

export interface BattleTurn {
  ply: number
  player: Player
  move: Move
  /** Position after the move */
  position: State
}

export interface BattleResult {
  outcome: BattleOutcome
  winner: Player | null
  plies: number
  turns: BattleTurn[]
  finalPosition: State
}

export interface BattleOptions {
  start?: State
  /** Overrides config.maxPlies */
  maxPlies?: number
  /** Supplies the ply limit and, without explicit players, one selector for both sides */
  config?: SolverConfig
  /** Selector for player 0 and player 1; without a config both default to the shared selector */
  players?: readonly [MoveSelector, MoveSelector]
}

function defaultPlayers(config: SolverConfig | undefined): readonly [MoveSelector, MoveSelector] {
  const selector = config === undefined ? getDefaultSelector() : createMoveSelector(config)
  return [selector, selector]
}

export function runBotBattle(options: BattleOptions = {}): BattleResult {
  const maxPlies = options.maxPlies ?? (options.config ?? DEFAULT_SOLVER_CONFIG).maxPlies
  const players = options.players ?? defaultPlayers(options.config)
  let game = createGame(options.start ?? initialState())
  const turns: BattleTurn[] = []

  const finish = (outcome: BattleOutcome): BattleResult => ({
    outcome,
    winner: game.winner,
    plies: turns.length,
    turns,
    finalPosition: game.position,
  })

  while (game.winner === null) {
    if (turns.length >= maxPlies) {
      return finish('ply-limit')
    }

    const player = game.position.turn
    const move = players[player].chooseMove(game.position)
    game = makeMove(game, move)
    turns.push({ ply: turns.length + 1, player, move, position: game.position })

    if (game.winner === null && isRepetition(game)) {
      return finish('draw-by-repetition')
    }
  }

  return finish('win')
}
