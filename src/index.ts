/**
 * Chopsticks solver public API
 *
 * UI, CLI and spectator layers build on these exports; none of them need to
 * reach into individual modules.
 */

export {
  type Player,
  type Hands,
  type State,
  CANONICAL_STATE_COUNT,
  assertValidState,
  canonicalize,
  compareStates,
  createState,
  enumerateStates,
  formatHands,
  initialState,
  isTerminal,
  parseState,
  stateKey,
  statesEqual,
  winner,
} from './game/chopsticks'
export {
  type Move,
  type TapMove,
  type SplitMove,
  type Transition,
  applyMove,
  describeMove,
  legalMoves,
  movesEqual,
} from './game/moves'
export { type GameRecord, createGame, isRepetition, makeMove, replayMoves } from './game/play'
export {
  type ChopsticksErrorCode,
  ChopsticksError,
  IllegalMoveError,
  InvalidConfigError,
  InvalidStateError,
  NoLegalMovesError,
} from './game/errors'
export {
  type ResolvedValue,
  type SolverStats,
  GraphSolver,
  combineSuccessorValues,
  describeValue,
  flipPerspective,
  valueBeforeMove,
} from './ai/solver'
export { type ScoringWeights, DEFAULT_SCORING_WEIGHTS, score, scoreValue } from './ai/scoring'
export { type PredeterminedTableJSON, PredeterminedTable, classifyByRule } from './ai/predetermined'
export {
  type MoveSuggestion,
  type PositionAnalysis,
  type RankedMove,
  MoveSelector,
  chooseMove,
  createMoveSelector,
  getDefaultSelector,
  resetDefaultSelector,
  suggestMove,
} from './ai/moveSelector'
export { type BattleResult, runBotBattle } from './ai/botBattle'
export { type SolverConfig, configFromEnv, parseSolverConfig } from './lib/config'
export { type ErrorResponse, isChopsticksError, toErrorResponse } from './lib/errorUtils'
