/**
 * Hex engine: board, connectivity, game state and negamax search.
 */

export {
  type BoardView,
  type Cell,
  type Coord,
  type GameResult,
  type Player,
  DEFAULT_BOARD_SIZE,
  MAX_BOARD_SIZE,
  PLAYER_SYMBOLS,
  HexBoard,
  getOpponent,
  sameCoord,
} from './game/board'
export {
  HEX_DIRECTIONS,
  NO_PATH_DISTANCE,
  getConnectingPath,
  getNeighbors,
  getNoPathDistance,
  hasConnected,
  shortestCompletionDistance,
} from './game/connectivity'
export {
  GameOverError,
  HexError,
  IllegalMoveError,
  InvalidNotationError,
  MoveOrderError,
  OutOfRangeError,
} from './game/errors'
export { HexGame, replayMoves } from './game/hex'
export {
  type PlayResult,
  type ValidationResult,
  COLUMN_LETTERS,
  applyNotation,
  formatMove,
  parseMove,
  validateMoveNotation,
} from './game/notation'
export {
  type AIEngine,
  type EngineConfig,
  type MoveResult,
  type SearchInfo,
  DEFAULT_ENGINE_CONFIG,
} from './ai/ai-engine'
export { type SearchOptions, type SearchResult, type SearchableGame, negamax } from './ai/negamax'
export { NegamaxEngine, negamaxEngine } from './ai/negamax-engine'
export {
  type HexConfig,
  ConfigError,
  createGame,
  hexConfigSchema,
  loadConfigFromEnv,
  parseConfig,
  selectConfiguredMove,
  toEngineConfig,
} from './lib/config'
export { getErrorMessage, toErrorResponse } from './lib/errorUtils'
