/**
 * AI Engine Abstraction Layer
 *
 * Provides a pluggable interface for computer players. Engines are
 * stateless: everything they need comes from the game and the config.
 */

import type { Coord } from '../game/board'
import type { HexGame } from '../game/hex'

// ============================================================================
// CORE TYPES
// ============================================================================

/**
 * Configuration passed to engines for move selection.
 */
export interface EngineConfig {
  /** Search depth in plies */
  searchDepth: number
  /** Prune with alpha-beta (does not change the chosen move) */
  alphaBeta: boolean
  /** Log per-depth search statistics */
  debug?: boolean
}

/**
 * Result returned from move selection.
 */
export interface MoveResult {
  move: Coord
  /** The move in letter+number notation, e.g. "C3" */
  notation: string
  /** Search score for the player who moves (higher is better) */
  score: number
  searchInfo?: SearchInfo
}

/**
 * Search statistics for debugging and analysis.
 */
export interface SearchInfo {
  /** Deepest fully completed search depth */
  depth: number
  /** Number of positions visited */
  nodesSearched: number
  /** Time spent on move selection (ms) */
  timeUsed: number
  /** False if the time budget ran out before searchDepth was completed */
  completed: boolean
}

export interface AIEngine {
  /** Unique engine identifier */
  readonly name: string

  /** Human-readable description */
  readonly description: string

  /**
   * Select the best move for the player to move. The game is left as it
   * was found.
   *
   * @param timeBudget - Optional time budget in milliseconds
   */
  selectMove(game: HexGame, config: EngineConfig, timeBudget?: number): MoveResult

  /**
   * Evaluate the position for the player to move (positive = good).
   */
  evaluatePosition?(game: HexGame): number

  /**
   * Generate a human-readable explanation for a move the player to move
   * is about to make.
   */
  explainMove?(game: HexGame, move: Coord): string
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  searchDepth: 4,
  alphaBeta: true,
  debug: false,
}
