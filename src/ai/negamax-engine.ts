/**
 * Negamax Engine
 *
 * Computer player built on the negamax search. Without a time budget it
 * runs one search at the configured depth; with one it deepens
 * iteratively and keeps the deepest completed result.
 */

import type { AIEngine, EngineConfig, MoveResult } from './ai-engine'
import { negamax, type SearchResult } from './negamax'
import { type Coord, getOpponent } from '../game/board'
import { hasConnected } from '../game/connectivity'
import { GameOverError } from '../game/errors'
import type { HexGame } from '../game/hex'
import { formatMove } from '../game/notation'

export class NegamaxEngine implements AIEngine {
  readonly name = 'negamax'
  readonly description = 'Fixed-depth negamax with optional alpha-beta pruning and iterative deepening'

  selectMove(game: HexGame, config: EngineConfig, timeBudget?: number): MoveResult {
    const startTime = Date.now()

    if (game.isTerminal()) {
      throw new GameOverError('No moves available: the game is already over')
    }

    const validMoves = game.possibleMoves()

    // If only one move, score it from one ply and return it
    if (validMoves.length === 1) {
      const onlyMove = validMoves[0]
      game.applyMove(onlyMove)
      const score = -game.evaluate()
      game.undoMove(onlyMove)
      return this.toMoveResult(onlyMove, score, {
        depth: 0,
        nodesSearched: 0,
        timeUsed: Date.now() - startTime,
        completed: true,
      })
    }

    if (timeBudget === undefined) {
      const result = negamax(game, config.searchDepth, { alphaBeta: config.alphaBeta })
      this.log(config, result)
      return this.toMoveResult(result.move ?? validMoves[0], result.score, {
        depth: result.depth,
        nodesSearched: result.nodesSearched,
        timeUsed: Date.now() - startTime,
        completed: true,
      })
    }

    const deadline = startTime + timeBudget
    let best: SearchResult<Coord> | null = null
    let totalNodesSearched = 0

    // Iterative deepening: search progressively deeper until time runs out
    for (let depth = 1; depth <= config.searchDepth; depth++) {
      const result = negamax(game, depth, { alphaBeta: config.alphaBeta, deadline })
      totalNodesSearched += result.nodesSearched
      if (!result.completed) break

      best = result
      this.log(config, result)
    }

    return this.toMoveResult(best?.move ?? validMoves[0], best?.score ?? game.evaluate(), {
      depth: best?.depth ?? 0,
      nodesSearched: totalNodesSearched,
      timeUsed: Date.now() - startTime,
      completed: best?.depth === config.searchDepth,
    })
  }

  evaluatePosition(game: HexGame): number {
    return game.evaluate()
  }

  explainMove(game: HexGame, move: Coord): string {
    const notation = formatMove(move)
    if (!game.isLegalMove(move)) {
      return `Invalid move: ${notation}`
    }

    const player = game.currentPlayer()
    const opponent = getOpponent(player)

    game.applyMove(move)
    const wins = game.winner() === player
    game.undoMove(move)

    if (wins) {
      return `Winning move at ${notation}!`
    }

    // Check if the opponent would have won by taking this cell
    const opponentBoard = game.cloneBoard()
    opponentBoard.setCell(move, opponent)
    if (hasConnected(opponentBoard, opponent)) {
      return `Blocking opponent's winning cell ${notation}`
    }

    return `Playing ${notation} to build toward the ${player === 1 ? 'left-right' : 'top-bottom'} connection`
  }

  private toMoveResult(move: Coord, score: number, searchInfo: MoveResult['searchInfo']): MoveResult {
    return { move, notation: formatMove(move), score, searchInfo }
  }

  private log(config: EngineConfig, result: SearchResult<Coord>): void {
    if (!config.debug) return
    const notation = result.move ? formatMove(result.move) : '-'
    console.debug(
      `[negamax] depth ${result.depth}: best ${notation} score ${result.score} (${result.nodesSearched} nodes)`
    )
  }
}

// Export singleton instance
export const negamaxEngine = new NegamaxEngine()
