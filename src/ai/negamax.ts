/**
 * Negamax Search
 *
 * Fixed-depth negamax over any game exposing move/undo/evaluate/terminal.
 * The game is mutated in place on the way down and restored on the way up,
 * so only one path of the tree exists at a time.
 *
 * Move order comes from possibleMoves(); the first move reaching the best
 * score wins ties, which makes results deterministic for a given depth.
 */

// ============================================================================
// TYPES
// ============================================================================

/**
 * The interface the search consumes. evaluate() scores the position for
 * the player to move (higher is better).
 */
export interface SearchableGame<M> {
  possibleMoves(): M[]
  applyMove(move: M): void
  undoMove(move: M): void
  isTerminal(): boolean
  evaluate(): number
}

export interface SearchOptions {
  /** Alpha-beta pruning; returns the same move and score as the full search (default true) */
  alphaBeta?: boolean
  /** Epoch milliseconds (Date.now clock) after which the search unwinds */
  deadline?: number
}

export interface SearchResult<M> {
  /** Best move, or null at a leaf or if the deadline passed before any move was searched */
  move: M | null
  score: number
  depth: number
  nodesSearched: number
  /** False if the deadline cut the search short */
  completed: boolean
}

interface SearchContext {
  alphaBeta: boolean
  deadline: number | undefined
  nodesSearched: number
  timedOut: boolean
}

interface NodeResult<M> {
  move: M | null
  score: number
}

// ============================================================================
// SEARCH
// ============================================================================

function search<M>(
  game: SearchableGame<M>,
  depth: number,
  alpha: number,
  beta: number,
  ctx: SearchContext
): NodeResult<M> {
  ctx.nodesSearched++

  if (ctx.deadline !== undefined && Date.now() >= ctx.deadline) {
    ctx.timedOut = true
    return { move: null, score: game.evaluate() }
  }

  if (depth === 0 || game.isTerminal()) {
    return { move: null, score: game.evaluate() }
  }

  let bestMove: M | null = null
  let bestScore = -Infinity

  for (const move of game.possibleMoves()) {
    game.applyMove(move)
    const child = search(game, depth - 1, -beta, -alpha, ctx)
    game.undoMove(move)

    // A child cut short by the deadline has no reliable score
    if (ctx.timedOut) break

    const score = -child.score
    if (score > bestScore) {
      bestScore = score
      bestMove = move
    }

    if (ctx.alphaBeta) {
      if (score > alpha) alpha = score
      if (alpha >= beta) break
    }
  }

  if (bestMove === null) {
    return { move: null, score: game.evaluate() }
  }
  return { move: bestMove, score: bestScore }
}

/**
 * Searches the game tree to the given depth and returns the best move for
 * the player to move.
 *
 * @param game - Game to search; restored to its original state on return
 * @param depth - Plies to look ahead (0 = static evaluation only)
 * @throws RangeError if depth is not a non-negative integer
 */
export function negamax<M>(
  game: SearchableGame<M>,
  depth: number,
  options: SearchOptions = {}
): SearchResult<M> {
  if (!Number.isInteger(depth) || depth < 0) {
    throw new RangeError(`Search depth must be a non-negative integer, got ${depth}`)
  }

  const ctx: SearchContext = {
    alphaBeta: options.alphaBeta ?? true,
    deadline: options.deadline,
    nodesSearched: 0,
    timedOut: false,
  }

  const result = search(game, depth, -Infinity, Infinity, ctx)

  return {
    move: result.move,
    score: result.score,
    depth,
    nodesSearched: ctx.nodesSearched,
    completed: !ctx.timedOut,
  }
}
