/**
 * Connectivity Analyzer
 *
 * Answers two questions about a player's stones on a board:
 * - has the player joined its two target edges? (exact, depth-first search)
 * - how many hex steps does the shortest chain of the player's own stones
 *   take from the start edge to the target edge? (breadth-first search)
 *
 * The distance only follows stones already placed. It ignores empty cells
 * and is used as a comparative evaluation signal, not a game-theoretic one.
 */

import type { BoardView, Coord, Player } from './board'

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Hex adjacency offsets [deltaRow, deltaCol]. Each cell has up to 6 neighbors:
 *   (-1, 0), (-1, +1),
 *   (0, -1),           (0, +1),
 *   (+1, -1), (+1, 0)
 */
export const HEX_DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
]

/** Distance reported when no chain of own stones reaches the target edge */
export const NO_PATH_DISTANCE = 99

/**
 * Sentinel distance for a board of the given size. Always larger than any
 * real path, which is at most size² - 1 steps.
 */
export function getNoPathDistance(size: number): number {
  return Math.max(NO_PATH_DISTANCE, size * size)
}

// ============================================================================
// EDGES
// ============================================================================

/**
 * Start-edge cells owned by the player: column 0 for player 1,
 * row 0 for player 2.
 */
function getSeeds(board: BoardView, player: Player): Coord[] {
  const seeds: Coord[] = []
  for (let i = 0; i < board.size; i++) {
    const coord = player === 1 ? { row: i, col: 0 } : { row: 0, col: i }
    if (board.cellAt(coord) === player) {
      seeds.push(coord)
    }
  }
  return seeds
}

function isOnTargetEdge(board: BoardView, player: Player, coord: Coord): boolean {
  return player === 1 ? coord.col === board.size - 1 : coord.row === board.size - 1
}

/**
 * Returns the in-bounds neighbors of a cell in HEX_DIRECTIONS order.
 */
export function getNeighbors(board: BoardView, coord: Coord): Coord[] {
  const neighbors: Coord[] = []
  for (const [dr, dc] of HEX_DIRECTIONS) {
    const next = { row: coord.row + dr, col: coord.col + dc }
    if (board.isInBounds(next)) {
      neighbors.push(next)
    }
  }
  return neighbors
}

function key(board: BoardView, coord: Coord): number {
  return coord.row * board.size + coord.col
}

// ============================================================================
// SEARCHES
// ============================================================================

/**
 * Checks whether the player's stones connect its start and target edges.
 */
export function hasConnected(board: BoardView, player: Player): boolean {
  const stack = getSeeds(board, player)
  const visited = new Set<number>()

  while (stack.length > 0) {
    const coord = stack.pop()
    if (coord === undefined) break

    const id = key(board, coord)
    if (visited.has(id)) continue
    visited.add(id)

    if (isOnTargetEdge(board, player, coord)) {
      return true
    }

    for (const next of getNeighbors(board, coord)) {
      if (board.cellAt(next) === player && !visited.has(key(board, next))) {
        stack.push(next)
      }
    }
  }

  return false
}

/**
 * Breadth-first search over the player's stones. Returns the chain from a
 * start-edge stone to the first target-edge stone reached, or null.
 */
function findShortestChain(board: BoardView, player: Player): Coord[] | null {
  const seeds = getSeeds(board, player)
  const parent = new Map<number, Coord | null>()
  const queue: Coord[] = []

  for (const seed of seeds) {
    parent.set(key(board, seed), null)
    queue.push(seed)
  }

  for (let head = 0; head < queue.length; head++) {
    const coord = queue[head]

    if (isOnTargetEdge(board, player, coord)) {
      const chain: Coord[] = []
      let step: Coord | null | undefined = coord
      while (step) {
        chain.unshift(step)
        step = parent.get(key(board, step))
      }
      return chain
    }

    for (const next of getNeighbors(board, coord)) {
      const id = key(board, next)
      if (board.cellAt(next) === player && !parent.has(id)) {
        parent.set(id, coord)
        queue.push(next)
      }
    }
  }

  return null
}

/**
 * Number of hex steps along the player's own stones from its start edge to
 * its target edge, or getNoPathDistance(size) when there is no such chain.
 */
export function shortestCompletionDistance(board: BoardView, player: Player): number {
  const chain = findShortestChain(board, player)
  return chain === null ? getNoPathDistance(board.size) : chain.length - 1
}

/**
 * Gets a shortest chain of stones joining the player's edges (for
 * highlighting a win). Returns null if the player has not connected.
 */
export function getConnectingPath(board: BoardView, player: Player): Coord[] | null {
  return findShortestChain(board, player)
}
