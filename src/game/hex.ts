/**
 * Hex Game Engine
 *
 * Wraps a HexBoard with the move history and exposes the move/undo/
 * evaluate/terminal interface that the search consumes. The board is
 * mutated in place; undo restores exactly one cell.
 *
 * The player to move is derived from the number of moves played
 * (even = player 1), never stored.
 */

import {
  type BoardView,
  type Cell,
  type Coord,
  type GameResult,
  type Player,
  DEFAULT_BOARD_SIZE,
  HexBoard,
  getOpponent,
  sameCoord,
} from './board'
import { hasConnected, shortestCompletionDistance } from './connectivity'
import { GameOverError, IllegalMoveError, MoveOrderError } from './errors'
import { formatMove, parseMove } from './notation'

interface HistoryEntry {
  move: Coord
  player: Player
  /** Whether this move connected the mover's edges */
  connected: boolean
}

export class HexGame {
  private readonly grid: HexBoard
  private readonly history: HistoryEntry[] = []

  constructor(size = DEFAULT_BOARD_SIZE) {
    this.grid = new HexBoard(size)
  }

  get size(): number {
    return this.grid.size
  }

  /** Read-only view of the board */
  get board(): BoardView {
    return this.grid
  }

  get moveCount(): number {
    return this.history.length
  }

  getMoveHistory(): Coord[] {
    return this.history.map((entry) => ({ ...entry.move }))
  }

  cellAt(coord: Coord): Cell {
    return this.grid.cellAt(coord)
  }

  currentPlayer(): Player {
    return this.history.length % 2 === 0 ? 1 : 2
  }

  /** The player who made the most recent move, or null before the first move */
  lastMover(): Player | null {
    const last = this.history[this.history.length - 1]
    return last ? last.player : null
  }

  /**
   * All empty cells in row-major order. Empty only when the board is full.
   */
  possibleMoves(): Coord[] {
    return [...this.grid.emptyCells()]
  }

  isLegalMove(move: Coord): boolean {
    return !this.isTerminal() && this.grid.isInBounds(move) && this.grid.cellAt(move) === null
  }

  /**
   * Places the current player's stone.
   *
   * @throws OutOfRangeError if the cell is not on the board
   * @throws IllegalMoveError if the cell is occupied
   * @throws GameOverError if the game has already ended
   */
  applyMove(move: Coord): void {
    const occupant = this.grid.cellAt(move)
    if (occupant !== null) {
      throw new IllegalMoveError(move, occupant)
    }
    // A full board has no empty cell left, so only a win can end the game here
    if (this.winner() !== null) {
      throw new GameOverError(`Cannot play ${formatMove(move)}: the game is already over`)
    }

    const player = this.currentPlayer()
    this.grid.setCell(move, player)
    // Only the mover's connectivity can change when a stone is added
    this.history.push({ move: { ...move }, player, connected: hasConnected(this.grid, player) })
  }

  /**
   * Takes back the most recent move.
   *
   * @throws MoveOrderError if move is not the most recently applied one
   */
  undoMove(move: Coord): void {
    const last = this.history[this.history.length - 1]
    if (!last) {
      throw new MoveOrderError('No move to undo')
    }
    if (!sameCoord(last.move, move)) {
      throw new MoveOrderError(
        `Cannot undo ${formatMove(move)}: the most recent move is ${formatMove(last.move)}`
      )
    }

    this.grid.setCell(move, null)
    this.history.pop()
  }

  isTerminal(): boolean {
    return this.winner() !== null || this.isBoardFull()
  }

  /**
   * The most recent mover if it connected its edges, else null (even on a
   * full board).
   */
  winner(): Player | null {
    const last = this.history[this.history.length - 1]
    return last?.connected ? last.player : null
  }

  /**
   * @returns The winning player, 'draw' for a full board with no connection,
   * or null if the game continues
   */
  result(): GameResult {
    const winner = this.winner()
    if (winner !== null) return winner
    if (this.isBoardFull()) return 'draw'
    return null
  }

  // Every history entry filled exactly one cell
  private isBoardFull(): boolean {
    return this.history.length === this.grid.size * this.grid.size
  }

  /**
   * Scores the position for the player to move: the opponent's completion
   * distance minus our own. Higher is better.
   */
  evaluate(): number {
    const player = this.currentPlayer()
    return (
      shortestCompletionDistance(this.grid, getOpponent(player)) -
      shortestCompletionDistance(this.grid, player)
    )
  }

  /** A detached copy of the board, free to modify */
  cloneBoard(): HexBoard {
    return this.grid.clone()
  }

  clone(): HexGame {
    const copy = new HexGame(this.size)
    for (const entry of this.history) {
      copy.applyMove(entry.move)
    }
    return copy
  }

  toDebugString(): string {
    return this.grid.toDebugString()
  }
}

/**
 * Replays a game from a list of moves in notation ("A1", "B2", ...).
 *
 * @param moves - Moves in play order, starting with player 1
 * @param size - Board dimension
 * @throws InvalidNotationError, IllegalMoveError or GameOverError on the first bad move
 */
export function replayMoves(moves: string[], size = DEFAULT_BOARD_SIZE): HexGame {
  const game = new HexGame(size)
  for (const notation of moves) {
    game.applyMove(parseMove(notation, size))
  }
  return game
}
