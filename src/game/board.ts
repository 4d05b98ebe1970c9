/**
 * Hex Board
 *
 * An N×N rhombic grid of hexagonal cells. Row 0 is the TOP edge and
 * column 0 the LEFT edge. The board only stores occupancy; legality of
 * moves is decided by the game state machine.
 */

import { OutOfRangeError } from './errors'

// Board dimensions
export const DEFAULT_BOARD_SIZE = 5
export const MAX_BOARD_SIZE = 26 // one column letter per column

// Player identifiers
// Player 1 connects the left and right edges (column 0 to column N-1)
// Player 2 connects the top and bottom edges (row 0 to row N-1)
export type Player = 1 | 2
export type Cell = Player | null

export type GameResult = Player | 'draw' | null

export interface Coord {
  row: number
  col: number
}

/**
 * Read-only access to a board, as handed to the connectivity analyzer.
 */
export interface BoardView {
  readonly size: number
  cellAt(coord: Coord): Cell
  isInBounds(coord: Coord): boolean
}

export const PLAYER_SYMBOLS: Record<Player, string> = {
  1: 'X',
  2: 'O',
}

export function getOpponent(player: Player): Player {
  return player === 1 ? 2 : 1
}

export function sameCoord(a: Coord, b: Coord): boolean {
  return a.row === b.row && a.col === b.col
}

export class HexBoard implements BoardView {
  readonly size: number
  private cells: Cell[][]

  /**
   * @param size - Board dimension N (0-26)
   * @throws RangeError if size is not an integer in range
   */
  constructor(size = DEFAULT_BOARD_SIZE) {
    if (!Number.isInteger(size) || size < 0 || size > MAX_BOARD_SIZE) {
      throw new RangeError(`Board size must be an integer between 0 and ${MAX_BOARD_SIZE}, got ${size}`)
    }
    this.size = size
    this.cells = Array.from({ length: size }, () => Array<Cell>(size).fill(null))
  }

  isInBounds(coord: Coord): boolean {
    return (
      Number.isInteger(coord.row) &&
      Number.isInteger(coord.col) &&
      coord.row >= 0 &&
      coord.row < this.size &&
      coord.col >= 0 &&
      coord.col < this.size
    )
  }

  /**
   * @throws OutOfRangeError if the coordinate is not on the board
   */
  cellAt(coord: Coord): Cell {
    this.assertInBounds(coord)
    return this.cells[coord.row][coord.col]
  }

  /**
   * Overwrites a cell unconditionally. Used both to place a stone and to
   * clear it again on undo.
   */
  setCell(coord: Coord, cell: Cell): void {
    this.assertInBounds(coord)
    this.cells[coord.row][coord.col] = cell
  }

  /**
   * Lazily yields empty cells in row-major order. Search move ordering
   * depends on this order.
   */
  *emptyCells(): Generator<Coord> {
    for (let row = 0; row < this.size; row++) {
      for (let col = 0; col < this.size; col++) {
        if (this.cells[row][col] === null) {
          yield { row, col }
        }
      }
    }
  }

  isFull(): boolean {
    return this.cells.every((row) => row.every((cell) => cell !== null))
  }

  clone(): HexBoard {
    const copy = new HexBoard(this.size)
    copy.cells = this.toRows()
    return copy
  }

  /**
   * Returns a copy of the grid as board[row][col].
   */
  toRows(): Cell[][] {
    return this.cells.map((row) => [...row])
  }

  /**
   * One line per row: '.' for empty, 'X' and 'O' for the players.
   * Each row is shifted one space further right to show the rhombus.
   */
  toDebugString(): string {
    return this.cells
      .map((row, i) => ' '.repeat(i) + row.map((c) => (c === null ? '.' : PLAYER_SYMBOLS[c])).join(' '))
      .join('\n')
  }

  private assertInBounds(coord: Coord): void {
    if (!this.isInBounds(coord)) {
      throw new OutOfRangeError(coord, this.size)
    }
  }
}
