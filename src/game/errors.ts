/**
 * Hex engine errors
 *
 * OutOfRangeError and MoveOrderError are precondition failures: no valid game
 * flow produces them. IllegalMoveError and InvalidNotationError are
 * recoverable and meant to be caught by an input front end.
 */

import type { Cell, Coord } from './board'

export class HexError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'HexError'
  }
}

export class OutOfRangeError extends HexError {
  readonly coord: Coord
  readonly size: number

  constructor(coord: Coord, size: number) {
    super(`Cell (${coord.row}, ${coord.col}) is outside the ${size}x${size} board`)
    this.name = 'OutOfRangeError'
    this.coord = coord
    this.size = size
  }
}

export class IllegalMoveError extends HexError {
  readonly move: Coord
  readonly occupant: Cell

  constructor(move: Coord, occupant: Cell) {
    super(`Cell (${move.row}, ${move.col}) is already taken by player ${occupant}`)
    this.name = 'IllegalMoveError'
    this.move = move
    this.occupant = occupant
  }
}

export class MoveOrderError extends HexError {
  constructor(message: string) {
    super(message)
    this.name = 'MoveOrderError'
  }
}

export class GameOverError extends HexError {
  constructor(message = 'The game is already over') {
    super(message)
    this.name = 'GameOverError'
  }
}

export class InvalidNotationError extends HexError {
  readonly input: string

  constructor(input: string, message: string) {
    super(message)
    this.name = 'InvalidNotationError'
    this.input = input
  }
}
