/**
 * Move notation
 *
 * A move is written as a column letter followed by a 1-based row number:
 * "A5" is column 0, row 4. Internal coordinates are always 0-based.
 */

import { z } from 'zod'
import type { Coord } from './board'
import { HexError, InvalidNotationError } from './errors'
import type { HexGame } from './hex'
import { toErrorResponse } from '../lib/errorUtils'

export const COLUMN_LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'

const moveNotationSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z][1-9][0-9]*$/, 'Move must be a column letter followed by a row number, e.g. "A5"')

/**
 * Result of a validation check.
 * If valid, error is null. If invalid, error contains the error message.
 */
export interface ValidationResult {
  isValid: boolean
  error: string | null
}

export function formatMove(coord: Coord): string {
  return `${COLUMN_LETTERS[coord.col] ?? '?'}${coord.row + 1}`
}

/**
 * Parses a move such as "a5" or " C3 " for a board of the given size.
 *
 * @throws InvalidNotationError if the text is malformed or off the board
 */
export function parseMove(input: string, size: number): Coord {
  const parsed = moveNotationSchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidNotationError(input, parsed.error.issues[0]?.message ?? 'Invalid move')
  }

  const text = parsed.data
  const col = COLUMN_LETTERS.indexOf(text[0])
  const row = parseInt(text.slice(1), 10) - 1

  if (col >= size || row >= size) {
    throw new InvalidNotationError(input, `Move "${text}" is off the ${size}x${size} board`)
  }

  return { row, col }
}

export function validateMoveNotation(input: string, size: number): ValidationResult {
  try {
    parseMove(input, size)
    return { isValid: true, error: null }
  } catch (err) {
    if (err instanceof InvalidNotationError) {
      return { isValid: false, error: err.message }
    }
    throw err
  }
}

export type PlayResult = { success: true; move: Coord } | { success: false; error: string }

/**
 * Parses and plays a move for the player to move. Bad notation, occupied
 * cells and moves after the game ended come back as { success: false }
 * so that an input front end can ask again.
 */
export function applyNotation(game: HexGame, input: string): PlayResult {
  try {
    const move = parseMove(input, game.size)
    game.applyMove(move)
    return { success: true, move }
  } catch (err) {
    if (err instanceof HexError) {
      return toErrorResponse(err, 'Invalid move')
    }
    throw err
  }
}
