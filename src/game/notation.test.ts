import { describe, it, expect } from 'vitest'
import { InvalidNotationError } from './errors'
import { HexGame } from './hex'
import { applyNotation, formatMove, parseMove, validateMoveNotation } from './notation'

describe('Move notation', () => {
  describe('formatMove', () => {
    it('writes the column letter then the 1-based row', () => {
      expect(formatMove({ row: 0, col: 0 })).toBe('A1')
      expect(formatMove({ row: 4, col: 0 })).toBe('A5')
      expect(formatMove({ row: 2, col: 3 })).toBe('D3')
      expect(formatMove({ row: 10, col: 25 })).toBe('Z11')
    })
  })

  describe('parseMove', () => {
    it('maps the letter to the column and the number to the row', () => {
      expect(parseMove('A5', 5)).toEqual({ row: 4, col: 0 })
      expect(parseMove('E1', 5)).toEqual({ row: 0, col: 4 })
    })

    it('is case-insensitive and trims whitespace', () => {
      expect(parseMove(' c3 ', 5)).toEqual({ row: 2, col: 2 })
    })

    it('reads multi-digit rows', () => {
      expect(parseMove('K11', 11)).toEqual({ row: 10, col: 10 })
    })

    it('rejects malformed text', () => {
      for (const input of ['', '5A', 'AA1', 'A', 'A0', 'A05', 'A-1']) {
        expect(() => parseMove(input, 5)).toThrow(InvalidNotationError)
      }
    })

    it('rejects cells off the board', () => {
      expect(() => parseMove('Z9', 5)).toThrow('Move "Z9" is off the 5x5 board')
      expect(() => parseMove('F1', 5)).toThrow(InvalidNotationError)
      expect(() => parseMove('A6', 5)).toThrow(InvalidNotationError)
    })

    it('keeps the raw input on the error', () => {
      try {
        parseMove('b9', 5)
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidNotationError)
        if (err instanceof InvalidNotationError) {
          expect(err.input).toBe('b9')
          expect(err.message).toBe('Move "B9" is off the 5x5 board')
        }
      }
    })
  })

  describe('validateMoveNotation', () => {
    it('accepts a valid move', () => {
      expect(validateMoveNotation('B2', 5)).toEqual({ isValid: true, error: null })
    })

    it('explains a malformed move', () => {
      expect(validateMoveNotation('hello', 5)).toEqual({
        isValid: false,
        error: 'Move must be a column letter followed by a row number, e.g. "A5"',
      })
    })
  })

  describe('applyNotation', () => {
    it('plays a valid move', () => {
      const game = new HexGame(3)
      expect(applyNotation(game, 'b2')).toEqual({ success: true, move: { row: 1, col: 1 } })
      expect(game.cellAt({ row: 1, col: 1 })).toBe(1)
    })

    it('reports an occupied cell so the caller can ask again', () => {
      const game = new HexGame(3)
      applyNotation(game, 'B2')
      expect(applyNotation(game, 'B2')).toEqual({
        success: false,
        error: 'Cell (1, 1) is already taken by player 1',
      })
      expect(game.moveCount).toBe(1)
    })

    it('reports bad notation without touching the game', () => {
      const game = new HexGame(3)
      expect(applyNotation(game, 'D1')).toEqual({
        success: false,
        error: 'Move "D1" is off the 3x3 board',
      })
      expect(game.moveCount).toBe(0)
    })
  })
})
