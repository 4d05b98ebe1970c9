import { describe, it, expect } from 'vitest'
import { DEFAULT_BOARD_SIZE, HexBoard, getOpponent, sameCoord } from './board'
import { OutOfRangeError } from './errors'

describe('HexBoard', () => {
  describe('constructor', () => {
    it('creates a 5x5 board by default', () => {
      const board = new HexBoard()
      expect(board.size).toBe(DEFAULT_BOARD_SIZE)
      expect(board.toRows()).toHaveLength(5)
      expect(board.toRows()[0]).toHaveLength(5)
    })

    it('all cells are empty', () => {
      const board = new HexBoard(3)
      expect(board.toRows()).toEqual([
        [null, null, null],
        [null, null, null],
        [null, null, null],
      ])
    })

    it('accepts a zero-sized board', () => {
      const board = new HexBoard(0)
      expect(board.toRows()).toEqual([])
    })

    it('rejects invalid sizes', () => {
      expect(() => new HexBoard(-1)).toThrow(RangeError)
      expect(() => new HexBoard(27)).toThrow(RangeError)
      expect(() => new HexBoard(2.5)).toThrow(RangeError)
    })
  })

  describe('cellAt / setCell', () => {
    it('reads back what was written', () => {
      const board = new HexBoard(3)
      board.setCell({ row: 1, col: 2 }, 1)
      board.setCell({ row: 2, col: 0 }, 2)
      expect(board.cellAt({ row: 1, col: 2 })).toBe(1)
      expect(board.cellAt({ row: 2, col: 0 })).toBe(2)
      expect(board.cellAt({ row: 0, col: 0 })).toBeNull()
    })

    it('overwrites unconditionally', () => {
      const board = new HexBoard(3)
      board.setCell({ row: 0, col: 0 }, 1)
      board.setCell({ row: 0, col: 0 }, 2)
      expect(board.cellAt({ row: 0, col: 0 })).toBe(2)
      board.setCell({ row: 0, col: 0 }, null)
      expect(board.cellAt({ row: 0, col: 0 })).toBeNull()
    })

    it('throws OutOfRangeError outside the board', () => {
      const board = new HexBoard(3)
      expect(() => board.cellAt({ row: 3, col: 0 })).toThrow(OutOfRangeError)
      expect(() => board.cellAt({ row: 0, col: -1 })).toThrow(OutOfRangeError)
      expect(() => board.setCell({ row: -1, col: 0 }, 1)).toThrow(OutOfRangeError)
    })

    it('reports the coordinate and size on the error', () => {
      const board = new HexBoard(3)
      try {
        board.cellAt({ row: 5, col: 1 })
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(OutOfRangeError)
        if (err instanceof OutOfRangeError) {
          expect(err.coord).toEqual({ row: 5, col: 1 })
          expect(err.size).toBe(3)
          expect(err.message).toBe('Cell (5, 1) is outside the 3x3 board')
        }
      }
    })
  })

  describe('emptyCells', () => {
    it('yields every cell of an empty board in row-major order', () => {
      const board = new HexBoard(2)
      expect([...board.emptyCells()]).toEqual([
        { row: 0, col: 0 },
        { row: 0, col: 1 },
        { row: 1, col: 0 },
        { row: 1, col: 1 },
      ])
    })

    it('skips occupied cells', () => {
      const board = new HexBoard(2)
      board.setCell({ row: 0, col: 1 }, 1)
      board.setCell({ row: 1, col: 0 }, 2)
      expect([...board.emptyCells()]).toEqual([
        { row: 0, col: 0 },
        { row: 1, col: 1 },
      ])
    })

    it('is lazy', () => {
      const board = new HexBoard(4)
      const iterator = board.emptyCells()
      expect(iterator.next().value).toEqual({ row: 0, col: 0 })
      expect(iterator.next().value).toEqual({ row: 0, col: 1 })
    })
  })

  describe('isFull', () => {
    it('is false for an empty board', () => {
      expect(new HexBoard(2).isFull()).toBe(false)
    })

    it('is true once every cell is taken', () => {
      const board = new HexBoard(2)
      board.setCell({ row: 0, col: 0 }, 1)
      board.setCell({ row: 0, col: 1 }, 2)
      board.setCell({ row: 1, col: 0 }, 1)
      expect(board.isFull()).toBe(false)
      board.setCell({ row: 1, col: 1 }, 2)
      expect(board.isFull()).toBe(true)
    })

    it('is true for a zero-sized board', () => {
      expect(new HexBoard(0).isFull()).toBe(true)
    })
  })

  describe('clone', () => {
    it('copies cells without sharing state', () => {
      const board = new HexBoard(2)
      board.setCell({ row: 0, col: 0 }, 1)
      const copy = board.clone()
      copy.setCell({ row: 1, col: 1 }, 2)
      expect(board.cellAt({ row: 1, col: 1 })).toBeNull()
      expect(copy.cellAt({ row: 0, col: 0 })).toBe(1)
    })
  })

  describe('toDebugString', () => {
    it('renders rows shifted into a rhombus', () => {
      const board = new HexBoard(3)
      board.setCell({ row: 0, col: 0 }, 1)
      board.setCell({ row: 1, col: 1 }, 2)
      expect(board.toDebugString()).toBe('X . .\n . O .\n  . . .')
    })
  })
})

describe('helpers', () => {
  it('getOpponent swaps players', () => {
    expect(getOpponent(1)).toBe(2)
    expect(getOpponent(2)).toBe(1)
  })

  it('sameCoord compares row and column', () => {
    expect(sameCoord({ row: 1, col: 2 }, { row: 1, col: 2 })).toBe(true)
    expect(sameCoord({ row: 1, col: 2 }, { row: 2, col: 1 })).toBe(false)
  })
})
