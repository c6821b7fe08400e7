import type { RulesConfig } from './types'

// --- Cell Values ---
export const CELL_EMPTY = 0
export const CELL_ONE = 1
export const CELL_TWO = 2

export const PLAYERS = [CELL_ONE, CELL_TWO] as const

// --- Board Geometry ---
export const SUBGRID_SIZE = 3
export const GRID_SIZE = 9
export const BOARD_SIZE = 81

// Rows, columns, main diagonal, anti-diagonal (order matters for tie-breaks)
export const WIN_PATTERNS = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
]

const range = (n: number): number[] => Array.from({ length: n }, (_, i) => i)

// The same four families across the full 9x9 grid, as flat indices
export const GRID_LINES: number[][] = [
  ...range(GRID_SIZE).map((row) => range(GRID_SIZE).map((col) => row * GRID_SIZE + col)),
  ...range(GRID_SIZE).map((col) => range(GRID_SIZE).map((row) => row * GRID_SIZE + col)),
  range(GRID_SIZE).map((i) => i * GRID_SIZE + i),
  range(GRID_SIZE).map((i) => i * GRID_SIZE + (GRID_SIZE - 1 - i)),
]

// --- Rules (Single Source of Truth) ---
export const DEFAULT_RULES: RulesConfig = {
  overallWin: 'cells',
  strictSubgridGating: false,
}
