// Game primitives
export type CellValue = 0 | 1 | 2
export type Player = 1 | 2
export type SubgridStatus = Player | null

// Board addressing
export interface GridPosition {
  row: number
  col: number
}
export type Position = number | GridPosition

// Where the next mark may go
export type NextConstraint =
  | { type: 'unconstrained' }
  | { type: 'forced'; subgrid: number }

export type OverallWinPolicy = 'cells' | 'subgrids'

export interface RulesConfig {
  // 'cells': nine equal cells in a row, column or diagonal of the 9x9 grid.
  // 'subgrids': three won subgrids in a line of the 3x3 meta grid.
  overallWin: OverallWinPolicy
  // Reject moves into a subgrid that already has a winner.
  strictSubgridGating: boolean
}

// Geometric types
export interface Rect {
  x: number
  y: number
  w: number
  h: number
}
