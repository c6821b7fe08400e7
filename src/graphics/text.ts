import type { Board } from '../game/engine'
import type { CellValue, SubgridStatus } from '../game/types'
import { GRID_SIZE, SUBGRID_SIZE } from '../game/constants'

export type Glyphs = Record<CellValue, string>

export const DEFAULT_GLYPHS: Glyphs = { 0: '.', 1: 'X', 2: 'O' }

export const BAND_SEPARATOR = '------+-------+------'

export const renderBoardText = (board: Board, glyphs: Glyphs = DEFAULT_GLYPHS): string => {
  const cells = board.getCells()
  const lines: string[] = []

  for (let row = 0; row < GRID_SIZE; row++) {
    if (row > 0 && row % SUBGRID_SIZE === 0) lines.push(BAND_SEPARATOR)

    const segments: string[] = []
    for (let band = 0; band < SUBGRID_SIZE; band++) {
      const start = row * GRID_SIZE + band * SUBGRID_SIZE
      segments.push(cells.slice(start, start + SUBGRID_SIZE).map((c) => glyphs[c]).join(' '))
    }
    lines.push(segments.join(' | '))
  }

  return lines.join('\n')
}

const describeStatus = (status: SubgridStatus, glyphs: Glyphs): string =>
  status === null ? 'no winner' : `${glyphs[status]} wins`

export const renderStatusText = (board: Board, glyphs: Glyphs = DEFAULT_GLYPHS): string => {
  const lines = board.getSubgridStatus().map((status, i) => `Subgrid ${i}: ${describeStatus(status, glyphs)}`)

  const winner = board.getWinner()
  lines.push(`Overall winner: ${winner === null ? 'none' : glyphs[winner]}`)

  const constraint = board.getNextConstraint()
  lines.push(`Next move: ${constraint.type === 'forced' ? `subgrid ${constraint.subgrid}` : 'any subgrid'}`)

  return lines.join('\n')
}
