import { createElement } from 'react'
import { renderToStaticMarkup } from 'react-dom/server'
import type { Board } from '../game/engine'
import { BoardView } from '../components/BoardView'
import type { BoardColors } from './constants'

export interface SvgOptions {
  size?: number
  colors?: BoardColors
}

// Static SVG snapshot of the board, suitable for writing to a .svg file
export const renderBoardSvg = (board: Board, options: SvgOptions = {}): string =>
  renderToStaticMarkup(
    createElement(BoardView, {
      cells: board.getCells(),
      subgridStatus: board.getSubgridStatus(),
      constraint: board.getNextConstraint(),
      ...options,
    })
  )
