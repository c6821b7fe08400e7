// Public API for the Ultimate Tic-Tac-Toe engine and its renderers
export { Board } from './game/engine'
export { MoveError, isMoveError, type MoveErrorCode } from './game/errors'
export { replayMoves, otherPlayer, type ReplayResult } from './game/replay'
export {
  indexToPosition,
  positionToIndex,
  subgridOf,
  localIndexOf,
  globalIndexInSubgrid,
  subgridCellIndices,
  checkSubgridWinner,
  hasCellLine,
  hasSubgridLine,
  isPlayer,
} from './game/logic'
export * from './game/constants'
export type {
  CellValue,
  Player,
  SubgridStatus,
  GridPosition,
  Position,
  NextConstraint,
  OverallWinPolicy,
  RulesConfig,
  Rect,
} from './game/types'
export { renderBoardText, renderStatusText, DEFAULT_GLYPHS, type Glyphs } from './graphics/text'
export { renderBoardSvg, type SvgOptions } from './graphics/svg'
export { BoardView, type BoardViewProps } from './components/BoardView'
