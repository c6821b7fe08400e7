// --- Constants for the SVG board ---
export const DEFAULT_BOARD_PX = 450
export const MAJOR_STROKE = 2
export const MINOR_STROKE = 0.5
export const GLYPH_INSET = 0.15 // fraction of a cell left empty around each mark

export const COLORS = {
  background: '#ffffff',
  line: '#000000',
  one: 'blue',
  two: 'red',
  forced: '#fef08a',
} as const

export type BoardColors = { [K in keyof typeof COLORS]: string }
