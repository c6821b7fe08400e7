import { describe, it, expect } from 'vitest'
import { Board } from '../game/engine'
import { replayMoves } from '../game/replay'
import { renderBoardSvg } from './svg'

const count = (haystack: string, needle: string) => haystack.split(needle).length - 1

describe('renderBoardSvg', () => {
  it('draws an empty board with bold subgrid borders', () => {
    const svg = renderBoardSvg(new Board(), { size: 90 })
    expect(svg.startsWith('<svg')).toBe(true)
    expect(svg).toContain('viewBox="0 0 90 90"')
    expect(count(svg, '<line')).toBe(20)
    expect(count(svg, 'stroke-width="2"')).toBe(8)
    expect(count(svg, 'stroke-width="0.5"')).toBe(12)
    expect(svg).not.toContain('data-forced')
    expect(svg).not.toContain('data-cell')
  })

  it('draws one glyph per mark in the player colour', () => {
    const { board } = replayMoves([40, 30])
    const svg = renderBoardSvg(board, { size: 90 })
    expect(count(svg, 'data-player="1"')).toBe(1)
    expect(count(svg, 'data-player="2"')).toBe(1)
    expect(svg).toContain('data-cell="40"')
    expect(svg).toContain('data-cell="30"')
    expect(count(svg, 'stroke="blue"')).toBe(1)
    expect(count(svg, 'stroke="red"')).toBe(1)
  })

  it('highlights the forced subgrid', () => {
    const { board } = replayMoves([40, 30])
    expect(renderBoardSvg(board)).toContain('data-forced="0"')
  })

  it('tints won subgrids', () => {
    const board = new Board()
    board.setSubgrid(8, [[2, 0, 0], [0, 2, 0], [0, 0, 2]])
    const svg = renderBoardSvg(board)
    expect(count(svg, 'data-won="2"')).toBe(1)
    expect(count(svg, 'data-player="2"')).toBe(3)
  })
})
