import { writeFile } from 'node:fs/promises'
import { replayMoves } from './game/replay'
import { renderBoardText } from './graphics/text'
import { renderBoardSvg } from './graphics/svg'
import { isMoveError } from './game/errors'

// PlayerOne fills row 4 while PlayerTwo is sent around the board.
const DEMO_MOVES = [
  42, 45, 56, 17, 43, 50, 60, 11, 44, 15, 37, 48, 65, 63, 38, 69, 36, 70, 41, 12, 39, 66, 40,
]

const main = async (args: string[]) => {
  const svgIdx = args.indexOf('--svg')
  const svgPath = svgIdx >= 0 ? args[svgIdx + 1] : undefined
  if (svgIdx >= 0 && !svgPath) {
    throw new Error("Demo Error: '--svg' needs a file path.")
  }

  const { board, nextPlayer } = replayMoves(DEMO_MOVES)

  console.log(`Ultimate Tic-Tac-Toe after ${DEMO_MOVES.length} moves:\n`)
  console.log(renderBoardText(board))
  console.log()

  console.table(
    board.getSubgridStatus().map((status, i) => ({
      Subgrid: i,
      Winner: status ?? '-',
      Full: board.isSubgridFull(i),
    }))
  )

  const winner = board.getWinner()
  const constraint = board.getNextConstraint()
  console.log(`Overall winner: ${winner === null ? 'none' : `Player ${winner}`}`)
  console.log(
    `Player ${nextPlayer} to move in ${constraint.type === 'forced' ? `subgrid ${constraint.subgrid}` : 'any subgrid'}`
  )

  if (svgPath) {
    await writeFile(svgPath, renderBoardSvg(board))
    console.log(`SVG written to ${svgPath}`)
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (isMoveError(err)) console.error(`[${err.code}] ${err.message}`)
  else console.error('Demo failed', err)
  process.exitCode = 1
})
