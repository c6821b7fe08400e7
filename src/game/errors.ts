export type MoveErrorCode =
  | 'OutOfRange'
  | 'InvalidPlayer'
  | 'CellOccupiedOrWrongSubgrid'
  | 'InvalidSubgridShape'

// Thrown by every mutating Board operation. The board is untouched when one is raised.
export class MoveError extends Error {
  readonly code: MoveErrorCode

  constructor (code: MoveErrorCode, message: string) {
    super(message)
    this.name = 'MoveError'
    this.code = code
  }
}

export const isMoveError = (err: unknown): err is MoveError => err instanceof MoveError
