import type { Player, Position, RulesConfig } from './types';
import { CELL_ONE, CELL_TWO } from './constants';
import { Board } from './engine';
import { MoveError } from './errors';

export const otherPlayer = (player: Player): Player => (player === CELL_ONE ? CELL_TWO : CELL_ONE);

export interface ReplayResult {
    board: Board;
    nextPlayer: Player;
}

// Plays the moves in order on a fresh board, PlayerOne first, alternating.
export const replayMoves = (moves: readonly Position[], rules: Partial<RulesConfig> = {}): ReplayResult => {
    const board = new Board(rules);
    let player: Player = CELL_ONE;

    moves.forEach((move, i) => {
        try {
            board.updateCell(move, player);
        } catch (err) {
            if (err instanceof MoveError) {
                throw new MoveError(err.code, `Move ${i + 1}: ${err.message}`);
            }
            throw err;
        }
        player = otherPlayer(player);
    });

    return { board, nextPlayer: player };
};
