import type { CellValue, GridPosition, Player, SubgridStatus } from './types';
import {
    CELL_ONE,
    CELL_TWO,
    GRID_LINES,
    GRID_SIZE,
    PLAYERS,
    SUBGRID_SIZE,
    WIN_PATTERNS,
} from './constants';

// Flat index -> row/col for a square grid of the given side (9 for the board, 3 inside a subgrid)
export const indexToPosition = (index: number, size: number): GridPosition => ({
    row: Math.floor(index / size),
    col: index % size,
});

export const positionToIndex = (row: number, col: number): number => row * GRID_SIZE + col;

export const isInRange = (value: number, size: number): boolean =>
    Number.isInteger(value) && value >= 0 && value < size;

export const isPlayer = (value: unknown): value is Player =>
    value === CELL_ONE || value === CELL_TWO;

export const isCellValue = (value: unknown): value is CellValue =>
    value === 0 || isPlayer(value);

// Which 3x3 region a cell falls in
export const subgridOf = (row: number, col: number): number =>
    Math.floor(row / SUBGRID_SIZE) * SUBGRID_SIZE + Math.floor(col / SUBGRID_SIZE);

// Position of a cell inside its own region; also the region the next player is sent to
export const localIndexOf = (row: number, col: number): number =>
    (row % SUBGRID_SIZE) * SUBGRID_SIZE + (col % SUBGRID_SIZE);

export const globalIndexInSubgrid = (subgrid: number, local: number): number => {
    const origin = indexToPosition(subgrid, SUBGRID_SIZE);
    const offset = indexToPosition(local, SUBGRID_SIZE);
    return positionToIndex(origin.row * SUBGRID_SIZE + offset.row, origin.col * SUBGRID_SIZE + offset.col);
};

export const subgridCellIndices = (subgrid: number): number[] =>
    Array.from({ length: 9 }, (_, local) => globalIndexInSubgrid(subgrid, local));

// Players are tried in order; for each player lines are tried in order.
export const findLineWinner = (
    values: readonly (number | null)[],
    lines: readonly (readonly number[])[],
    players: readonly Player[] = PLAYERS,
): Player | null => {
    for (const player of players) {
        for (const line of lines) {
            if (line.every(idx => values[idx] === player)) return player;
        }
    }
    return null;
};

export const checkSubgridWinner = (cells: readonly CellValue[], subgrid: number): Player | null => {
    const region = subgridCellIndices(subgrid).map(idx => cells[idx]);
    return findLineWinner(region, WIN_PATTERNS);
};

export const isSubgridFull = (cells: readonly CellValue[], subgrid: number): boolean =>
    subgridCellIndices(subgrid).every(idx => cells[idx] !== 0);

// Overall win on raw cell values: a whole row, column or diagonal of the 9x9 grid
export const hasCellLine = (cells: readonly CellValue[], player: Player): boolean =>
    findLineWinner(cells, GRID_LINES, [player]) !== null;

// Overall win on subgrid outcomes: three won regions in a line of the meta grid
export const hasSubgridLine = (statuses: readonly SubgridStatus[], player: Player): boolean =>
    findLineWinner(statuses, WIN_PATTERNS, [player]) !== null;
