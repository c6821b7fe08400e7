import { describe, it, expect } from 'vitest';
import {
    checkSubgridWinner,
    findLineWinner,
    globalIndexInSubgrid,
    hasCellLine,
    hasSubgridLine,
    indexToPosition,
    isPlayer,
    isSubgridFull,
    localIndexOf,
    positionToIndex,
    subgridCellIndices,
    subgridOf,
} from './logic';
import { GRID_LINES, WIN_PATTERNS } from './constants';
import type { CellValue, SubgridStatus } from './types';

const emptyCells = (): CellValue[] => Array<CellValue>(81).fill(0);

describe('coordinates', () => {
    it('converts flat indices for both grid sizes', () => {
        expect(indexToPosition(40, 9)).toEqual({ row: 4, col: 4 });
        expect(indexToPosition(80, 9)).toEqual({ row: 8, col: 8 });
        expect(indexToPosition(5, 3)).toEqual({ row: 1, col: 2 });
        expect(positionToIndex(7, 2)).toBe(65);
    });

    it('locates subgrids and local positions', () => {
        expect(subgridOf(0, 0)).toBe(0);
        expect(subgridOf(4, 7)).toBe(5);
        expect(subgridOf(8, 3)).toBe(7);
        expect(localIndexOf(4, 7)).toBe(4);
        expect(localIndexOf(8, 3)).toBe(6);
    });

    it('lists subgrid cells row by row', () => {
        expect(subgridCellIndices(0)).toEqual([0, 1, 2, 9, 10, 11, 18, 19, 20]);
        expect(subgridCellIndices(5)).toEqual([33, 34, 35, 42, 43, 44, 51, 52, 53]);
        expect(globalIndexInSubgrid(8, 8)).toBe(80);
        expect(globalIndexInSubgrid(2, 3)).toBe(15);
    });

    it('recognises the two player values only', () => {
        expect(isPlayer(1)).toBe(true);
        expect(isPlayer(2)).toBe(true);
        expect(isPlayer(0)).toBe(false);
        expect(isPlayer(3)).toBe(false);
        expect(isPlayer('1')).toBe(false);
    });
});

describe('lines', () => {
    it('has 8 subgrid patterns and 20 grid lines', () => {
        expect(WIN_PATTERNS).toHaveLength(8);
        expect(GRID_LINES).toHaveLength(20);
        expect(GRID_LINES[9]).toEqual([0, 9, 18, 27, 36, 45, 54, 63, 72]);
        expect(GRID_LINES[18]).toEqual([0, 10, 20, 30, 40, 50, 60, 70, 80]);
        expect(GRID_LINES[19]).toEqual([8, 16, 24, 32, 40, 48, 56, 64, 72]);
    });

    it('tries every line for the first player before the second', () => {
        expect(findLineWinner([2, 1, 2, 1, 2, 1, 1, 2, 1], WIN_PATTERNS)).toBeNull();
        expect(findLineWinner([2, 2, 2, 1, 1, 1, 0, 0, 0], WIN_PATTERNS)).toBe(1);
        expect(findLineWinner([2, 2, 2, 1, 1, 1, 0, 0, 0], WIN_PATTERNS, [2])).toBe(2);
    });

    it('checks a subgrid on its own cells', () => {
        const cells = emptyCells();
        for (const idx of [33, 43, 53]) cells[idx] = 2;
        expect(checkSubgridWinner(cells, 5)).toBe(2);
        expect(checkSubgridWinner(cells, 4)).toBeNull();
    });

    it('reports fullness per subgrid', () => {
        const cells = emptyCells();
        for (const idx of subgridCellIndices(6)) cells[idx] = 1;
        expect(isSubgridFull(cells, 6)).toBe(true);
        cells[subgridCellIndices(6)[4]] = 0;
        expect(isSubgridFull(cells, 6)).toBe(false);
    });

    it('finds a nine-cell line for one player only', () => {
        const cells = emptyCells();
        for (let row = 0; row < 9; row++) cells[row * 9 + (8 - row)] = 2;
        expect(hasCellLine(cells, 2)).toBe(true);
        expect(hasCellLine(cells, 1)).toBe(false);
    });

    it('finds a line of won subgrids', () => {
        const statuses: SubgridStatus[] = [null, 1, null, 2, 1, null, null, 1, 2];
        expect(hasSubgridLine(statuses, 1)).toBe(true);
        expect(hasSubgridLine(statuses, 2)).toBe(false);
    });
});
