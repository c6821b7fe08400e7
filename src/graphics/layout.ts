import type { Rect } from '../game/types';
import { GRID_SIZE, SUBGRID_SIZE } from '../game/constants';
import { indexToPosition } from '../game/logic';

export interface GridLine {
    x1: number;
    y1: number;
    x2: number;
    y2: number;
    major: boolean;
}

// Pixel box of one of the 81 cells on a square board of side `size`
export const getCellRect = (index: number, size: number): Rect => {
    const cell = size / GRID_SIZE;
    const { row, col } = indexToPosition(index, GRID_SIZE);
    return { x: col * cell, y: row * cell, w: cell, h: cell };
};

export const getSubgridRect = (subgrid: number, size: number): Rect => {
    const block = size / SUBGRID_SIZE;
    const { row, col } = indexToPosition(subgrid, SUBGRID_SIZE);
    return { x: col * block, y: row * block, w: block, h: block };
};

// Shrinks a rect evenly on every side by `fraction` of its width
export const insetRect = (rect: Rect, fraction: number): Rect => {
    const d = rect.w * fraction;
    return { x: rect.x + d, y: rect.y + d, w: rect.w - 2 * d, h: rect.h - 2 * d };
};

// Ten horizontal then ten vertical lines; every third one bounds a subgrid.
export const getGridLines = (size: number): GridLine[] => {
    const cell = size / GRID_SIZE;
    const lines: GridLine[] = [];
    for (let i = 0; i <= GRID_SIZE; i++) {
        lines.push({ x1: 0, y1: i * cell, x2: size, y2: i * cell, major: i % SUBGRID_SIZE === 0 });
    }
    for (let i = 0; i <= GRID_SIZE; i++) {
        lines.push({ x1: i * cell, y1: 0, x2: i * cell, y2: size, major: i % SUBGRID_SIZE === 0 });
    }
    return lines;
};
