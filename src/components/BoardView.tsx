import { X, Circle } from 'lucide-react';
import type { CellValue, NextConstraint, SubgridStatus } from '../game/types';
import { CELL_ONE } from '../game/constants';
import { getCellRect, getGridLines, getSubgridRect, insetRect } from '../graphics/layout';
import { COLORS, DEFAULT_BOARD_PX, GLYPH_INSET, MAJOR_STROKE, MINOR_STROKE, type BoardColors } from '../graphics/constants';

export interface BoardViewProps {
    cells: readonly CellValue[];
    subgridStatus: readonly SubgridStatus[];
    constraint: NextConstraint;
    size?: number;
    colors?: BoardColors;
}

export const BoardView = ({
    cells,
    subgridStatus,
    constraint,
    size = DEFAULT_BOARD_PX,
    colors = COLORS,
}: BoardViewProps) => {
    const forcedSubgrid = constraint.type === 'forced' ? constraint.subgrid : null;
    const forced = forcedSubgrid === null ? null : getSubgridRect(forcedSubgrid, size);

    return (
        <svg
            xmlns="http://www.w3.org/2000/svg"
            width={size}
            height={size}
            viewBox={`0 0 ${size} ${size}`}
            role="img"
            aria-label="Ultimate Tic-Tac-Toe board"
        >
            <rect x={0} y={0} width={size} height={size} fill={colors.background} />

            {/* Where the next mark must go */}
            {forced && (
                <rect data-forced={forcedSubgrid ?? undefined}
                    x={forced.x} y={forced.y} width={forced.w} height={forced.h} fill={colors.forced} />
            )}

            {/* Won subgrids */}
            {subgridStatus.map((status, i) => {
                if (status === null) return null;
                const r = getSubgridRect(i, size);
                return (
                    <rect key={`won-${i}`} data-won={status}
                        x={r.x} y={r.y} width={r.w} height={r.h}
                        fill={status === CELL_ONE ? colors.one : colors.two} fillOpacity={0.15} />
                );
            })}

            {/* Marks */}
            {cells.map((cell, i) => {
                if (cell === 0) return null;
                const r = insetRect(getCellRect(i, size), GLYPH_INSET);
                const Glyph = cell === CELL_ONE ? X : Circle;
                return (
                    <g key={`cell-${i}`} data-cell={i} data-player={cell}>
                        <Glyph x={r.x} y={r.y} size={r.w} color={cell === CELL_ONE ? colors.one : colors.two} strokeWidth={3} />
                    </g>
                );
            })}

            {/* Grid, bold around each subgrid */}
            {getGridLines(size).map((line, i) => (
                <line key={`line-${i}`} x1={line.x1} y1={line.y1} x2={line.x2} y2={line.y2}
                    stroke={colors.line} strokeWidth={line.major ? MAJOR_STROKE : MINOR_STROKE} />
            ))}
        </svg>
    );
};
