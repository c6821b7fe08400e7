import type {
    CellValue,
    NextConstraint,
    Player,
    Position,
    RulesConfig,
    SubgridStatus,
} from './types';
import { BOARD_SIZE, CELL_EMPTY, DEFAULT_RULES, GRID_SIZE, PLAYERS, SUBGRID_SIZE } from './constants';
import {
    checkSubgridWinner,
    globalIndexInSubgrid,
    hasCellLine,
    hasSubgridLine,
    indexToPosition,
    isCellValue,
    isInRange,
    isPlayer,
    isSubgridFull,
    localIndexOf,
    positionToIndex,
    subgridCellIndices,
    subgridOf,
} from './logic';
import { MoveError } from './errors';

const UNCONSTRAINED: NextConstraint = { type: 'unconstrained' };

const describePosition = (position: Position): string =>
    typeof position === 'number' ? `index ${position}` : `(${position.row}, ${position.col})`;

/**
 * Authoritative Ultimate Tic-Tac-Toe state: the 81 cells, the nine subgrid
 * outcomes, the overall winner and the constraint on the next move.
 *
 * The only transitions are {@link Board.updateCell} (and its subgrid-addressed
 * twin) and the {@link Board.setSubgrid} setup helper. Every one of them
 * validates first and writes second, so a thrown {@link MoveError} leaves the
 * board exactly as it was.
 */
export class Board {
    private readonly rules: RulesConfig;
    private readonly cells: CellValue[] = Array<CellValue>(BOARD_SIZE).fill(CELL_EMPTY);
    private readonly subgridWinners: SubgridStatus[] = Array<SubgridStatus>(9).fill(null);
    private winner: Player | null = null;
    private nextConstraint: NextConstraint = UNCONSTRAINED;

    constructor(rules: Partial<RulesConfig> = {}) {
        this.rules = { ...DEFAULT_RULES, ...rules };
    }

    // --- Legality ---

    public isValidMove(row: number, col: number): boolean {
        if (!isInRange(row, GRID_SIZE) || !isInRange(col, GRID_SIZE)) return false;

        const subgrid = subgridOf(row, col);
        if (this.nextConstraint.type === 'forced' && this.nextConstraint.subgrid !== subgrid) return false;
        if (this.rules.strictSubgridGating && this.subgridWinners[subgrid] !== null) return false;

        return this.cells[positionToIndex(row, col)] === CELL_EMPTY;
    }

    // --- Mutation ---

    public updateCell(position: Position, player: number): void {
        const index = this.resolve(position);
        if (!isPlayer(player)) {
            throw new MoveError('InvalidPlayer', `Cell value must be ${PLAYERS.join(' or ')}, got ${player}.`);
        }

        const { row, col } = indexToPosition(index, GRID_SIZE);
        if (!this.isValidMove(row, col)) {
            throw new MoveError(
                'CellOccupiedOrWrongSubgrid',
                `Invalid move at ${describePosition(position)}: cell is occupied or outside the allowed subgrid.`,
            );
        }

        // 1. Mark
        this.cells[index] = player;

        // 2. Subgrid outcome (first winner stays)
        const subgrid = subgridOf(row, col);
        this.recordSubgridWinner(subgrid);

        // 3. Send the opponent to the matching subgrid
        this.nextConstraint = this.constraintFor(localIndexOf(row, col));

        // 4. Overall outcome for the mover
        this.recordOverallWinner(player);
    }

    public updateCellInSubgrid(subgrid: number, local: number, player: number): void {
        this.requireSubgrid(subgrid);
        if (!isInRange(local, 9)) {
            throw new MoveError('OutOfRange', `Subgrid cell index must be between 0 and 8, got ${local}.`);
        }
        this.updateCell(globalIndexInSubgrid(subgrid, local), player);
    }

    // Bulk setup of one region. Empty entries leave cells alone; the move constraint is not consulted.
    public setSubgrid(subgrid: number, rows: readonly (readonly number[])[]): void {
        this.requireSubgrid(subgrid);
        if (rows.length !== SUBGRID_SIZE || rows.some(r => r.length !== SUBGRID_SIZE)) {
            throw new MoveError('InvalidSubgridShape', 'Subgrid must be exactly 3 rows of 3 cells.');
        }

        const values = rows.flat();
        const targets = subgridCellIndices(subgrid);
        const writes: [number, Player][] = [];

        for (let local = 0; local < values.length; local++) {
            const value = values[local];
            if (!isCellValue(value)) {
                throw new MoveError('InvalidPlayer', `Cell value must be 0, 1 or 2, got ${value}.`);
            }
            if (value === CELL_EMPTY) continue;

            const current = this.cells[targets[local]];
            if (current === value) continue;
            if (current !== CELL_EMPTY) {
                throw new MoveError(
                    'CellOccupiedOrWrongSubgrid',
                    `Cannot overwrite occupied cell ${local} of subgrid ${subgrid}.`,
                );
            }
            writes.push([targets[local], value]);
        }

        for (const [index, value] of writes) this.cells[index] = value;

        this.recordSubgridWinner(subgrid);
        for (const player of PLAYERS) this.recordOverallWinner(player);

        if (this.nextConstraint.type === 'forced' && this.nextConstraint.subgrid === subgrid) {
            this.nextConstraint = this.constraintFor(subgrid);
        }
    }

    // --- Queries ---

    public getCell(position: Position): CellValue {
        return this.cells[this.resolve(position)];
    }

    public getCells(): readonly CellValue[] {
        return this.cells.slice();
    }

    public getSubgrid(subgrid: number): CellValue[][] {
        this.requireSubgrid(subgrid);
        const indices = subgridCellIndices(subgrid);
        return [0, 1, 2].map(r => indices.slice(r * SUBGRID_SIZE, r * SUBGRID_SIZE + SUBGRID_SIZE).map(idx => this.cells[idx]));
    }

    public getSubgridStatus(): readonly SubgridStatus[] {
        return this.subgridWinners.slice();
    }

    public getSubgridWinner(subgrid: number): SubgridStatus {
        this.requireSubgrid(subgrid);
        return this.subgridWinners[subgrid];
    }

    public getWinner(): Player | null {
        return this.winner;
    }

    public getNextConstraint(): NextConstraint {
        return { ...this.nextConstraint };
    }

    public getRules(): RulesConfig {
        return { ...this.rules };
    }

    public isSubgridFull(subgrid: number): boolean {
        this.requireSubgrid(subgrid);
        return isSubgridFull(this.cells, subgrid);
    }

    public legalMoves(): number[] {
        const moves: number[] = [];
        for (let index = 0; index < BOARD_SIZE; index++) {
            const { row, col } = indexToPosition(index, GRID_SIZE);
            if (this.isValidMove(row, col)) moves.push(index);
        }
        return moves;
    }

    // Nobody has won and nobody can move.
    public isStalemate(): boolean {
        return this.winner === null && this.legalMoves().length === 0;
    }

    // --- Internals ---

    private resolve(position: Position): number {
        if (typeof position === 'number') {
            if (!isInRange(position, BOARD_SIZE)) {
                throw new MoveError('OutOfRange', `Index must be between 0 and 80, got ${position}.`);
            }
            return position;
        }
        const { row, col } = position;
        if (!isInRange(row, GRID_SIZE) || !isInRange(col, GRID_SIZE)) {
            throw new MoveError('OutOfRange', `Row and column must be between 0 and 8, got (${row}, ${col}).`);
        }
        return positionToIndex(row, col);
    }

    private requireSubgrid(subgrid: number): void {
        if (!isInRange(subgrid, 9)) {
            throw new MoveError('OutOfRange', `Subgrid index must be between 0 and 8, got ${subgrid}.`);
        }
    }

    private recordSubgridWinner(subgrid: number): void {
        if (this.subgridWinners[subgrid] !== null) return;
        this.subgridWinners[subgrid] = checkSubgridWinner(this.cells, subgrid);
    }

    private constraintFor(target: number): NextConstraint {
        if (isSubgridFull(this.cells, target) || this.subgridWinners[target] !== null) return UNCONSTRAINED;
        return { type: 'forced', subgrid: target };
    }

    private recordOverallWinner(player: Player): void {
        if (this.winner !== null) return;
        const won = this.rules.overallWin === 'subgrids'
            ? hasSubgridLine(this.subgridWinners, player)
            : hasCellLine(this.cells, player);
        if (won) this.winner = player;
    }
}
