/**
 * @fileoverview Four-in-a-row detection over a move list.
 * Pure functions; the result depends only on the set of moves.
 */

import { WIN_LENGTH } from '../shared/constants.js';
import type { Axis, PlayerMove } from './types.js';

/** Column and row step of each axis */
const AXIS_STEPS: Readonly<Record<Axis, readonly [number, number]>> = {
  horizontal: [1, 0],
  vertical: [0, 1],
  diagonal_up: [1, 1],
  diagonal_down: [1, -1],
};

export const AXES: readonly Axis[] = ['horizontal', 'vertical', 'diagonal_up', 'diagonal_down'];

function cellKey(column: number, row: number): string {
  return `${column}:${row}`;
}

function indexByCell(moves: readonly PlayerMove[]): Map<string, PlayerMove> {
  const cells = new Map<string, PlayerMove>();
  for (const move of moves) {
    cells.set(cellKey(move.column, move.row), move);
  }
  return cells;
}

function countWith(cells: ReadonlyMap<string, PlayerMove>, move: PlayerMove, axis: Axis): number {
  const [dc, dr] = AXIS_STEPS[axis];
  let count = 1;

  for (const sign of [1, -1]) {
    let column = move.column + dc * sign;
    let row = move.row + dr * sign;
    while (cells.get(cellKey(column, row))?.player === move.player) {
      count++;
      column += dc * sign;
      row += dr * sign;
    }
  }

  return count;
}

/**
 * Length of the contiguous same-player line through a move along one axis,
 * the move itself included.
 */
export function countLine(moves: readonly PlayerMove[], move: PlayerMove, axis: Axis): number {
  return countWith(indexByCell(moves), move, axis);
}

/**
 * Whether any player has four (or more) in a row.
 */
export function hasWinningLine(moves: readonly PlayerMove[]): boolean {
  const cells = indexByCell(moves);
  return moves.some((move) => AXES.some((axis) => countWith(cells, move, axis) >= WIN_LENGTH));
}
