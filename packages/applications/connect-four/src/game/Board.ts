/**
 * @fileoverview Immutable board state - all mutations return a new Board instance.
 *
 * The board only knows the rules of the game. Who is allowed to act
 * (opponent bound, which seat is local) is decided by MoveSynchronizer.
 */

import {
  opponentOf,
  type ParticipantNumber,
  type ViolationReason,
} from '@relay-four/framework-protocol';
import { BOARD_COLUMNS, BOARD_ROWS } from '../shared/constants.js';
import type { PlayerMove } from './types.js';
import { hasWinningLine } from './WinDetector.js';

/**
 * Outcome of a drop attempt.
 */
export type DropResult =
  | { readonly ok: true; readonly board: Board; readonly move: PlayerMove }
  | { readonly ok: false; readonly reason: ViolationReason };

/**
 * Immutable board container.
 * All state-modifying methods return a new Board instance.
 */
export class Board {
  private constructor(
    private readonly _moves: readonly PlayerMove[],
    private readonly _playerTurn: ParticipantNumber,
    private readonly _winner: ParticipantNumber | null,
    private readonly _inProgress: boolean
  ) {}

  // ============ Static Constructors ============

  /**
   * Create an empty board. Player 1 moves first.
   */
  static create(): Board {
    return new Board([], 1, null, false);
  }

  /**
   * Build a settled board by replaying moves in order, starting with player 1.
   * Stops at the first illegal drop. Intended for tests and tools.
   */
  static fromColumns(columns: readonly number[]): Board {
    let board = Board.create();
    for (const column of columns) {
      const created = board.drop(column);
      if (!created.ok) break;
      board = created.board.settle(created.move);
    }
    return board;
  }

  // ============ Getters ============

  /** Moves in the order they were made */
  get moves(): readonly PlayerMove[] {
    return this._moves;
  }

  /** Player whose turn it is */
  get playerTurn(): ParticipantNumber {
    return this._playerTurn;
  }

  get winner(): ParticipantNumber | null {
    return this._winner;
  }

  /** True while a dropped piece has not settled */
  get inProgress(): boolean {
    return this._inProgress;
  }

  /** Number of pieces in a column */
  countInColumn(column: number): number {
    return this._moves.filter((move) => move.column === column).length;
  }

  isColumnFull(column: number): boolean {
    return this.countInColumn(column) >= BOARD_ROWS;
  }

  /** Owner of a cell, or null when empty */
  cellAt(column: number, row: number): ParticipantNumber | null {
    return this._moves.find((move) => move.column === column && move.row === row)?.player ?? null;
  }

  /**
   * Why a drop by the player whose turn it is would be refused, or null.
   */
  checkDrop(column: number): ViolationReason | null {
    if (this._winner !== null) return 'game_over';
    if (this._inProgress) return 'move_in_progress';
    if (!Number.isInteger(column) || column < 0 || column >= BOARD_COLUMNS) {
      return 'illegal_column';
    }
    if (this.isColumnFull(column)) return 'column_full';
    return null;
  }

  // ============ Moves ============

  /**
   * Drop a piece for the player whose turn it is.
   * @returns New board with the move appended and in progress, or the reason it was refused
   */
  drop(column: number): DropResult {
    const reason = this.checkDrop(column);
    if (reason !== null) {
      return { ok: false, reason };
    }

    const move: PlayerMove = {
      player: this._playerTurn,
      column,
      row: this.countInColumn(column),
    };

    return {
      ok: true,
      move,
      board: new Board([...this._moves, move], this._playerTurn, this._winner, true),
    };
  }

  /**
   * Apply the landing of a move: check for a win, otherwise pass the turn.
   * A won board keeps its turn pointer.
   */
  settle(move: PlayerMove): Board {
    if (hasWinningLine(this._moves)) {
      return new Board(this._moves, this._playerTurn, this._winner ?? move.player, false);
    }
    return new Board(this._moves, opponentOf(this._playerTurn), this._winner, false);
  }

  /**
   * Clear moves, winner and in-progress flag; player 1 moves next.
   */
  reset(): Board {
    return Board.create();
  }
}
