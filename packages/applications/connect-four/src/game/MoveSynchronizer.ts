/**
 * @fileoverview Validates and applies local and remote moves.
 *
 * Handles:
 * - Local drops (validated, applied, published)
 * - Remote drops (validated against the author's seat, applied, not republished)
 * - Settling a drop once its animation completes (win check, turn flip)
 * - Session reset from either side
 *
 * Rejected moves change nothing and are never reported to the peer.
 */

import { type ChannelSender, logger } from '@relay-four/framework-client';
import {
  type ParticipantNumber,
  ProtocolViolation,
  type ViolationReason,
} from '@relay-four/framework-protocol';
import { sendMessage } from '../shared/outbound.js';
import { Board } from './Board.js';
import type { DropAnimator } from './DropAnimator.js';
import type { PlayerMove, SessionPhase } from './types.js';

/**
 * Outcome of a move attempt.
 */
export type MoveResult =
  | { readonly ok: true; readonly move: PlayerMove }
  | { readonly ok: false; readonly violation: ProtocolViolation };

export interface MoveSynchronizerConfig {
  readonly outbound: ChannelSender<string>;
  readonly animator: DropAnimator;
  /** Called after a move settled and the board changed */
  readonly onSettled?: (board: Board) => void;
}

export class MoveSynchronizer {
  private _board = Board.create();
  private pending: PlayerMove | null = null;
  private _localPlayer: ParticipantNumber | null = null;

  constructor(private readonly config: MoveSynchronizerConfig) {}

  // ============ Getters ============

  get board(): Board {
    return this._board;
  }

  /** Seat of the local player, once an opponent is bound */
  get localPlayer(): ParticipantNumber | null {
    return this._localPlayer;
  }

  get phase(): Exclude<SessionPhase, 'rejected'> {
    if (this._localPlayer === null) return 'awaiting_opponent';
    if (this._board.winner !== null) return 'won';
    if (this._board.inProgress) return 'settling';
    return 'in_progress';
  }

  /**
   * Bind the local seat. Moves are refused until this happens.
   */
  bindSeat(localPlayer: ParticipantNumber): void {
    this._localPlayer = localPlayer;
  }

  // ============ Moves ============

  /**
   * Drop a piece for the local player and publish it.
   */
  submitLocalMove(column: number): MoveResult {
    if (this._localPlayer === null) return this.reject('awaiting_opponent', column);
    if (this._board.playerTurn !== this._localPlayer && this._board.winner === null) {
      return this.reject('out_of_turn', column);
    }

    const result = this.apply(column);
    if (result.ok) {
      sendMessage(this.config.outbound, { type: 'move_input', column });
    }
    return result;
  }

  /**
   * Apply a drop received from a relay.
   * @param author - Seat of the event author, or null when the author is neither player
   */
  receiveRemoteMove(column: number, author: ParticipantNumber | null): MoveResult {
    if (this._localPlayer === null) return this.reject('awaiting_opponent', column);
    if (author === null) return this.reject('unknown_author', column);
    if (this._board.playerTurn !== author && this._board.winner === null) {
      return this.reject('out_of_turn', column);
    }
    return this.apply(column);
  }

  /**
   * Land a dropped piece. Moves that are no longer pending are ignored.
   * @returns whether the board changed
   */
  onMoveSettled(move: PlayerMove): boolean {
    if (this.pending !== move) {
      logger.debug('Ignoring settle of a stale move', { column: move.column, row: move.row });
      return false;
    }

    this.pending = null;
    this._board = this._board.settle(move);
    if (this._board.winner !== null) {
      logger.info('Game won', { winner: this._board.winner });
    }
    this.config.onSettled?.(this._board);
    return true;
  }

  // ============ Reset ============

  /**
   * Clear the board locally and ask the peer to do the same.
   */
  requestReplay(): void {
    this.clear();
    sendMessage(this.config.outbound, { type: 'reset_session' });
  }

  /**
   * Clear the board on the peer's request.
   */
  receiveReset(): void {
    this.clear();
  }

  // ============ Private Methods ============

  private apply(column: number): MoveResult {
    const dropped = this._board.drop(column);
    if (!dropped.ok) {
      return this.reject(dropped.reason, column);
    }

    this._board = dropped.board;
    this.pending = dropped.move;
    const move = dropped.move;
    this.config.animator.start(move, () => {
      this.onMoveSettled(move);
    });
    return { ok: true, move };
  }

  private clear(): void {
    this._board = this._board.reset();
    this.pending = null;
    logger.info('Board reset');
  }

  private reject(reason: ViolationReason, column: number): MoveResult {
    logger.debug('Move rejected', { reason, column });
    return { ok: false, violation: new ProtocolViolation(reason) };
  }
}
