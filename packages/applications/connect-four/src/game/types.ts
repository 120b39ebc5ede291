/**
 * @fileoverview Connect Four game types.
 */

import type { ParticipantNumber } from '@relay-four/framework-protocol';

/**
 * A dropped piece. Row is the number of pieces already in the column
 * when the move was created and never changes afterwards.
 */
export interface PlayerMove {
  readonly player: ParticipantNumber;
  /** 0..6, left to right */
  readonly column: number;
  /** 0..5, bottom to top */
  readonly row: number;
}

/**
 * Direction a line is counted in. Each axis is scanned both ways.
 */
export type Axis = 'horizontal' | 'vertical' | 'diagonal_up' | 'diagonal_down';

/**
 * Where a session stands, as seen by the local player.
 * - awaiting_opponent: no opponent bound yet
 * - settling: a dropped piece has not landed yet
 * - rejected: the match belongs to two other identities
 */
export type SessionPhase = 'awaiting_opponent' | 'in_progress' | 'settling' | 'won' | 'rejected';
