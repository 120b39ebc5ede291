/**
 * @fileoverview Seam to whatever animates a falling piece.
 */

import type { PlayerMove } from './types.js';

/**
 * Animates a dropped piece and reports when it has landed.
 * `settle` must be called exactly once per started move.
 */
export interface DropAnimator {
  start(move: PlayerMove, settle: () => void): void;
}
