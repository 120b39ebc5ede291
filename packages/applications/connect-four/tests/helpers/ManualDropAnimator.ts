/**
 * @fileoverview Drop animator settled by the test instead of a clock.
 */

import type { DropAnimator } from '../../src/game/DropAnimator.js';
import type { PlayerMove } from '../../src/game/types.js';

interface Falling {
  readonly move: PlayerMove;
  readonly settle: () => void;
}

export class ManualDropAnimator implements DropAnimator {
  private readonly falling: Falling[] = [];
  readonly started: PlayerMove[] = [];

  start(move: PlayerMove, settle: () => void): void {
    this.started.push(move);
    this.falling.push({ move, settle });
  }

  /** Pieces started but not settled */
  get pendingCount(): number {
    return this.falling.length;
  }

  /**
   * Settle the oldest falling piece.
   * @returns the settled move
   */
  settleNext(): PlayerMove {
    const next = this.falling.shift();
    if (!next) throw new Error('No piece is falling');
    next.settle();
    return next.move;
  }

  /** Settle every falling piece, oldest first */
  settleAll(): void {
    while (this.falling.length > 0) {
      this.settleNext();
    }
  }
}
