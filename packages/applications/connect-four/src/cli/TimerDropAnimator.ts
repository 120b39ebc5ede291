/**
 * @fileoverview Drop animation driven by timers instead of sprites.
 */

import type { DropAnimator } from '../game/DropAnimator.js';
import type { PlayerMove } from '../game/types.js';
import { BOARD_ROWS } from '../shared/constants.js';

/**
 * Settles a move after it "fell" from above the board to its row.
 */
export class TimerDropAnimator implements DropAnimator {
  private readonly timers = new Set<NodeJS.Timeout>();

  constructor(private readonly msPerRow: number) {}

  /** Milliseconds a piece takes to reach its row */
  durationFor(move: PlayerMove): number {
    return this.msPerRow * (BOARD_ROWS - move.row);
  }

  start(move: PlayerMove, settle: () => void): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      settle();
    }, this.durationFor(move));
    this.timers.add(timer);
  }

  /** Pieces still falling */
  get activeCount(): number {
    return this.timers.size;
  }

  /**
   * Cancel pending drops without settling them.
   */
  dispose(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
