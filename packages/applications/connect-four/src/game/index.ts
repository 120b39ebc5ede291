/**
 * @fileoverview Connect Four game logic exports.
 */

export { Board, type DropResult } from './Board.js';
export type { DropAnimator } from './DropAnimator.js';
export {
  MoveSynchronizer,
  type MoveResult,
  type MoveSynchronizerConfig,
} from './MoveSynchronizer.js';
export type { Axis, PlayerMove, SessionPhase } from './types.js';
export { AXES, countLine, hasWinningLine } from './WinDetector.js';
