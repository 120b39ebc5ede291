/**
 * @fileoverview Connect Four over Nostr relays.
 *
 * Two players drop pieces into a seven column board. There is no game
 * server: both clients publish signed events tagged with the match's game
 * tag and replay each other's moves. This package contains:
 * - The wire protocol (matchmaking, moves, reset)
 * - Board, win detection and move synchronization
 * - The per-tick game session and matchmaking
 * - A terminal client
 */

export const APP_ID = 'connect-four';
export const APP_NAME = 'Connect Four';
export const APP_VERSION = '1.0.0';

export { type Command, COMMAND_HELP, parseCommand } from './cli/commands.js';
export { playersLine, renderBoard, statusLine } from './cli/renderBoard.js';
export { TimerDropAnimator } from './cli/TimerDropAnimator.js';
export {
  type AppConfig,
  clearConfigCache,
  loadAppConfig,
  parseAppConfig,
} from './config/appConfig.js';
export * from './game/index.js';
export * from './session/index.js';
export * from './shared/index.js';
