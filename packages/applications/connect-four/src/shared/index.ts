/**
 * @fileoverview Connect Four shared exports.
 * Re-exports protocol and constants for the connect-four game.
 */

// Constants
export { ANONYMOUS_NAME, BOARD_COLUMNS, BOARD_ROWS, WIN_LENGTH } from './constants.js';
// Outbound queue
export { sendMessage } from './outbound.js';
// Protocol
export {
  AnnounceJoinMessage,
  AnnounceNewGameMessage,
  type DecodeResult,
  decodeMessage,
  encodeMessage,
  isMatchmakingMessage,
  isPeerAnnouncement,
  type MatchmakingMessage,
  MoveInputMessage,
  type Players,
  PlayersSchema,
  ProtocolMessage,
  ResetSessionMessage,
} from './protocol.js';
