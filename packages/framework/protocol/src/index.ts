/**
 * @fileoverview Framework protocol definitions.
 *
 * This package defines what every relay-synchronized two-participant game
 * shares: participant and role types, the game tag scoping a match, relay
 * wire frames and the error taxonomy. Games define their own payload
 * messages on top.
 */

export {
  type GameTag,
  type InboundItem,
  opponentOf,
  type ParticipantNumber,
  participantNumberOf,
  type PublicKey,
  type RelayEnvelope,
  type SessionRole,
} from './types.js';

export {
  createGameFilter,
  createGameTag,
  GAME_EVENT_KIND,
  GAME_TAG_NAME,
  nowInSeconds,
} from './gameTag.js';

export {
  type ClientFrame,
  ClosedFrame,
  EoseFrame,
  EventFrame,
  NoticeFrame,
  OkFrame,
  parseRelayFrame,
  RelayFrame,
  type SignedEvent,
  SignedEventSchema,
  serializeClientFrame,
} from './relayFrames.js';

export {
  ChannelClosedError,
  ProtocolViolation,
  QueueOverflowError,
  SerializationError,
  TransportError,
  type ViolationReason,
} from './errors.js';

/**
 * Framework protocol version.
 */
export const FRAMEWORK_PROTOCOL_VERSION = '1.0.0';
