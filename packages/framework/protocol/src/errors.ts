/**
 * @fileoverview Error taxonomy of the synchronization layer.
 *
 * None of these is fatal. Transport errors degrade the session, serialization
 * errors and protocol violations drop the offending message, queue overflows
 * drop the item that did not fit.
 */

/**
 * Connecting to or publishing through a relay failed.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    readonly relayUrl?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * An inbound payload could not be decoded into a protocol message.
 */
export class SerializationError extends Error {
  constructor(
    message: string,
    readonly payload: string
  ) {
    super(message);
    this.name = 'SerializationError';
  }
}

/**
 * Why a move or matchmaking message was refused.
 */
export type ViolationReason =
  | 'awaiting_opponent'
  | 'out_of_turn'
  | 'move_in_progress'
  | 'game_over'
  | 'illegal_column'
  | 'column_full'
  | 'unknown_author'
  | 'already_started'
  | 'session_rejected';

/**
 * A message or local action broke the game rules. Never reported to the peer.
 */
export class ProtocolViolation extends Error {
  constructor(readonly reason: ViolationReason) {
    super(`Protocol violation: ${reason}`);
    this.name = 'ProtocolViolation';
  }
}

/**
 * A bounded queue was full and the item was dropped.
 */
export class QueueOverflowError extends Error {
  constructor(
    readonly channel: string,
    readonly capacity: number
  ) {
    super(`Channel "${channel}" is full (capacity ${capacity}), item dropped`);
    this.name = 'QueueOverflowError';
  }
}

/**
 * A send hit a queue that was closed on shutdown. The item was dropped.
 */
export class ChannelClosedError extends Error {
  constructor(readonly channel: string) {
    super(`Channel "${channel}" is closed, item dropped`);
    this.name = 'ChannelClosedError';
  }
}
