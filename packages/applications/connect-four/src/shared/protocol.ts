/**
 * @fileoverview Connect Four protocol message definitions.
 * Uses Zod for runtime validation of messages received from relays.
 *
 * Every message travels as the content of a signed relay event. There is
 * no server: both players publish and consume the same message set.
 */

import { type RelayEnvelope, SerializationError } from '@relay-four/framework-protocol';
import { z } from 'zod';

// ============ Shared Schemas ============

/**
 * Schema for the pairing of two identities into one match.
 */
export const PlayersSchema = z.object({
  p1Name: z.string().nullable(),
  p2Name: z.string().nullable(),
  p1Identity: z.string(),
  p2Identity: z.string(),
});

export type Players = z.infer<typeof PlayersSchema>;

// ============ Matchmaking Messages ============

/**
 * Sender proposes a new match and waits for an opponent.
 */
export const AnnounceNewGameMessage = z.object({
  type: z.literal('announce_new_game'),
  displayName: z.string().nullable(),
});

/**
 * Sender accepts an announced match, binding both identities.
 */
export const AnnounceJoinMessage = z.object({
  type: z.literal('announce_join'),
  players: PlayersSchema,
});

// ============ Game Messages ============

/**
 * Sender dropped a piece. The column is range-checked by the receiver.
 */
export const MoveInputMessage = z.object({
  type: z.literal('move_input'),
  column: z.number().int(),
});

/**
 * Sender asks both sides to clear the board.
 */
export const ResetSessionMessage = z.object({
  type: z.literal('reset_session'),
});

/**
 * Union of all protocol messages.
 */
export const ProtocolMessage = z.discriminatedUnion('type', [
  AnnounceNewGameMessage,
  AnnounceJoinMessage,
  MoveInputMessage,
  ResetSessionMessage,
]);

export type ProtocolMessage = z.infer<typeof ProtocolMessage>;
export type AnnounceNewGameMessage = z.infer<typeof AnnounceNewGameMessage>;
export type AnnounceJoinMessage = z.infer<typeof AnnounceJoinMessage>;
export type MoveInputMessage = z.infer<typeof MoveInputMessage>;
export type ResetSessionMessage = z.infer<typeof ResetSessionMessage>;

export type MatchmakingMessage = AnnounceNewGameMessage | AnnounceJoinMessage;

// ============ Utility Functions ============

/**
 * Outcome of decoding a relay payload.
 */
export type DecodeResult =
  | { readonly ok: true; readonly message: ProtocolMessage }
  | { readonly ok: false; readonly error: SerializationError };

/**
 * Serialize a protocol message to JSON string.
 */
export function encodeMessage(message: ProtocolMessage): string {
  return JSON.stringify(message);
}

/**
 * Parse and validate a relay payload. Never throws.
 */
export function decodeMessage(text: string): DecodeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new SerializationError(`Invalid JSON: ${reason}`, text) };
  }

  const result = ProtocolMessage.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return {
      ok: false,
      error: new SerializationError(`Unknown message${where}: ${issue?.message ?? 'invalid'}`, text),
    };
  }
  return { ok: true, message: result.data };
}

export function isMatchmakingMessage(message: ProtocolMessage): message is MatchmakingMessage {
  return message.type === 'announce_new_game' || message.type === 'announce_join';
}

/**
 * Whether a relay event announces or accepts a match. The network actor
 * narrows its live subscription to the author of the first such event.
 */
export function isPeerAnnouncement(envelope: RelayEnvelope): boolean {
  const decoded = decodeMessage(envelope.content);
  return decoded.ok && isMatchmakingMessage(decoded.message);
}
