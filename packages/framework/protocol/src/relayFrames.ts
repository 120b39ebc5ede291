/**
 * @fileoverview Relay wire frames (NIP-01).
 * Uses Zod for runtime validation of frames received from relays.
 */

import type { Event, Filter } from 'nostr-tools';
import { z } from 'zod';

// ============ Shared Schemas ============

/**
 * Schema for a signed event as delivered by a relay.
 * Signature validity is checked separately by the transport.
 */
export const SignedEventSchema = z.object({
  id: z.string(),
  pubkey: z.string(),
  created_at: z.number().int(),
  kind: z.number().int(),
  tags: z.array(z.array(z.string())),
  content: z.string(),
  sig: z.string(),
});

export type SignedEvent = z.infer<typeof SignedEventSchema>;

// ============ Relay -> Client Frames ============

/**
 * Event matching one of our subscriptions.
 */
export const EventFrame = z.tuple([z.literal('EVENT'), z.string(), SignedEventSchema]);

/**
 * End of stored events for a subscription.
 */
export const EoseFrame = z.tuple([z.literal('EOSE'), z.string()]);

/**
 * Acceptance or refusal of a published event.
 */
export const OkFrame = z.tuple([z.literal('OK'), z.string(), z.boolean(), z.string()]);

/**
 * Human readable relay notice.
 */
export const NoticeFrame = z.tuple([z.literal('NOTICE'), z.string()]);

/**
 * Subscription closed by the relay.
 */
export const ClosedFrame = z.tuple([z.literal('CLOSED'), z.string(), z.string()]);

/**
 * Union of all frames a relay may send.
 */
export const RelayFrame = z.union([EventFrame, EoseFrame, OkFrame, NoticeFrame, ClosedFrame]);

export type RelayFrame = z.infer<typeof RelayFrame>;

// ============ Client -> Relay Frames ============

export type ClientFrame =
  | readonly ['EVENT', Event]
  | readonly ['REQ', string, Filter]
  | readonly ['CLOSE', string];

// ============ Utility Functions ============

/**
 * Parse and validate a frame received from a relay.
 * @param data - Raw text frame
 * @returns Validated RelayFrame or null if invalid
 */
export function parseRelayFrame(data: string): RelayFrame | null {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return null;
  }
  const result = RelayFrame.safeParse(raw);
  return result.success ? result.data : null;
}

/**
 * Serialize a client frame to JSON string.
 */
export function serializeClientFrame(frame: ClientFrame): string {
  return JSON.stringify(frame);
}
