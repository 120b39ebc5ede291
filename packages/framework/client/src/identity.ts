/**
 * @fileoverview Participant identity: a keypair whose public key is the address.
 */

import type { GameTag, PublicKey, SignedEvent } from '@relay-four/framework-protocol';
import { GAME_TAG_NAME, nowInSeconds } from '@relay-four/framework-protocol';
import { finalizeEvent, generateSecretKey, getPublicKey } from 'nostr-tools/pure';

const SECRET_KEY_PATTERN = /^[0-9a-f]{64}$/i;

export interface Identity {
  readonly publicKey: PublicKey;
  readonly secretKey: Uint8Array;
}

/**
 * Create an identity from an existing secret key, or a fresh one.
 */
export function createIdentity(secretKey: Uint8Array = generateSecretKey()): Identity {
  return { publicKey: getPublicKey(secretKey), secretKey };
}

/**
 * Parse a hex-encoded secret key.
 * @returns the key bytes, or null when the text is not 64 hex characters
 */
export function parseSecretKey(hex: string): Uint8Array | null {
  const trimmed = hex.trim();
  if (!SECRET_KEY_PATTERN.test(trimmed)) {
    return null;
  }
  return Uint8Array.from(Buffer.from(trimmed, 'hex'));
}

/**
 * Hex encoding of the identity's secret key, for persisting it.
 */
export function exportSecretKey(identity: Identity): string {
  return Buffer.from(identity.secretKey).toString('hex');
}

/**
 * Sign a protocol payload as an event of the given kind, tagged with the game tag.
 */
export function signPayload(
  identity: Identity,
  payload: { kind: number; gameTag: GameTag; content: string; createdAt?: number }
): SignedEvent {
  return finalizeEvent(
    {
      kind: payload.kind,
      tags: [[GAME_TAG_NAME, payload.gameTag]],
      content: payload.content,
      created_at: payload.createdAt ?? nowInSeconds(),
    },
    identity.secretKey
  );
}
