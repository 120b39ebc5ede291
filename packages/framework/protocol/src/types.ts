/**
 * @fileoverview Core types shared by the relay transport and the session layer.
 */

/**
 * Hex-encoded public key of a participant. Doubles as the participant address.
 */
export type PublicKey = string;

/**
 * Participant number (1 or 2). Player 1 moves first.
 */
export type ParticipantNumber = 1 | 2;

/**
 * Role of the local participant within one match.
 * - unassigned: matchmaking has not decided yet
 * - rejected: the match belongs to two other identities
 */
export type SessionRole = 'unassigned' | 'player1' | 'player2' | 'rejected';

/**
 * Label scoping all protocol traffic to one match.
 */
export type GameTag = string;

/**
 * Content of a verified relay event, stripped to what the session needs.
 */
export interface RelayEnvelope {
  readonly id: string;
  readonly author: PublicKey;
  readonly content: string;
  /** Unix timestamp in seconds */
  readonly createdAt: number;
}

/**
 * Items flowing from the network task to the frame loop.
 */
export type InboundItem =
  | { readonly type: 'backlog'; readonly events: readonly RelayEnvelope[] }
  | { readonly type: 'event'; readonly event: RelayEnvelope }
  | { readonly type: 'transport_error'; readonly message: string };

/**
 * Map a role to the participant number it plays, if any.
 */
export function participantNumberOf(role: SessionRole): ParticipantNumber | null {
  switch (role) {
    case 'player1':
      return 1;
    case 'player2':
      return 2;
    default:
      return null;
  }
}

/**
 * The other participant number.
 */
export function opponentOf(participant: ParticipantNumber): ParticipantNumber {
  return participant === 1 ? 2 : 1;
}
