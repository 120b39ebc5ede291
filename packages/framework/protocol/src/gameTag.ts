/**
 * @fileoverview Game tag derivation and match-scoped relay filters.
 */

import type { Filter } from 'nostr-tools';
import type { GameTag, PublicKey } from './types.js';

/**
 * Event kind carrying game protocol messages.
 */
export const GAME_EVENT_KIND = 4444;

/**
 * Name of the event tag holding the game tag.
 */
export const GAME_TAG_NAME = 't';

/**
 * Derive the tag shared by every participant of a match.
 * @param appDomain - Application domain, e.g. "relay-four.app"
 * @param sessionPath - Session path, e.g. the path segment of a share link
 */
export function createGameTag(appDomain: string, sessionPath: string): GameTag {
  return `${appDomain} game_id=${sessionPath}`;
}

/**
 * Build a filter selecting all protocol events of one match.
 */
export function createGameFilter(
  gameTag: GameTag,
  options: { kind?: number; author?: PublicKey; since?: number } = {}
): Filter {
  const filter: Filter = {
    kinds: [options.kind ?? GAME_EVENT_KIND],
    '#t': [gameTag],
  };
  if (options.author !== undefined) {
    filter.authors = [options.author];
  }
  if (options.since !== undefined) {
    filter.since = options.since;
  }
  return filter;
}

/**
 * Current time as a relay timestamp (seconds).
 */
export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
