/**
 * @fileoverview Per-player settings read from a key-value store.
 *
 * The store itself is provided by the host (browser storage, environment,
 * a file). Settings are read once when a session starts; missing entries
 * fall back to empty defaults.
 */

import { createIdentity, type Identity, parseSecretKey } from './identity.js';
import { logger } from './utils/logger.js';

/**
 * Minimal key-value store interface.
 */
export interface SettingsStore {
  getItem(key: string): string | null;
}

/**
 * Keys read from the settings store.
 */
export const SETTINGS_KEYS = {
  username: 'username',
  relays: 'Relays',
  secretKey: 'secretKey',
} as const;

export interface SessionSettings {
  /** Display name announced to the opponent */
  readonly username: string | null;
  /** Relay URLs to connect to */
  readonly relays: readonly string[];
}

/**
 * Split a comma-separated relay list, dropping blanks.
 */
export function parseRelayList(value: string | null): string[] {
  if (value === null) {
    return [];
  }
  return value
    .split(',')
    .map((url) => url.trim())
    .filter((url) => url.length > 0);
}

/**
 * Read username and relay list from the store.
 */
export function readSessionSettings(store: SettingsStore): SessionSettings {
  const rawName = store.getItem(SETTINGS_KEYS.username);
  const username = rawName !== null && rawName.trim().length > 0 ? rawName.trim() : null;
  const relays = parseRelayList(store.getItem(SETTINGS_KEYS.relays));

  if (username) {
    logger.info('Username found in settings', { username });
  } else {
    logger.info('No username found in settings');
  }
  logger.info('Relays found in settings', { count: relays.length });

  return { username, relays };
}

/**
 * Load the identity stored under `secretKey`, or create an ephemeral one.
 */
export function loadIdentity(store: SettingsStore): Identity {
  const stored = store.getItem(SETTINGS_KEYS.secretKey);
  if (stored !== null) {
    const secretKey = parseSecretKey(stored);
    if (secretKey) {
      return createIdentity(secretKey);
    }
    logger.warn('Ignoring malformed secret key in settings');
  }

  const identity = createIdentity();
  logger.info('Using an ephemeral identity', { publicKey: identity.publicKey });
  return identity;
}

/**
 * Settings store backed by an in-memory map.
 */
export class MemorySettingsStore implements SettingsStore {
  private readonly entries: Map<string, string>;

  constructor(entries: Record<string, string> = {}) {
    this.entries = new Map(Object.entries(entries));
  }

  getItem(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.entries.set(key, value);
  }
}

/**
 * Environment variables consulted by EnvSettingsStore, per settings key.
 */
export const SETTINGS_ENV_VARS: Readonly<Record<string, string>> = {
  [SETTINGS_KEYS.username]: 'RELAY_FOUR_USERNAME',
  [SETTINGS_KEYS.relays]: 'RELAY_FOUR_RELAYS',
  [SETTINGS_KEYS.secretKey]: 'RELAY_FOUR_SECRET_KEY',
};

/**
 * Settings store reading from environment variables.
 */
export class EnvSettingsStore implements SettingsStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getItem(key: string): string | null {
    const variable = SETTINGS_ENV_VARS[key];
    if (variable === undefined) {
      return null;
    }
    return this.env[variable] ?? null;
  }
}
