import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { clearConfigCache, loadAppConfig, parseAppConfig } from '../../src/config/appConfig.js';

const SHIPPED_CONFIG = fileURLToPath(
  new URL('../../../../../config/connect-four.yaml', import.meta.url)
);

const VALID_CONFIG = {
  appDomain: 'relay-four.test',
  eventKind: 4444,
  backlogTimeoutMs: 5000,
  channelCapacity: 100,
  tickIntervalMs: 50,
  dropMsPerRow: 0,
  logLevel: 'debug',
  defaultRelays: ['wss://relay.test'],
};

describe('appConfig', () => {
  afterEach(() => {
    clearConfigCache();
    vi.unstubAllEnvs();
  });

  describe('parseAppConfig', () => {
    it('should accept a complete configuration', () => {
      expect(parseAppConfig(VALID_CONFIG)).toEqual(VALID_CONFIG);
    });

    it('should name the invalid key', () => {
      expect(() => parseAppConfig({ ...VALID_CONFIG, eventKind: -1 })).toThrow(
        /^Invalid app configuration: eventKind: /
      );
    });

    it('should refuse unknown log levels', () => {
      expect(() => parseAppConfig({ ...VALID_CONFIG, logLevel: 'verbose' })).toThrow(
        /^Invalid app configuration: logLevel: /
      );
    });

    it('should refuse relay entries that are not URLs', () => {
      expect(() => parseAppConfig({ ...VALID_CONFIG, defaultRelays: ['nope'] })).toThrow(
        /^Invalid app configuration: defaultRelays\.0: /
      );
    });
  });

  describe('loadAppConfig', () => {
    it('should load the shipped configuration from CONFIG_PATH', () => {
      vi.stubEnv('CONFIG_PATH', SHIPPED_CONFIG);

      const config = loadAppConfig();

      expect(config.appDomain).toBe('relay-four.app');
      expect(config.eventKind).toBe(4444);
      expect(config.backlogTimeoutMs).toBe(10000);
      expect(config.defaultRelays).toEqual(['wss://relay.damus.io', 'wss://nos.lol']);
    });

    it('should cache the loaded configuration', () => {
      vi.stubEnv('CONFIG_PATH', SHIPPED_CONFIG);
      const first = loadAppConfig();

      vi.stubEnv('CONFIG_PATH', '/nonexistent/connect-four.yaml');

      expect(loadAppConfig()).toBe(first);
    });
  });
});
