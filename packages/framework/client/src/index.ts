/**
 * @fileoverview Framework client runtime.
 *
 * This package provides the client runtime for two-participant games
 * synchronized over Nostr relays. It handles:
 * - Relay connections and signed event publication
 * - Backlog fetch and live subscription (NetworkActor)
 * - The bounded queues between network task and frame loop
 * - Identity and settings loading
 */

export {
  BoundedChannel,
  type ChannelReceiver,
  type ChannelSender,
  type SendResult,
} from './channel/BoundedChannel.js';
export {
  type ChannelBridge,
  createChannelBridge,
  DEFAULT_CHANNEL_CAPACITY,
  type NetworkEndpoints,
  type SessionEndpoints,
} from './channel/ChannelBridge.js';
export {
  createIdentity,
  exportSecretKey,
  type Identity,
  parseSecretKey,
  signPayload,
} from './identity.js';
export {
  DEFAULT_BACKLOG_TIMEOUT_MS,
  NetworkActor,
  type NetworkActorConfig,
  toEnvelope,
} from './NetworkActor.js';
export {
  RelayConnection,
  type RelayConnectionOptions,
  type RelayConnectionState,
  type SubscriptionHandlers,
} from './relay/RelayConnection.js';
export { RelayPool, type RelayPoolOptions, sortChronologically } from './relay/RelayPool.js';
export type {
  RelayConnectReport,
  RelaySubscription,
  RelayTransport,
} from './relay/RelayTransport.js';
export {
  createWsSocket,
  type RelaySocket,
  type SocketFactory,
  type SocketHandlers,
} from './relay/socket.js';
export {
  EnvSettingsStore,
  loadIdentity,
  MemorySettingsStore,
  parseRelayList,
  readSessionSettings,
  type SessionSettings,
  SETTINGS_ENV_VARS,
  SETTINGS_KEYS,
  type SettingsStore,
} from './SessionSettings.js';
export { configureLogger, type Logger, type LogLevel, logger } from './utils/logger.js';

/**
 * Framework client version.
 */
export const FRAMEWORK_CLIENT_VERSION = '1.0.0';
