/**
 * @fileoverview Background network task of a session.
 *
 * Handles:
 * - Relay connection (failures become notices, never exceptions)
 * - Backlog fetch with a fixed deadline, delivered as one inbound item
 * - Live subscription, narrowed to the opponent once known
 * - Publish loop signing outbound payloads
 *
 * The actor owns no game state. It only touches its two channel endpoints.
 */

import {
  createGameFilter,
  GAME_EVENT_KIND,
  type GameTag,
  type InboundItem,
  nowInSeconds,
  type PublicKey,
  type RelayEnvelope,
  type SignedEvent,
} from '@relay-four/framework-protocol';
import type { Filter } from 'nostr-tools';
import type { NetworkEndpoints } from './channel/ChannelBridge.js';
import { type Identity, signPayload } from './identity.js';
import type { RelaySubscription, RelayTransport } from './relay/RelayTransport.js';
import { logger } from './utils/logger.js';

/**
 * Default deadline for the backlog fetch.
 */
export const DEFAULT_BACKLOG_TIMEOUT_MS = 10_000;

export interface NetworkActorConfig {
  readonly transport: RelayTransport;
  readonly endpoints: NetworkEndpoints;
  readonly identity: Identity;
  readonly gameTag: GameTag;
  readonly eventKind?: number;
  readonly backlogTimeoutMs?: number;
  /**
   * Whether an event from another identity binds its author as the opponent.
   * When it does, the live subscription is narrowed to that author. The
   * message format belongs to the game, so the game supplies this.
   */
  readonly identifiesPeer?: (envelope: RelayEnvelope) => boolean;
}

/**
 * Strip a verified event down to what the session consumes.
 */
export function toEnvelope(event: SignedEvent): RelayEnvelope {
  return {
    id: event.id,
    author: event.pubkey,
    content: event.content,
    createdAt: event.created_at,
  };
}

export class NetworkActor {
  private readonly kind: number;
  private readonly backlogTimeoutMs: number;
  private readonly forwarded = new Set<string>();
  private liveSubscription: RelaySubscription | null = null;
  private narrowedTo: PublicKey | null = null;
  private backlogDelivered = false;
  private readonly heldLive: RelayEnvelope[] = [];
  private publishLoop: Promise<void> | null = null;
  private stopped = false;

  constructor(private readonly config: NetworkActorConfig) {
    this.kind = config.eventKind ?? GAME_EVENT_KIND;
    this.backlogTimeoutMs = config.backlogTimeoutMs ?? DEFAULT_BACKLOG_TIMEOUT_MS;
  }

  /** Author the live subscription is restricted to, once narrowed */
  get peer(): PublicKey | null {
    return this.narrowedTo;
  }

  /**
   * Connect, subscribe, fetch the backlog and start publishing.
   * Resolves once the backlog has been handed to the session; publishing
   * continues in the background until shutdown.
   */
  async run(): Promise<void> {
    const { transport, identity, gameTag } = this.config;
    logger.info('Network actor starting', { publicKey: identity.publicKey, gameTag });

    const report = await transport.connect();
    for (const failure of report.failed) {
      this.notify(`Error connecting to relay ${failure.url}: ${failure.error.message}`);
    }
    if (report.connected.length === 0) {
      this.notify('No relay connected, playing offline');
    }

    this.publishLoop = this.runPublishLoop();

    this.openLiveSubscription(
      createGameFilter(gameTag, { kind: this.kind, since: nowInSeconds() })
    );

    const backlog = await transport.fetchBacklog(
      createGameFilter(gameTag, { kind: this.kind }),
      this.backlogTimeoutMs
    );
    logger.info('Backlog fetched', { events: backlog.length });

    const envelopes = backlog.map(toEnvelope);
    for (const envelope of envelopes) {
      this.forwarded.add(envelope.id);
    }
    this.push({ type: 'backlog', events: envelopes });
    this.backlogDelivered = true;

    // The newest announcement in the backlog is the one matchmaking answers
    const announcement = [...envelopes]
      .reverse()
      .find((envelope) => this.isPeerAnnouncement(envelope));
    if (announcement) {
      this.narrowTo(announcement.author);
    }

    // Live events that raced the backlog fetch follow it, minus duplicates
    for (const envelope of this.heldLive.splice(0)) {
      this.forward(envelope);
    }
  }

  /**
   * Resolves when the publish loop has ended.
   */
  async drained(): Promise<void> {
    await this.publishLoop;
  }

  /**
   * Stop publishing and close the relay connections.
   */
  shutdown(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.liveSubscription?.close();
    this.liveSubscription = null;
    this.config.endpoints.outbound.close();
    this.config.transport.close();
    logger.info('Network actor stopped');
  }

  // ============ Private Methods ============

  private async runPublishLoop(): Promise<void> {
    const { endpoints, identity, gameTag, transport } = this.config;

    for (;;) {
      const content = await endpoints.outbound.receive();
      if (content === undefined) return;

      const event = signPayload(identity, { kind: this.kind, gameTag, content });
      try {
        await transport.publish(event);
        logger.info('Sent event', { id: event.id });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('Error sending message', { error: message });
        this.notify(`Error sending to relays: ${message}`);
      }
    }
  }

  private openLiveSubscription(filter: Filter): void {
    this.liveSubscription?.close();
    this.liveSubscription = this.config.transport.subscribe(filter, (event) =>
      this.handleLiveEvent(event)
    );
  }

  private handleLiveEvent(event: SignedEvent): void {
    if (event.pubkey === this.config.identity.publicKey) return;

    const envelope = toEnvelope(event);
    if (this.backlogDelivered) {
      this.forward(envelope);
    } else {
      this.heldLive.push(envelope);
    }
  }

  private forward(envelope: RelayEnvelope): void {
    if (this.forwarded.has(envelope.id)) return;
    this.forwarded.add(envelope.id);

    logger.debug('Received event', { id: envelope.id, author: envelope.author });
    this.push({ type: 'event', event: envelope });
    if (this.isPeerAnnouncement(envelope)) {
      this.narrowTo(envelope.author);
    }
  }

  private isPeerAnnouncement(envelope: RelayEnvelope): boolean {
    if (envelope.author === this.config.identity.publicKey) return false;
    return this.config.identifiesPeer?.(envelope) ?? false;
  }

  private narrowTo(author: PublicKey): void {
    if (this.narrowedTo !== null || this.stopped) return;

    this.narrowedTo = author;
    logger.info('Subscribing to opponent events only', { author });
    this.openLiveSubscription(
      createGameFilter(this.config.gameTag, {
        kind: this.kind,
        author,
        since: nowInSeconds(),
      })
    );
  }

  private notify(message: string): void {
    this.push({ type: 'transport_error', message });
  }

  private push(item: InboundItem): void {
    const result = this.config.endpoints.inbound.trySend(item);
    if (!result.ok) {
      logger.error('Error forwarding to session', {
        error: result.error.message,
        item: item.type,
      });
    }
  }
}
