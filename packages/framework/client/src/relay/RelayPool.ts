/**
 * @fileoverview A set of relay connections used as one transport.
 *
 * Relays give no ordering or delivery guarantee between each other, so the
 * pool deduplicates events by id and sorts stored events by creation time.
 */

import { randomUUID } from 'node:crypto';
import { type SignedEvent, TransportError } from '@relay-four/framework-protocol';
import type { Filter } from 'nostr-tools';
import { logger } from '../utils/logger.js';
import { RelayConnection } from './RelayConnection.js';
import type { RelayConnectReport, RelaySubscription, RelayTransport } from './RelayTransport.js';
import type { SocketFactory } from './socket.js';

export interface RelayPoolOptions {
  socketFactory?: SocketFactory;
}

/**
 * Sort events oldest first; ties broken by id so every client sees the same order.
 */
export function sortChronologically(events: readonly SignedEvent[]): SignedEvent[] {
  return [...events].sort((a, b) => a.created_at - b.created_at || a.id.localeCompare(b.id));
}

export class RelayPool implements RelayTransport {
  private readonly connections: RelayConnection[];

  constructor(urls: readonly string[], options: RelayPoolOptions = {}) {
    const unique = Array.from(new Set(urls));
    this.connections = unique.map(
      (url) => new RelayConnection(url, { socketFactory: options.socketFactory })
    );
  }

  get urls(): string[] {
    return this.connections.map((connection) => connection.url);
  }

  get openCount(): number {
    return this.connections.filter((connection) => connection.isOpen).length;
  }

  async connect(): Promise<RelayConnectReport> {
    const results = await Promise.allSettled(
      this.connections.map((connection) => connection.connect())
    );

    const connected: string[] = [];
    const failed: Array<{ url: string; error: Error }> = [];

    results.forEach((result, index) => {
      const connection = this.connections[index];
      if (!connection) return;
      if (result.status === 'fulfilled') {
        connected.push(connection.url);
      } else {
        const error =
          result.reason instanceof Error ? result.reason : new Error(String(result.reason));
        logger.error('Error adding relay', { url: connection.url, error: error.message });
        failed.push({ url: connection.url, error });
      }
    });

    return { connected, failed };
  }

  async publish(event: SignedEvent): Promise<void> {
    const open = this.connections.filter((connection) => connection.isOpen);
    if (open.length === 0) {
      throw new TransportError('No relay connected');
    }

    const results = await Promise.allSettled(open.map((connection) => connection.publish(event)));
    const delivered = results.filter((result) => result.status === 'fulfilled').length;

    if (delivered === 0) {
      const first = results.find(
        (result): result is PromiseRejectedResult => result.status === 'rejected'
      );
      throw new TransportError('Event could not be sent to any relay', undefined, {
        cause: first?.reason,
      });
    }

    logger.debug('Event published', { id: event.id, relays: delivered });
  }

  fetchBacklog(filter: Filter, timeoutMs: number): Promise<SignedEvent[]> {
    const open = this.connections.filter((connection) => connection.isOpen);
    if (open.length === 0) {
      return Promise.resolve([]);
    }

    const subscriptionId = `backlog-${randomUUID()}`;
    const collected = new Map<string, SignedEvent>();
    // EOSE and a later close or CLOSED both end a relay's backlog; count it once
    const finished = new Set<RelayConnection>();

    return new Promise((resolve) => {
      let done = false;

      const finish = (): void => {
        if (done) return;
        done = true;
        clearTimeout(timer);
        for (const connection of open) {
          connection.unsubscribe(subscriptionId);
        }
        resolve(sortChronologically(Array.from(collected.values())));
      };

      const timer = setTimeout(() => {
        logger.warn('Backlog fetch timed out', {
          timeoutMs,
          relaysPending: open.length - finished.size,
        });
        finish();
      }, timeoutMs);

      for (const connection of open) {
        connection.subscribe(subscriptionId, filter, {
          onEvent: (event) => {
            if (!done) collected.set(event.id, event);
          },
          onEndOfStored: () => {
            finished.add(connection);
            if (finished.size === open.length) finish();
          },
        });
      }
    });
  }

  subscribe(filter: Filter, onEvent: (event: SignedEvent) => void): RelaySubscription {
    const subscriptionId = `live-${randomUUID()}`;
    const seen = new Set<string>();
    const targets = this.connections.filter((connection) => connection.isOpen);

    for (const connection of targets) {
      connection.subscribe(subscriptionId, filter, {
        onEvent: (event) => {
          if (seen.has(event.id)) return;
          seen.add(event.id);
          onEvent(event);
        },
      });
    }

    return {
      close: () => {
        for (const connection of targets) {
          connection.unsubscribe(subscriptionId);
        }
      },
    };
  }

  close(): void {
    for (const connection of this.connections) {
      connection.close();
    }
  }
}
