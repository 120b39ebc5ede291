/**
 * @fileoverview Connection to a single relay.
 *
 * Handles:
 * - WebSocket lifecycle
 * - NIP-01 frame parsing and validation
 * - Signature verification of delivered events
 * - Subscription bookkeeping (REQ / EVENT / EOSE / CLOSE)
 */

import {
  type ClientFrame,
  parseRelayFrame,
  type RelayFrame,
  type SignedEvent,
  serializeClientFrame,
  TransportError,
} from '@relay-four/framework-protocol';
import type { Filter } from 'nostr-tools';
import { verifyEvent } from 'nostr-tools/pure';
import { logger } from '../utils/logger.js';
import { createWsSocket, type RelaySocket, type SocketFactory } from './socket.js';

/**
 * Connection state of a relay.
 */
export type RelayConnectionState = 'idle' | 'connecting' | 'open' | 'closed';

export interface SubscriptionHandlers {
  onEvent(event: SignedEvent): void;
  /** Stored events delivered (EOSE), or the relay closed the subscription */
  onEndOfStored?(): void;
}

export interface RelayConnectionOptions {
  socketFactory?: SocketFactory;
}

export class RelayConnection {
  private socket: RelaySocket | null = null;
  private connectionState: RelayConnectionState = 'idle';
  private readonly subscriptions = new Map<string, SubscriptionHandlers>();

  constructor(
    readonly url: string,
    private readonly options: RelayConnectionOptions = {}
  ) {}

  get state(): RelayConnectionState {
    return this.connectionState;
  }

  get isOpen(): boolean {
    return this.connectionState === 'open' && this.socket !== null && this.socket.isOpen;
  }

  // ============ Connection Management ============

  /**
   * Open the WebSocket. Resolves once open, rejects with TransportError
   * when the socket fails or closes first.
   */
  connect(): Promise<void> {
    if (this.connectionState === 'open') {
      return Promise.resolve();
    }

    const factory = this.options.socketFactory ?? createWsSocket;
    this.connectionState = 'connecting';

    return new Promise((resolve, reject) => {
      let settled = false;

      this.socket = factory(this.url, {
        onOpen: () => {
          this.connectionState = 'open';
          logger.info('Relay connected', { url: this.url });
          settled = true;
          resolve();
        },
        onMessage: (data) => this.handleMessage(data),
        onClose: () => {
          this.connectionState = 'closed';
          this.endAllSubscriptions();
          if (!settled) {
            settled = true;
            reject(new TransportError('Relay closed before opening', this.url));
          } else {
            logger.warn('Relay connection closed', { url: this.url });
          }
        },
        onError: (error) => {
          if (!settled) {
            settled = true;
            this.connectionState = 'closed';
            reject(
              new TransportError(`Cannot connect to relay: ${error.message}`, this.url, {
                cause: error,
              })
            );
          } else {
            logger.error('Relay socket error', { url: this.url, error: error.message });
          }
        },
      });
    });
  }

  /**
   * Close the socket. Open subscriptions end.
   */
  close(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
    this.connectionState = 'closed';
    this.endAllSubscriptions();
  }

  // ============ Outgoing Frames ============

  /**
   * Send an event. Resolves once written to the socket; the relay's OK
   * answer arrives later and is only logged.
   */
  publish(event: SignedEvent): Promise<void> {
    return this.send(['EVENT', event]);
  }

  subscribe(subscriptionId: string, filter: Filter, handlers: SubscriptionHandlers): void {
    this.subscriptions.set(subscriptionId, handlers);
    this.send(['REQ', subscriptionId, filter]).catch((error: unknown) => {
      this.subscriptions.delete(subscriptionId);
      logger.warn('Failed to open subscription', {
        url: this.url,
        subscriptionId,
        error: error instanceof Error ? error.message : String(error),
      });
      handlers.onEndOfStored?.();
    });
  }

  unsubscribe(subscriptionId: string): void {
    if (!this.subscriptions.delete(subscriptionId)) return;
    if (this.isOpen) {
      this.send(['CLOSE', subscriptionId]).catch((error: unknown) => {
        logger.debug('Failed to close subscription', {
          url: this.url,
          subscriptionId,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
  }

  // ============ Private Methods ============

  private send(frame: ClientFrame): Promise<void> {
    const socket = this.socket;
    if (!socket || !this.isOpen) {
      return Promise.reject(new TransportError('Relay is not connected', this.url));
    }

    return new Promise((resolve, reject) => {
      socket.send(serializeClientFrame(frame), (error) => {
        if (error) {
          reject(new TransportError(`Send failed: ${error.message}`, this.url, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  private handleMessage(data: string): void {
    const frame = parseRelayFrame(data);
    if (!frame) {
      logger.debug('Ignoring unrecognized relay frame', { url: this.url });
      return;
    }
    this.handleFrame(frame);
  }

  private handleFrame(frame: RelayFrame): void {
    switch (frame[0]) {
      case 'EVENT': {
        const [, subscriptionId, event] = frame;
        const handlers = this.subscriptions.get(subscriptionId);
        if (!handlers) return;
        if (!verifyEvent(event)) {
          logger.warn('Dropping event with invalid signature', { url: this.url, id: event.id });
          return;
        }
        handlers.onEvent(event);
        break;
      }

      case 'EOSE': {
        this.subscriptions.get(frame[1])?.onEndOfStored?.();
        break;
      }

      case 'CLOSED': {
        const [, subscriptionId, reason] = frame;
        const handlers = this.subscriptions.get(subscriptionId);
        this.subscriptions.delete(subscriptionId);
        logger.warn('Relay closed subscription', { url: this.url, subscriptionId, reason });
        handlers?.onEndOfStored?.();
        break;
      }

      case 'OK': {
        const [, eventId, accepted, message] = frame;
        if (!accepted) {
          logger.warn('Relay refused event', { url: this.url, eventId, message });
        }
        break;
      }

      case 'NOTICE': {
        logger.info('Relay notice', { url: this.url, message: frame[1] });
        break;
      }
    }
  }

  private endAllSubscriptions(): void {
    const handlers = Array.from(this.subscriptions.values());
    this.subscriptions.clear();
    for (const handler of handlers) {
      handler.onEndOfStored?.();
    }
  }
}
