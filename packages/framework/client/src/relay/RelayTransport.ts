/**
 * @fileoverview What the network actor needs from a set of relays.
 */

import type { SignedEvent } from '@relay-four/framework-protocol';
import type { Filter } from 'nostr-tools';

export interface RelayConnectReport {
  readonly connected: readonly string[];
  readonly failed: ReadonlyArray<{ readonly url: string; readonly error: Error }>;
}

export interface RelaySubscription {
  close(): void;
}

export interface RelayTransport {
  /** Connect every relay; failures are reported, not thrown */
  connect(): Promise<RelayConnectReport>;
  /** Publish to every open relay. Rejects with TransportError when none took it */
  publish(event: SignedEvent): Promise<void>;
  /** Stored events matching the filter, oldest first, within the deadline */
  fetchBacklog(filter: Filter, timeoutMs: number): Promise<SignedEvent[]>;
  /** Live events matching the filter, each event id delivered once */
  subscribe(filter: Filter, onEvent: (event: SignedEvent) => void): RelaySubscription;
  close(): void;
}
