/**
 * @fileoverview The two queues isolating the network task from game state.
 */

import type { InboundItem } from '@relay-four/framework-protocol';
import { BoundedChannel, type ChannelReceiver, type ChannelSender } from './BoundedChannel.js';

/**
 * Default capacity of each queue.
 */
export const DEFAULT_CHANNEL_CAPACITY = 1000;

/**
 * Endpoints held by the frame loop.
 */
export interface SessionEndpoints {
  /** Serialized protocol messages awaiting publication */
  readonly outbound: ChannelSender<string>;
  /** Items received from relays */
  readonly inbound: ChannelReceiver<InboundItem>;
}

/**
 * Endpoints held by the network task.
 */
export interface NetworkEndpoints {
  readonly outbound: ChannelReceiver<string>;
  readonly inbound: ChannelSender<InboundItem>;
}

export interface ChannelBridge {
  readonly outbound: BoundedChannel<string>;
  readonly inbound: BoundedChannel<InboundItem>;
  readonly session: SessionEndpoints;
  readonly network: NetworkEndpoints;
}

/**
 * Create an outbound and an inbound queue of the given capacity.
 */
export function createChannelBridge(capacity: number = DEFAULT_CHANNEL_CAPACITY): ChannelBridge {
  const outbound = new BoundedChannel<string>('outbound', capacity);
  const inbound = new BoundedChannel<InboundItem>('inbound', capacity);

  return {
    outbound,
    inbound,
    session: { outbound, inbound },
    network: { outbound, inbound },
  };
}
