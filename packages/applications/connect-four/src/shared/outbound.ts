/**
 * @fileoverview Enqueue protocol messages for publication.
 */

import { type ChannelSender, logger } from '@relay-four/framework-client';
import { encodeMessage, type ProtocolMessage } from './protocol.js';

/**
 * Serialize a message onto the outbound queue.
 * @returns false when the queue was full and the message was dropped
 */
export function sendMessage(outbound: ChannelSender<string>, message: ProtocolMessage): boolean {
  const result = outbound.trySend(encodeMessage(message));
  if (!result.ok) {
    logger.error('Error sending message', { type: message.type, error: result.error.message });
    return false;
  }
  logger.debug('Queued message', { type: message.type });
  return true;
}
