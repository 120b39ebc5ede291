import { createGameFilter, createGameTag, TransportError } from '@relay-four/framework-protocol';
import {
  createMockSocketFactory,
  createTestEvent,
  createTestIdentity,
  type MockSocketFactory,
} from '@relay-four/framework-testing';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RelayConnection } from '../src/index.js';

const RELAY_URL = 'wss://relay.test';
const GAME_TAG = createGameTag('relay-four.test', 'match-1');
const FILTER = createGameFilter(GAME_TAG);

describe('RelayConnection', () => {
  let mock: MockSocketFactory;
  let connection: RelayConnection;

  async function connectOpen(): Promise<void> {
    const connected = connection.connect();
    mock.socketFor(RELAY_URL).simulateOpen();
    await connected;
  }

  beforeEach(() => {
    mock = createMockSocketFactory();
    connection = new RelayConnection(RELAY_URL, { socketFactory: mock.factory });
  });

  describe('connection lifecycle', () => {
    it('should start idle', () => {
      expect(connection.state).toBe('idle');
      expect(connection.isOpen).toBe(false);
    });

    it('should resolve once the socket opens', async () => {
      const connected = connection.connect();
      expect(connection.state).toBe('connecting');

      mock.socketFor(RELAY_URL).simulateOpen();
      await connected;

      expect(connection.state).toBe('open');
      expect(connection.isOpen).toBe(true);
    });

    it('should reject with TransportError when the socket fails', async () => {
      const connected = connection.connect();
      mock.socketFor(RELAY_URL).simulateError('connection refused');

      await expect(connected).rejects.toBeInstanceOf(TransportError);
      await expect(connected).rejects.toThrow('Cannot connect to relay: connection refused');
      expect(connection.state).toBe('closed');
    });

    it('should reject when the socket closes before opening', async () => {
      const connected = connection.connect();
      mock.socketFor(RELAY_URL).simulateClose();

      await expect(connected).rejects.toThrow('Relay closed before opening');
    });

    it('should close the socket', async () => {
      await connectOpen();

      connection.close();

      expect(mock.socketFor(RELAY_URL).isClosed).toBe(true);
      expect(connection.state).toBe('closed');
    });
  });

  describe('outgoing frames', () => {
    it('should send a REQ frame when subscribing', async () => {
      await connectOpen();

      connection.subscribe('sub-1', FILTER, { onEvent: vi.fn() });

      expect(mock.socketFor(RELAY_URL).getLastFrameAsJson()).toEqual(['REQ', 'sub-1', FILTER]);
    });

    it('should send a CLOSE frame when unsubscribing', async () => {
      await connectOpen();
      connection.subscribe('sub-1', FILTER, { onEvent: vi.fn() });

      connection.unsubscribe('sub-1');

      expect(mock.socketFor(RELAY_URL).getLastFrameAsJson()).toEqual(['CLOSE', 'sub-1']);
    });

    it('should not send CLOSE for unknown subscriptions', async () => {
      await connectOpen();

      connection.unsubscribe('never-opened');

      expect(mock.socketFor(RELAY_URL).sentFrames).toEqual([]);
    });

    it('should send an EVENT frame when publishing', async () => {
      await connectOpen();
      const event = createTestEvent(createTestIdentity(1), GAME_TAG, '"Reset"');

      await connection.publish(event);

      const frame = mock.socketFor(RELAY_URL).getLastFrameAsJson();
      expect(frame?.[0]).toBe('EVENT');
      expect(frame?.[1]).toMatchObject({ id: event.id, content: '"Reset"' });
    });

    it('should reject publishing while disconnected', async () => {
      const event = createTestEvent(createTestIdentity(1), GAME_TAG, '"Reset"');

      await expect(connection.publish(event)).rejects.toThrow('Relay is not connected');
    });
  });

  describe('incoming frames', () => {
    it('should deliver verified events to the subscription', async () => {
      await connectOpen();
      const onEvent = vi.fn();
      connection.subscribe('sub-1', FILTER, { onEvent });
      const event = createTestEvent(createTestIdentity(1), GAME_TAG, '{"Move":{"column":2}}');

      mock.socketFor(RELAY_URL).simulateFrame(['EVENT', 'sub-1', event]);

      expect(onEvent).toHaveBeenCalledOnce();
      expect(onEvent.mock.calls[0]?.[0].id).toBe(event.id);
    });

    it('should drop events whose signature does not match', async () => {
      await connectOpen();
      const onEvent = vi.fn();
      connection.subscribe('sub-1', FILTER, { onEvent });
      const event = createTestEvent(createTestIdentity(1), GAME_TAG, '{"Move":{"column":2}}');

      mock
        .socketFor(RELAY_URL)
        .simulateFrame(['EVENT', 'sub-1', { ...event, content: '{"Move":{"column":5}}' }]);

      expect(onEvent).not.toHaveBeenCalled();
    });

    it('should ignore events for unknown subscriptions', async () => {
      await connectOpen();
      const onEvent = vi.fn();
      connection.subscribe('sub-1', FILTER, { onEvent });
      const event = createTestEvent(createTestIdentity(1), GAME_TAG, '"Reset"');

      mock.socketFor(RELAY_URL).simulateFrame(['EVENT', 'sub-2', event]);

      expect(onEvent).not.toHaveBeenCalled();
    });

    it('should signal end of stored events on EOSE', async () => {
      await connectOpen();
      const onEndOfStored = vi.fn();
      connection.subscribe('sub-1', FILTER, { onEvent: vi.fn(), onEndOfStored });

      mock.socketFor(RELAY_URL).simulateFrame(['EOSE', 'sub-1']);

      expect(onEndOfStored).toHaveBeenCalledOnce();
    });

    it('should end a subscription the relay closes', async () => {
      await connectOpen();
      const onEndOfStored = vi.fn();
      connection.subscribe('sub-1', FILTER, { onEvent: vi.fn(), onEndOfStored });

      mock.socketFor(RELAY_URL).simulateFrame(['CLOSED', 'sub-1', 'rate-limited: slow down']);
      mock.socketFor(RELAY_URL).simulateFrame(['EOSE', 'sub-1']);

      expect(onEndOfStored).toHaveBeenCalledOnce();
    });

    it('should ignore malformed frames', async () => {
      await connectOpen();
      const onEvent = vi.fn();
      connection.subscribe('sub-1', FILTER, { onEvent });

      mock.socketFor(RELAY_URL).simulateRawMessage('not json');
      mock.socketFor(RELAY_URL).simulateFrame(['EVENT', 'sub-1', { id: 'x' }]);
      mock.socketFor(RELAY_URL).simulateFrame(['AUTH', 'challenge']);

      expect(onEvent).not.toHaveBeenCalled();
      expect(connection.isOpen).toBe(true);
    });

    it('should end open subscriptions when the socket closes', async () => {
      await connectOpen();
      const onEndOfStored = vi.fn();
      connection.subscribe('sub-1', FILTER, { onEvent: vi.fn(), onEndOfStored });

      mock.socketFor(RELAY_URL).simulateClose();

      expect(onEndOfStored).toHaveBeenCalledOnce();
      expect(connection.state).toBe('closed');
    });
  });
});
