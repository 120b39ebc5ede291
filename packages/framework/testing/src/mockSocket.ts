/**
 * @fileoverview Mock relay sockets for testing RelayConnection and RelayPool.
 */

import type { RelaySocket, SocketFactory, SocketHandlers } from '@relay-four/framework-client';

/**
 * Mock socket that records sent frames and lets tests drive its events.
 */
export interface MockRelaySocket extends RelaySocket {
  readonly url: string;

  /** Frames that have been sent through this socket */
  readonly sentFrames: string[];

  /** Whether close() has been called */
  readonly isClosed: boolean;

  /** Parse all sent frames as JSON */
  getSentFramesAsJson(): unknown[][];

  /** Get the last sent frame as JSON */
  getLastFrameAsJson(): unknown[] | undefined;

  simulateOpen(): void;
  /** Deliver a relay frame (serialized with JSON.stringify) */
  simulateFrame(frame: readonly unknown[]): void;
  simulateRawMessage(data: string): void;
  simulateClose(): void;
  simulateError(message?: string): void;
}

export interface MockSocketFactory {
  readonly factory: SocketFactory;
  /** Sockets created so far, in creation order */
  readonly sockets: MockRelaySocket[];
  /** Socket created for a URL (latest one) */
  socketFor(url: string): MockRelaySocket;
}

/**
 * Create a mock socket.
 *
 * The mock socket:
 * - Starts closed until `simulateOpen()` is called
 * - Stores sent frames in `sentFrames` while open, failing sends otherwise
 * - Does not deliver anything on its own: tests push frames with `simulateFrame`
 *
 * @example
 * ```typescript
 * const mock = createMockSocketFactory();
 * const connection = new RelayConnection('wss://relay.test', { socketFactory: mock.factory });
 * const connected = connection.connect();
 * mock.socketFor('wss://relay.test').simulateOpen();
 * await connected;
 * ```
 */
export function createMockSocket(url: string, handlers: SocketHandlers): MockRelaySocket {
  const sentFrames: string[] = [];
  let open = false;
  let isClosed = false;

  return {
    url,

    get isOpen(): boolean {
      return open;
    },

    get sentFrames(): string[] {
      return sentFrames;
    },

    get isClosed(): boolean {
      return isClosed;
    },

    send(data: string, callback: (error?: Error) => void): void {
      if (!open) {
        callback(new Error('socket not open'));
        return;
      }
      sentFrames.push(data);
      callback();
    },

    close(): void {
      if (isClosed) return;
      isClosed = true;
      open = false;
      handlers.onClose();
    },

    getSentFramesAsJson(): unknown[][] {
      return sentFrames.map((frame) => JSON.parse(frame) as unknown[]);
    },

    getLastFrameAsJson(): unknown[] | undefined {
      const last = sentFrames[sentFrames.length - 1];
      return last === undefined ? undefined : (JSON.parse(last) as unknown[]);
    },

    simulateOpen(): void {
      open = true;
      handlers.onOpen();
    },

    simulateFrame(frame: readonly unknown[]): void {
      handlers.onMessage(JSON.stringify(frame));
    },

    simulateRawMessage(data: string): void {
      handlers.onMessage(data);
    },

    simulateClose(): void {
      open = false;
      isClosed = true;
      handlers.onClose();
    },

    simulateError(message = 'connection refused'): void {
      handlers.onError(new Error(message));
    },
  };
}

/**
 * Create a socket factory handing out mock sockets.
 */
export function createMockSocketFactory(): MockSocketFactory {
  const sockets: MockRelaySocket[] = [];

  return {
    factory: (url, handlers) => {
      const socket = createMockSocket(url, handlers);
      sockets.push(socket);
      return socket;
    },

    sockets,

    socketFor(url: string): MockRelaySocket {
      const socket = [...sockets].reverse().find((candidate) => candidate.url === url);
      if (!socket) throw new Error(`No socket created for ${url}`);
      return socket;
    },
  };
}
