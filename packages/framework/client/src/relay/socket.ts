/**
 * @fileoverview WebSocket seam used by RelayConnection.
 */

import WebSocket from 'ws';

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(): void;
  onError(error: Error): void;
}

/**
 * The part of a WebSocket a relay connection needs.
 */
export interface RelaySocket {
  readonly isOpen: boolean;
  send(data: string, callback: (error?: Error) => void): void;
  close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => RelaySocket;

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Open a `ws` WebSocket and forward its events to the handlers.
 */
export const createWsSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);

  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data: WebSocket.RawData) => handlers.onMessage(rawDataToString(data)));
  ws.on('close', () => handlers.onClose());
  ws.on('error', (error: Error) => handlers.onError(error));

  return {
    get isOpen(): boolean {
      return ws.readyState === WebSocket.OPEN;
    },
    send(data, callback) {
      ws.send(data, callback);
    },
    close() {
      ws.close();
    },
  };
};
