/**
 * Socket factory backed by the `ws` package
 */

import WebSocket from 'ws';
import { logger } from '../../utils/logger';
import type { SocketConnection, SocketFactory } from './types';

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

export const createWsSocket: SocketFactory = (url, handlers): SocketConnection => {
  const ws = new WebSocket(url);

  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(rawDataToString(data)));
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));
  ws.on('error', (error) => handlers.onError(error));

  return {
    send(data) {
      ws.send(data, (error) => {
        if (error) {
          logger.warn('WebSocket send failed', { url, error: error.message });
        }
      });
    },
    close(code, reason) {
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
        return;
      }
      ws.close(code, reason);
    },
    terminate() {
      ws.terminate();
    },
    pause() {
      ws.pause();
    },
    resume() {
      ws.resume();
    },
  };
};
