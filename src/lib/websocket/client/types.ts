/**
 * ConnectionManager Types
 * Types specific to the connection lifecycle
 */

import type { StreamError } from '../errors';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'closed';

export interface ClientEvents extends Record<string, unknown> {
  state: ConnectionState;
  open: { connectionId: string; reconnect: boolean };
  reconnecting: { attempt: number; delayMs: number };
  error: StreamError;
}

/**
 * Callbacks a socket implementation reports through
 */
export interface SocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

/**
 * The operations the connection manager needs from one physical socket
 */
export interface SocketConnection {
  send(data: string): void;
  close(code: number, reason: string): void;
  /** Drop the socket without a closing handshake */
  terminate(): void;
  /** Stop reading inbound frames until resume() */
  pause(): void;
  resume(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketConnection;

export type FrameProcessor = (text: string, connectionId: string) => void | Promise<void>;
