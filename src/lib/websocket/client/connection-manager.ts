/**
 * ConnectionManager
 * Owns the single physical connection: open, receive, keepalive, backoff reconnection
 */

import { v7 as uuidv7 } from 'uuid';
import { EventEmitter } from '../events/event-emitter';
import { logger } from '../../utils/logger';
import { WEBSOCKET_CONSTANTS, type StreamConfig } from '../config/websocket-config';
import { ConnectionError, TransientDisconnectError } from '../errors';
import { encodePing } from '../frame-codec';
import { createWsSocket } from './socket-factory';
import type {
  ClientEvents,
  ConnectionState,
  FrameProcessor,
  SocketConnection,
  SocketFactory,
} from './types';

export interface ConnectionManagerOptions {
  config: StreamConfig;
  onFrame: FrameProcessor;
  socketFactory?: SocketFactory;
  /** Uniform source in [0, 1) used for backoff jitter */
  random?: () => number;
}

interface PendingAttempt {
  epoch: number;
  fail: (error: Error) => void;
}

/**
 * Delay before reconnect attempt `attempt` (1-based):
 * min(base * 2^(attempt - 1), max) scaled by a factor in [1 - jitter, 1 + jitter)
 */
export function computeReconnectDelay(
  attempt: number,
  delays: StreamConfig['reconnectDelays'],
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const capped = Math.min(delays.base * 2 ** exponent, delays.max);
  const factor = 1 + delays.jitter * (2 * random() - 1);
  return Math.round(capped * factor);
}

export class ConnectionManager extends EventEmitter<ClientEvents> {
  private readonly config: StreamConfig;
  private readonly onFrame: FrameProcessor;
  private readonly socketFactory: SocketFactory;
  private readonly random: () => number;

  private state: ConnectionState = 'disconnected';
  private socket: SocketConnection | null = null;
  private connectionId: string | null = null;
  private connectPromise: Promise<void> | null = null;
  private pendingAttempt: PendingAttempt | null = null;

  // Bumped whenever a socket is abandoned; callbacks and frames from older sockets are ignored
  private epoch = 0;

  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private pingTimer: ReturnType<typeof setInterval> | null = null;

  private inbound: Promise<void> = Promise.resolve();
  private queuedFrames = 0;
  private pausedEpoch = 0;

  constructor(options: ConnectionManagerOptions) {
    super();
    this.config = options.config;
    this.onFrame = options.onFrame;
    this.socketFactory = options.socketFactory ?? createWsSocket;
    this.random = options.random ?? Math.random;
  }

  /**
   * Connect to the configured endpoint.
   * Rejects with ConnectionError only when the first attempt fails;
   * drops after that are recovered internally.
   */
  connect(): Promise<void> {
    if (this.state === 'connected' || this.state === 'reconnecting') {
      logger.debug('Connect ignored, connection already established', { state: this.state });
      return Promise.resolve();
    }

    if (this.connectPromise) {
      return this.connectPromise;
    }

    this.reconnectAttempts = 0;
    this.setState('connecting');

    const attempt = this.openSocket()
      .catch((error: unknown) => {
        if (this.state === 'connecting') {
          this.setState('disconnected');
        }
        const failure = new ConnectionError(this.config.url, error);
        logger.error('Initial connection attempt failed', error, { url: this.config.url });
        throw failure;
      })
      .finally(() => {
        if (this.connectPromise === attempt) {
          this.connectPromise = null;
        }
      });

    this.connectPromise = attempt;
    return attempt;
  }

  /**
   * Close the connection and stop reconnecting. Idempotent.
   */
  disconnect(): void {
    if (this.state === 'closed' || this.state === 'disconnected') {
      return;
    }

    this.epoch++;
    this.clearReconnectTimer();
    this.stopPingTimer();
    this.setState('closed');

    this.pendingAttempt?.fail(new Error('Disconnected before the connection opened'));
    this.pendingAttempt = null;

    if (this.socket) {
      this.socket.close(WEBSOCKET_CONSTANTS.CLOSE_CODES.NORMAL, 'Client disconnect');
      this.socket = null;
    }

    logger.info('Disconnected', { connectionId: this.connectionId ?? undefined });
    this.connectionId = null;
  }

  /**
   * Send a text frame if connected
   * @returns whether the frame was handed to the socket
   */
  send(data: string): boolean {
    if (this.state !== 'connected' || !this.socket) {
      return false;
    }
    this.socket.send(data);
    return true;
  }

  /**
   * Resolves once every frame received so far has been processed
   */
  drain(): Promise<void> {
    return this.inbound;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  getConnectionId(): string | null {
    return this.connectionId;
  }

  /**
   * Open one socket; resolves on open, rejects if it fails or times out first
   */
  private openSocket(): Promise<void> {
    const epoch = ++this.epoch;
    const connectionId = uuidv7();

    return new Promise<void>((resolve, reject) => {
      let socket: SocketConnection | null = null;
      let opened = false;

      const timeout = setTimeout(() => {
        fail(new Error(`Connection timed out after ${this.config.connectionTimeout}ms`));
      }, this.config.connectionTimeout);

      const fail = (error: Error): void => {
        if (opened || this.pendingAttempt?.epoch !== epoch) {
          return;
        }
        clearTimeout(timeout);
        this.pendingAttempt = null;
        if (epoch === this.epoch) {
          this.epoch++;
        }
        socket?.terminate();
        if (this.socket === socket) {
          this.socket = null;
        }
        reject(error);
      };

      this.pendingAttempt = { epoch, fail };

      try {
        socket = this.socketFactory(this.config.url, {
          onOpen: () => {
            if (epoch !== this.epoch || !socket) {
              return;
            }
            opened = true;
            clearTimeout(timeout);
            this.pendingAttempt = null;
            this.handleOpen(connectionId);
            resolve();
          },
          onMessage: (text) => {
            if (epoch === this.epoch) {
              this.enqueueFrame(text, epoch, connectionId);
            }
          },
          onError: (error) => {
            if (!opened) {
              fail(error);
              return;
            }
            // A close event always follows; recovery happens there
            logger.warn('WebSocket error', { connectionId, error: error.message });
          },
          onClose: (code, reason) => {
            if (!opened) {
              fail(new Error(`Connection closed before opening (code ${code})`));
              return;
            }
            if (epoch === this.epoch) {
              this.handleDrop(code, reason);
            }
          },
        });
        this.socket = socket;
      } catch (error) {
        fail(error instanceof Error ? error : new Error('Failed to create WebSocket'));
      }
    });
  }

  private handleOpen(connectionId: string): void {
    const reconnect = this.state === 'reconnecting';
    this.connectionId = connectionId;
    this.reconnectAttempts = 0;
    this.setState('connected');
    this.startPingTimer();

    logger.info(reconnect ? 'WebSocket connection re-established' : 'WebSocket connection opened', {
      url: this.config.url,
      connectionId,
    });

    this.emit('open', { connectionId, reconnect });
  }

  private handleDrop(code: number, reason: string): void {
    const connectionId = this.connectionId ?? undefined;
    this.epoch++;
    this.socket = null;
    this.connectionId = null;
    this.stopPingTimer();

    const detail = reason ? `code ${code}: ${reason}` : `code ${code}`;
    logger.warn('WebSocket connection lost', { connectionId, code, reason });
    this.emit('error', new TransientDisconnectError(`Connection lost (${detail})`, 0));

    this.scheduleReconnect();
  }

  /**
   * Schedule reconnection with exponential backoff; retries until disconnect()
   */
  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.state === 'closed') {
      return;
    }

    this.reconnectAttempts++;
    const attempt = this.reconnectAttempts;
    const delay = computeReconnectDelay(attempt, this.config.reconnectDelays, this.random);
    this.setState('reconnecting');

    logger.info('Scheduling reconnect attempt', { attempt, delayMs: delay });
    this.emit('reconnecting', { attempt, delayMs: delay });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.attemptReconnect(attempt);
    }, delay);
  }

  private attemptReconnect(attempt: number): void {
    if (this.state !== 'reconnecting') {
      return;
    }

    this.openSocket().catch((error: unknown) => {
      if (this.state !== 'reconnecting') {
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Reconnect attempt failed', { attempt, error: message });
      this.emit('error', new TransientDisconnectError(`Reconnect attempt ${attempt} failed: ${message}`, attempt, error));
      this.scheduleReconnect();
    });
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  /**
   * Frames are processed one at a time in arrival order; the current socket
   * stays paused while any are queued so a slow handler throttles the read side.
   */
  private enqueueFrame(text: string, epoch: number, connectionId: string): void {
    // Frames of an abandoned socket may still be queued; the new socket pauses on its own first frame
    if (this.queuedFrames === 0 || this.pausedEpoch !== epoch) {
      this.socket?.pause();
      this.pausedEpoch = epoch;
    }
    this.queuedFrames++;
    this.inbound = this.inbound.then(() => this.processFrame(text, epoch, connectionId));
  }

  private async processFrame(text: string, epoch: number, connectionId: string): Promise<void> {
    try {
      if (epoch === this.epoch) {
        await this.onFrame(text, connectionId);
      }
    } catch (error) {
      logger.error('Frame processing failed', error, { connectionId });
    } finally {
      this.queuedFrames--;
      if (this.queuedFrames === 0 && epoch === this.epoch) {
        this.socket?.resume();
      }
    }
  }

  private startPingTimer(): void {
    this.stopPingTimer();

    if (this.config.pingInterval <= 0) {
      return;
    }

    this.pingTimer = setInterval(() => {
      if (!this.send(encodePing())) {
        this.stopPingTimer();
      }
    }, this.config.pingInterval);
  }

  private stopPingTimer(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  /**
   * Update state and emit event
   */
  private setState(newState: ConnectionState): void {
    if (this.state !== newState) {
      this.state = newState;
      this.emit('state', newState);
    }
  }

  /**
   * Cleanup
   */
  destroy(): void {
    this.disconnect();
    this.removeAllListeners();
  }
}
