/**
 * StreamingClient
 * Public API composing the connection, subscription registry, codec and dispatcher
 */

import { ConnectionManager } from '../client/connection-manager';
import { EventEmitter } from '../events/event-emitter';
import { Dispatcher } from './dispatcher';
import { SubscriptionRegistry } from './subscription-registry';
import { channelKey, parseChannel } from '../channel';
import {
  getStreamConfig,
  resolveStreamConfig,
  type StreamConfigOverrides,
} from '../config/websocket-config';
import { DecodeError, ProtocolRejectionError, type StreamError } from '../errors';
import {
  decodeFrame,
  encodeControl,
  type DecodedEntry,
  type DecodedFrame,
  type Rejection,
} from '../frame-codec';
import { logger } from '../../utils/logger';
import type { ConnectionState, SocketFactory } from '../client/types';
import type {
  Channel,
  ControlMessage,
  EventChannel,
  EventMeta,
  StreamEventHandler,
  Subscription,
  UnknownChannel,
} from '../types';

const UNKNOWN_CHANNEL: UnknownChannel = { name: 'unknown' };

export interface StreamingClientOptions extends StreamConfigOverrides {
  /** Replaces the `ws` socket, e.g. with an in-process stand-in */
  socketFactory?: SocketFactory;
  /** Uniform source in [0, 1) for reconnect jitter */
  random?: () => number;
  /** Environment the base configuration is read from */
  env?: NodeJS.ProcessEnv;
}

export interface StreamingClientEvents extends Record<string, unknown> {
  state: ConnectionState;
  error: StreamError;
}

export class StreamingClient {
  private readonly connection: ConnectionManager;
  private readonly registry: SubscriptionRegistry;
  private readonly dispatcher: Dispatcher;
  private readonly events = new EventEmitter<StreamingClientEvents>();
  private sequence = 0;

  constructor(options: StreamingClientOptions = {}) {
    const { socketFactory, random, env, ...overrides } = options;
    const config = resolveStreamConfig(overrides, getStreamConfig(env));

    this.dispatcher = new Dispatcher((error) => this.reportError(error));
    this.registry = new SubscriptionRegistry((message, desired) => this.sendControl(message, desired));
    this.connection = new ConnectionManager({
      config,
      socketFactory,
      random,
      onFrame: (text, connectionId) => this.handleFrame(text, connectionId),
    });

    this.setupConnectionListeners();
  }

  private setupConnectionListeners(): void {
    this.connection.on('state', (state) => {
      if (state !== 'connected') {
        this.registry.deactivateAll();
      }
      if (state === 'closed') {
        this.registry.resetAll();
      }
      this.events.emit('state', state);
    });

    // Desired state converges on the wire before any frame of the new connection is handled
    this.connection.on('open', ({ connectionId, reconnect }) => {
      logger.debug('Replaying subscriptions', { connectionId, reconnect });
      this.registry.replayAll();
    });

    this.connection.on('error', (error) => {
      this.reportError(error);
    });
  }

  /**
   * Connect to the feed; rejects with ConnectionError if the first attempt fails
   */
  connect(): Promise<void> {
    return this.connection.connect();
  }

  /**
   * Close the connection and cancel any pending reconnect. Idempotent.
   */
  disconnect(): void {
    this.connection.disconnect();
  }

  /**
   * Add a channel to the desired set; sent now if connected, otherwise on the next connect
   * @throws InvalidChannelError
   */
  subscribe(channel: Channel): void {
    this.registry.add(parseChannel(channel));
  }

  /**
   * Remove a channel from the desired set; unknown channels are ignored
   * @throws InvalidChannelError
   */
  unsubscribe(channel: Channel): void {
    this.registry.remove(parseChannel(channel));
  }

  /**
   * Register a handler for a channel's events, or for `{ name: 'unknown' }`
   * @returns function removing the handler
   */
  on(channel: EventChannel, handler: StreamEventHandler): () => void {
    const target: EventChannel = channel.name === 'unknown' ? channel : parseChannel(channel);
    return this.dispatcher.register(target, handler);
  }

  onError(handler: (error: StreamError) => void): () => void {
    return this.events.on('error', handler);
  }

  onStateChange(handler: (state: ConnectionState) => void): () => void {
    return this.events.on('state', handler);
  }

  /**
   * Resolves once every frame received so far has been dispatched
   */
  drain(): Promise<void> {
    return this.connection.drain();
  }

  getState(): ConnectionState {
    return this.connection.getState();
  }

  isConnected(): boolean {
    return this.connection.isConnected();
  }

  getSubscriptions(): Subscription[] {
    return this.registry.list();
  }

  private sendControl(message: ControlMessage, desired: readonly Channel[]): boolean {
    if (!this.connection.isConnected()) {
      return false;
    }
    const frame = encodeControl(message, desired);
    logger.debug('Sending control frame', { frame, connectionId: this.connection.getConnectionId() ?? undefined });
    return this.connection.send(frame);
  }

  private async handleFrame(text: string, connectionId: string): Promise<void> {
    let frame: DecodedFrame;
    try {
      frame = decodeFrame(text);
    } catch (error) {
      if (error instanceof DecodeError) {
        logger.warn('Dropping undecodable frame', { connectionId, error: error.message });
        this.reportError(error);
        return;
      }
      throw error;
    }

    for (const key of frame.housekeeping) {
      logger.debug('Housekeeping message', { connectionId, key });
    }

    for (const rejection of frame.rejections) {
      this.handleRejection(rejection);
    }

    for (const invalid of frame.invalid) {
      logger.warn('Dropping invalid payload', { connectionId, key: invalid.key });
      this.reportError(invalid);
    }

    for (const entry of frame.entries) {
      // The connection this frame arrived on may have been closed or replaced mid-frame
      if (this.connection.getConnectionId() !== connectionId) {
        logger.debug('Discarding rest of frame from a previous connection', { connectionId });
        return;
      }
      await this.dispatchEntry(entry, connectionId);
    }
  }

  private async dispatchEntry(entry: DecodedEntry, connectionId: string): Promise<void> {
    const { body } = entry;

    if (body.kind === 'unknown') {
      logger.debug('Unknown message key', { connectionId, key: body.key });
      await this.dispatcher.dispatch({ ...body, channel: UNKNOWN_CHANNEL, ...this.nextMeta() });
      return;
    }

    const channel = this.attribute(entry);
    if (!channel) {
      logger.warn('Cannot attribute event to a single subscription', { connectionId, key: body.key });
      return;
    }

    if (!this.registry.has(channel)) {
      logger.debug('Dropping event for channel without subscription', { connectionId, channel: channelKey(channel) });
      return;
    }

    this.registry.markActive(channel);
    await this.dispatcher.dispatch({ ...body, channel, ...this.nextMeta() });
  }

  /**
   * Resolve the concrete channel of a decoded entry. Address events without
   * an address need a single tracked address; rbf events go to the tracked mode.
   */
  private attribute(entry: DecodedEntry): Channel | undefined {
    switch (entry.channelName) {
      case 'unknown':
        return undefined;
      case 'address':
        return typeof entry.parameter === 'string'
          ? { name: 'address', parameter: entry.parameter }
          : this.registry.resolveSingle('address');
      case 'mempool-block':
        return typeof entry.parameter === 'number'
          ? { name: 'mempool-block', parameter: entry.parameter }
          : this.registry.resolveSingle('mempool-block');
      case 'rbf':
        return this.registry.resolveLatest('rbf');
      default:
        return { name: entry.channelName };
    }
  }

  private handleRejection(rejection: Rejection): void {
    const error = new ProtocolRejectionError(rejection.key, rejection.reason, rejection.channelName);

    if (rejection.channelName) {
      for (const subscription of this.registry.list()) {
        if (subscription.channel.name === rejection.channelName && subscription.state === 'pending') {
          this.registry.markFailed(subscription.channel);
        }
      }
    }

    logger.warn('Provider rejected subscription', { key: rejection.key, reason: rejection.reason });
    this.reportError(error);
  }

  private nextMeta(): EventMeta {
    this.sequence++;
    return { sequence: this.sequence, receivedAt: Date.now() };
  }

  private reportError(error: StreamError): void {
    this.events.emit('error', error);
  }

  /**
   * Cleanup
   */
  destroy(): void {
    this.connection.destroy();
    this.dispatcher.clear();
    this.registry.clear();
    this.events.removeAllListeners();
  }
}
