/**
 * SubscriptionRegistry
 * Desired channel set and per-channel subscription state, independent of connection churn
 */

import { channelKey, isSimpleChannel } from '../channel';
import { logger } from '../../utils/logger';
import type {
  Channel,
  ChannelName,
  ControlMessage,
  SimpleChannelName,
  Subscription,
  SubscriptionState,
} from '../types';

/**
 * Sends a control message if a connection is up
 * @returns whether it reached the wire
 */
export type ControlSink = (message: ControlMessage, desired: readonly Channel[]) => boolean;

type WireKind = 'want' | Exclude<ChannelName, SimpleChannelName>;

function wireKind(channel: Channel): WireKind {
  return isSimpleChannel(channel) ? 'want' : channel.name;
}

export class SubscriptionRegistry {
  private subscriptions = new Map<string, Subscription>();

  constructor(private readonly sink: ControlSink) {}

  /**
   * Add a channel to the desired set; no-op if already desired
   * @returns whether the channel was newly added
   */
  add(channel: Channel): boolean {
    const key = channelKey(channel);
    if (this.subscriptions.has(key)) {
      return false;
    }

    this.subscriptions.set(key, { channel, state: 'pending' });
    const sent = this.sink({ action: 'subscribe', channel }, this.channels());
    logger.debug('Subscription added', { channel: key, sent });
    return true;
  }

  /**
   * Remove a channel from the desired set; no-op if it was not desired
   * @returns whether a channel was removed
   */
  remove(channel: Channel): boolean {
    const key = channelKey(channel);
    if (!this.subscriptions.delete(key)) {
      return false;
    }

    const sent = this.sink({ action: 'unsubscribe', channel }, this.channels());
    logger.debug('Subscription removed', { channel: key, sent });
    return true;
  }

  /**
   * Re-send subscriptions for every desired channel after a (re)connect,
   * resetting each to pending. One control message goes out per wire kind,
   * since each carries the full desired set of its kind.
   */
  replayAll(): ControlMessage[] {
    const byKind = new Map<WireKind, ControlMessage>();
    for (const subscription of this.subscriptions.values()) {
      subscription.state = 'pending';
      const kind = wireKind(subscription.channel);
      // The provider tracks a single mempool block and rbf mode; the latest desired wins
      if (!byKind.has(kind) || kind === 'mempool-block' || kind === 'rbf') {
        byKind.set(kind, { action: 'subscribe', channel: subscription.channel });
      }
    }

    const desired = this.channels();
    const messages = Array.from(byKind.values());
    for (const message of messages) {
      this.sink(message, desired);
    }

    logger.info('Replayed subscriptions', { channels: desired.length, frames: messages.length });
    return messages;
  }

  markActive(channel: Channel): boolean {
    return this.setState(channel, 'active');
  }

  markFailed(channel: Channel): boolean {
    return this.setState(channel, 'failed');
  }

  has(channel: Channel): boolean {
    return this.subscriptions.has(channelKey(channel));
  }

  get(channel: Channel): Subscription | undefined {
    const subscription = this.subscriptions.get(channelKey(channel));
    return subscription ? { ...subscription } : undefined;
  }

  list(): Subscription[] {
    return Array.from(this.subscriptions.values(), (subscription) => ({ ...subscription }));
  }

  channels(): Channel[] {
    return Array.from(this.subscriptions.values(), (subscription) => subscription.channel);
  }

  /**
   * The only desired channel with this name, used to attribute events
   * that do not carry their parameter
   */
  resolveSingle(name: ChannelName): Channel | undefined {
    const matches = this.channels().filter((channel) => channel.name === name);
    return matches.length === 1 ? matches[0] : undefined;
  }

  /**
   * The most recently desired channel with this name. For kinds the provider
   * tracks one of at a time (mempool block, rbf mode) this is the one on the wire.
   */
  resolveLatest(name: ChannelName): Channel | undefined {
    return this.channels().filter((channel) => channel.name === name).at(-1);
  }

  /**
   * Every subscription back to pending, e.g. for a fresh connect
   */
  resetAll(): void {
    for (const subscription of this.subscriptions.values()) {
      subscription.state = 'pending';
    }
  }

  /**
   * Active subscriptions back to pending when the connection goes down
   */
  deactivateAll(): void {
    for (const subscription of this.subscriptions.values()) {
      if (subscription.state === 'active') {
        subscription.state = 'pending';
      }
    }
  }

  clear(): void {
    this.subscriptions.clear();
  }

  get size(): number {
    return this.subscriptions.size;
  }

  private setState(channel: Channel, state: SubscriptionState): boolean {
    const subscription = this.subscriptions.get(channelKey(channel));
    if (!subscription || subscription.state === state) {
      return false;
    }
    subscription.state = state;
    return true;
  }
}
