/**
 * Dispatcher
 * Per-channel handler registration and in-order event delivery
 */

import { channelKey } from '../channel';
import { HandlerError } from '../errors';
import { logger } from '../../utils/logger';
import type { EventChannel, StreamEvent, StreamEventHandler } from '../types';

export class Dispatcher {
  private handlers = new Map<string, StreamEventHandler[]>();

  constructor(private readonly reportError: (error: HandlerError) => void) {}

  /**
   * Append a handler for a channel; handlers run in registration order
   * @returns function removing this registration
   */
  register(channel: EventChannel, handler: StreamEventHandler): () => void {
    const key = channelKey(channel);
    const registration: StreamEventHandler = (event) => handler(event);
    this.handlers.set(key, [...(this.handlers.get(key) ?? []), registration]);

    return () => {
      const remaining = (this.handlers.get(key) ?? []).filter((entry) => entry !== registration);
      if (remaining.length === 0) {
        this.handlers.delete(key);
      } else {
        this.handlers.set(key, remaining);
      }
    };
  }

  /**
   * Run every handler registered for the event's channel, one after another.
   * A failing handler is reported and the remaining handlers still run.
   * @returns number of handlers invoked
   */
  async dispatch(event: StreamEvent): Promise<number> {
    const key = channelKey(event.channel);
    const handlers = this.handlers.get(key);
    if (!handlers) {
      logger.debug('No handlers for event', { channel: key, eventKey: event.key });
      return 0;
    }

    for (const handler of handlers) {
      try {
        await handler(event);
      } catch (error) {
        logger.error(`Error in handler for ${key}`, error, { channel: key, eventKey: event.key });
        this.reportError(new HandlerError(event, error));
      }
    }

    return handlers.length;
  }

  handlerCount(channel: EventChannel): number {
    return this.handlers.get(channelKey(channel))?.length ?? 0;
  }

  /**
   * Get all channel keys with at least one handler
   */
  getRegisteredChannels(): string[] {
    return Array.from(this.handlers.keys());
  }

  clear(): void {
    this.handlers.clear();
  }
}
