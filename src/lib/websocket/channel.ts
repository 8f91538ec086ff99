/**
 * Channel helpers
 * Validation, identity keys and equality for subscribable channels
 */

import { z } from 'zod';
import { RBF_MODES, SIMPLE_CHANNEL_NAMES, TOGGLE_CHANNEL_NAMES } from './constants';
import { InvalidChannelError } from './errors';
import type { Channel, EventChannel, SimpleChannelName } from './types';

export const ChannelSchema = z.discriminatedUnion('name', [
  z.object({ name: z.enum(SIMPLE_CHANNEL_NAMES) }).strict(),
  z.object({ name: z.enum(TOGGLE_CHANNEL_NAMES) }).strict(),
  z.object({ name: z.literal('address'), parameter: z.string().trim().min(1) }).strict(),
  z.object({ name: z.literal('mempool-block'), parameter: z.number().int().nonnegative() }).strict(),
  z.object({ name: z.literal('rbf'), parameter: z.enum(RBF_MODES) }).strict(),
]);

/**
 * Validate caller input as a Channel
 * @throws InvalidChannelError when the input names no known channel or has a bad parameter
 */
export function parseChannel(input: unknown): Channel {
  const result = ChannelSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidChannelError(input, result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
}

/**
 * Stable identity key: `name` or `name:parameter`
 */
export function channelKey(channel: EventChannel): string {
  return 'parameter' in channel ? `${channel.name}:${channel.parameter}` : channel.name;
}

export function channelsEqual(a: EventChannel, b: EventChannel): boolean {
  return channelKey(a) === channelKey(b);
}

/**
 * Channels carried by the provider's `want` list
 */
export function isSimpleChannel(channel: Channel): channel is { name: SimpleChannelName } {
  return SIMPLE_CHANNEL_NAMES.some((name) => name === channel.name);
}
