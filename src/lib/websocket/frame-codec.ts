/**
 * Frame Codec
 * Serialization of control messages and decoding of inbound JSON frames
 */

import {
  HOUSEKEEPING_KEYS,
  REJECTION_PREFIXES,
  WEBSOCKET_CONSTANTS,
} from './constants';
import { isSimpleChannel } from './channel';
import { DecodeError } from './errors';
import {
  BlockSchema,
  DifficultyAdjustmentSchema,
  LiveChartPointSchema,
  MempoolBlockSchema,
  MempoolInfoSchema,
  MempoolTransactionsSchema,
  MempoolTxidsSchema,
  MultiAddressActivitySchema,
  ProjectedBlockTransactionsSchema,
  RbfReplacementsSchema,
  RecommendedFeesSchema,
  TransactionSchema,
  TransactionSummarySchema,
} from './payloads';
import { z } from 'zod';
import type {
  Channel,
  ChannelName,
  ControlMessage,
  EventBody,
  RbfMode,
  ToggleChannelName,
} from './types';

/**
 * One decoded top-level key, before it is attributed to a concrete channel
 */
export interface DecodedEntry {
  channelName: ChannelName | 'unknown';
  /** Present when the payload itself names the channel parameter */
  parameter?: string | number;
  body: EventBody;
}

export interface Rejection {
  key: string;
  reason: string;
  channelName?: ChannelName;
}

export interface DecodedFrame {
  entries: DecodedEntry[];
  rejections: Rejection[];
  housekeeping: string[];
  /** Recognised keys whose payload failed validation */
  invalid: DecodeError[];
}

type HousekeepingKey = typeof HOUSEKEEPING_KEYS[number];
type RejectionPrefix = keyof typeof REJECTION_PREFIXES;

const ERROR_SUFFIX = '-error';

function isHousekeepingKey(key: string): key is HousekeepingKey {
  return HOUSEKEEPING_KEYS.some((known) => known === key);
}

function isRejectionPrefix(prefix: string): prefix is RejectionPrefix {
  return Object.prototype.hasOwnProperty.call(REJECTION_PREFIXES, prefix);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function excerpt(text: string): string {
  return text.slice(0, WEBSOCKET_CONSTANTS.FRAME_EXCERPT_LENGTH);
}

// ============================================================================
// Encoding
// ============================================================================

function isDesired(desired: readonly Channel[], name: ToggleChannelName): boolean {
  return desired.some((entry) => entry.name === name);
}

function lastMempoolBlock(desired: readonly Channel[]): number | undefined {
  let index: number | undefined;
  for (const channel of desired) {
    if (channel.name === 'mempool-block') {
      index = channel.parameter;
    }
  }
  return index;
}

function lastRbfMode(desired: readonly Channel[]): RbfMode | undefined {
  let mode: RbfMode | undefined;
  for (const channel of desired) {
    if (channel.name === 'rbf') {
      mode = channel.parameter;
    }
  }
  return mode;
}

/**
 * Serialize a control intent against the full desired channel set.
 * The provider replaces its per-connection state with every message of a kind,
 * so each frame carries all desired channels of that kind.
 */
export function encodeControl(message: ControlMessage, desired: readonly Channel[]): string {
  const { channel } = message;

  if (isSimpleChannel(channel)) {
    const data: string[] = [];
    for (const entry of desired) {
      if (isSimpleChannel(entry) && !data.includes(entry.name)) {
        data.push(entry.name);
      }
    }
    return JSON.stringify({ action: 'want', data });
  }

  switch (channel.name) {
    case 'address': {
      // Single and multi tracking are separate provider state; every frame sets both
      const addresses = desired.flatMap((entry) => (entry.name === 'address' ? [entry.parameter] : []));
      const single = addresses.length === 1 ? addresses[0] : WEBSOCKET_CONSTANTS.STOP.ADDRESS;
      const multi = addresses.length > 1 ? addresses : [];
      return JSON.stringify({ 'track-address': single, 'track-addresses': multi });
    }
    case 'mempool-transactions':
      return JSON.stringify({ 'track-mempool': isDesired(desired, channel.name) });
    case 'mempool-txids':
      return JSON.stringify({ 'track-mempool-txids': isDesired(desired, channel.name) });
    case 'mempool-block': {
      const index = message.action === 'subscribe'
        ? channel.parameter
        : lastMempoolBlock(desired) ?? WEBSOCKET_CONSTANTS.STOP.MEMPOOL_BLOCK;
      return JSON.stringify({ 'track-mempool-block': index });
    }
    case 'rbf': {
      const mode = message.action === 'subscribe'
        ? channel.parameter
        : lastRbfMode(desired) ?? WEBSOCKET_CONSTANTS.STOP.RBF;
      return JSON.stringify({ 'track-rbf': mode });
    }
  }
}

/**
 * Application-level keepalive, answered by the provider with `{"pong":true}`
 */
export function encodePing(): string {
  return JSON.stringify({ action: 'ping' });
}

// ============================================================================
// Decoding
// ============================================================================

function decodeKey(key: string, value: unknown): DecodedEntry[] {
  switch (key) {
    case 'block':
      return [{ channelName: 'blocks', body: { kind: 'data', key: 'block', payload: BlockSchema.parse(value) } }];
    case 'blocks':
      return [{
        channelName: 'blocks',
        body: { kind: 'data', key: 'blocks', payload: z.array(BlockSchema).parse(value) },
      }];
    case 'mempool-blocks':
      return [{
        channelName: 'mempool-blocks',
        body: { kind: 'data', key: 'mempool-blocks', payload: z.array(MempoolBlockSchema).parse(value) },
      }];
    case 'live-2h-chart':
      return [{
        channelName: 'live-2h-chart',
        body: { kind: 'data', key: 'live-2h-chart', payload: LiveChartPointSchema.parse(value) },
      }];
    case 'mempoolInfo':
      return [{
        channelName: 'stats',
        body: { kind: 'data', key: 'mempoolInfo', payload: MempoolInfoSchema.parse(value) },
      }];
    case 'vBytesPerSecond':
      return [{ channelName: 'stats', body: { kind: 'data', key: 'vBytesPerSecond', payload: z.number().parse(value) } }];
    case 'fees':
      return [{ channelName: 'stats', body: { kind: 'data', key: 'fees', payload: RecommendedFeesSchema.parse(value) } }];
    case 'da':
      return [{ channelName: 'stats', body: { kind: 'data', key: 'da', payload: DifficultyAdjustmentSchema.parse(value) } }];
    case 'transactions':
      return [{
        channelName: 'stats',
        body: { kind: 'data', key: 'transactions', payload: z.array(TransactionSummarySchema).parse(value) },
      }];
    case 'address-transactions':
      return [{
        channelName: 'address',
        body: { kind: 'data', key: 'address-transactions', payload: z.array(TransactionSchema).parse(value) },
      }];
    case 'address-block-transactions':
      return [{
        channelName: 'address',
        body: { kind: 'data', key: 'address-block-transactions', payload: z.array(TransactionSchema).parse(value) },
      }];
    case 'multi-address-transactions':
      return Object.entries(MultiAddressActivitySchema.parse(value)).map(([address, payload]): DecodedEntry => ({
        channelName: 'address',
        parameter: address,
        body: { kind: 'data', key: 'multi-address-transactions', payload },
      }));
    case 'projected-block-transactions': {
      const payload = ProjectedBlockTransactionsSchema.parse(value);
      return [{
        channelName: 'mempool-block',
        parameter: payload.index,
        body: { kind: 'data', key: 'projected-block-transactions', payload },
      }];
    }
    case 'mempool-transactions':
      return [{
        channelName: 'mempool-transactions',
        body: { kind: 'data', key: 'mempool-transactions', payload: MempoolTransactionsSchema.parse(value) },
      }];
    case 'mempool-txids':
      return [{
        channelName: 'mempool-txids',
        body: { kind: 'data', key: 'mempool-txids', payload: MempoolTxidsSchema.parse(value) },
      }];
    case 'rbfLatest':
      return [{ channelName: 'rbf', body: { kind: 'data', key: 'rbfLatest', payload: RbfReplacementsSchema.parse(value) } }];
    case 'rbfLatestSummary':
      return [{
        channelName: 'rbf',
        body: { kind: 'data', key: 'rbfLatestSummary', payload: RbfReplacementsSchema.parse(value) },
      }];
    default:
      return [{ channelName: 'unknown', body: { kind: 'unknown', key, payload: value } }];
  }
}

function toRejection(key: string, value: unknown): Rejection {
  const prefix = key.slice(0, -ERROR_SUFFIX.length);
  const reason = typeof value === 'string' ? value : JSON.stringify(value);
  if (isRejectionPrefix(prefix)) {
    return { key, reason, channelName: REJECTION_PREFIXES[prefix] };
  }
  return { key, reason };
}

/**
 * Decode one inbound text frame
 * @throws DecodeError when the frame is not a JSON object
 */
export function decodeFrame(text: string): DecodedFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DecodeError('Frame is not valid JSON', excerpt(text), undefined, error);
  }

  if (!isRecord(parsed)) {
    throw new DecodeError('Frame is not a JSON object', excerpt(text));
  }

  const frame: DecodedFrame = { entries: [], rejections: [], housekeeping: [], invalid: [] };

  for (const [key, value] of Object.entries(parsed)) {
    if (isHousekeepingKey(key)) {
      frame.housekeeping.push(key);
      continue;
    }

    if (key.endsWith(ERROR_SUFFIX)) {
      frame.rejections.push(toRejection(key, value));
      continue;
    }

    try {
      frame.entries.push(...decodeKey(key, value));
    } catch (error) {
      frame.invalid.push(new DecodeError(`Payload for "${key}" failed validation`, excerpt(text), key, error));
    }
  }

  return frame;
}
