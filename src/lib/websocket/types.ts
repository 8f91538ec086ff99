/**
 * WebSocket Types
 * Channels, subscriptions, decoded events and handler signatures
 */

import type {
  CHANNEL_NAMES,
  PARAMETERIZED_CHANNEL_NAMES,
  RBF_MODES,
  SIMPLE_CHANNEL_NAMES,
  TOGGLE_CHANNEL_NAMES,
} from './constants';
import type { EventKey, PayloadMap } from './payloads';

export type { ConnectionState, ClientEvents } from './client/types';

// ============================================================================
// Channels
// ============================================================================

export type SimpleChannelName = typeof SIMPLE_CHANNEL_NAMES[number];
export type ToggleChannelName = typeof TOGGLE_CHANNEL_NAMES[number];
export type ParameterizedChannelName = typeof PARAMETERIZED_CHANNEL_NAMES[number];
export type ChannelName = typeof CHANNEL_NAMES[number];
export type RbfMode = typeof RBF_MODES[number];

export type Channel =
  | { name: SimpleChannelName }
  | { name: ToggleChannelName }
  | { name: 'address'; parameter: string }
  | { name: 'mempool-block'; parameter: number }
  | { name: 'rbf'; parameter: RbfMode };

/**
 * Tag for events whose top-level key is not part of the known protocol
 */
export interface UnknownChannel {
  name: 'unknown';
}

export type EventChannel = Channel | UnknownChannel;

// ============================================================================
// Subscriptions
// ============================================================================

export type SubscriptionState = 'pending' | 'active' | 'failed';

export interface Subscription {
  readonly channel: Channel;
  state: SubscriptionState;
}

/**
 * Control intent produced by the registry and serialized by the codec
 */
export interface ControlMessage {
  action: 'subscribe' | 'unsubscribe';
  channel: Channel;
}

// ============================================================================
// Events
// ============================================================================

export type DataEventBody = {
  [K in EventKey]: { kind: 'data'; key: K; payload: PayloadMap[K] };
}[EventKey];

export interface UnknownEventBody {
  kind: 'unknown';
  key: string;
  payload: unknown;
}

export type EventBody = DataEventBody | UnknownEventBody;

export interface EventMeta {
  /** Per-client arrival counter, strictly increasing */
  sequence: number;
  /** Arrival time in epoch milliseconds */
  receivedAt: number;
}

export type DataEvent = DataEventBody & EventMeta & { channel: Channel };
export type UnknownEvent = UnknownEventBody & EventMeta & { channel: UnknownChannel };

export type StreamEvent = Readonly<DataEvent> | Readonly<UnknownEvent>;

/**
 * Handler for decoded events; a returned promise is awaited before the next handler runs
 */
export type StreamEventHandler = (event: StreamEvent) => void | Promise<void>;
