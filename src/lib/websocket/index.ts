/**
 * WebSocket Library
 * Public API exports
 */

// Facade (High-Level API)
export { StreamingClient } from './manager/streaming-client';
export type { StreamingClientOptions, StreamingClientEvents } from './manager/streaming-client';

// Connection (Low-Level API - for advanced use cases)
export { ConnectionManager, computeReconnectDelay } from './client/connection-manager';
export type { ConnectionManagerOptions } from './client/connection-manager';
export { createWsSocket } from './client/socket-factory';

// Manager utilities
export { Dispatcher } from './manager/dispatcher';
export { SubscriptionRegistry } from './manager/subscription-registry';
export type { ControlSink } from './manager/subscription-registry';

// Events
export { EventEmitter } from './events/event-emitter';
export type { EventCallback } from './events/event-emitter';

// Codec and channels
export { decodeFrame, encodeControl, encodePing } from './frame-codec';
export type { DecodedEntry, DecodedFrame, Rejection } from './frame-codec';
export { ChannelSchema, channelKey, channelsEqual, parseChannel } from './channel';
export * from './payloads';

// Configuration
export { getStreamConfig, resolveStreamConfig, StreamConfigSchema } from './config/websocket-config';
export type { StreamConfig, StreamConfigOverrides } from './config/websocket-config';
export { WEBSOCKET_CONSTANTS, CHANNEL_NAMES, RBF_MODES } from './constants';

// Errors
export * from './errors';

// Types
export type * from './types';
export type {
  FrameProcessor,
  SocketConnection,
  SocketFactory,
  SocketHandlers,
} from './client/types';
