/**
 * WebSocket Constants
 * Centralized WebSocket-related constants
 */

export const WEBSOCKET_CONSTANTS = {
  DEFAULT_URL: 'wss://mempool.space/api/v1/ws',

  // Connection close codes
  CLOSE_CODES: {
    NORMAL: 1000,
    ABNORMAL: 1006,
  },

  // Sentinel values the provider reads as "stop tracking"
  STOP: {
    ADDRESS: 'stop',
    MEMPOOL_BLOCK: -1,
    RBF: 'stop',
  },

  // Longest raw frame excerpt attached to a DecodeError
  FRAME_EXCERPT_LENGTH: 200,
} as const;

export const SIMPLE_CHANNEL_NAMES = ['blocks', 'mempool-blocks', 'live-2h-chart', 'stats'] as const;

/**
 * Channels switched on and off with their own `track-*` flag
 */
export const TOGGLE_CHANNEL_NAMES = ['mempool-transactions', 'mempool-txids'] as const;

export const PARAMETERIZED_CHANNEL_NAMES = ['address', 'mempool-block', 'rbf'] as const;

export const CHANNEL_NAMES = [
  ...SIMPLE_CHANNEL_NAMES,
  ...TOGGLE_CHANNEL_NAMES,
  ...PARAMETERIZED_CHANNEL_NAMES,
] as const;

export const RBF_MODES = ['all', 'fullRbf'] as const;

/**
 * Inbound keys that are connection housekeeping rather than channel data
 */
export const HOUSEKEEPING_KEYS = ['pong', 'loadingIndicators', 'conversions', 'backendInfo'] as const;

/**
 * Rejection key prefixes (`<prefix>-error`) and the channel each one concerns
 */
export const REJECTION_PREFIXES = {
  'track-address': 'address',
  'track-addresses': 'address',
  'track-mempool-block': 'mempool-block',
  'track-rbf': 'rbf',
  'track-mempool': 'mempool-transactions',
  'track-mempool-txids': 'mempool-txids',
} as const;
