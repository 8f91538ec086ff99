/**
 * WebSocket Configuration
 * Centralized configuration for streaming connections
 */

import { z } from 'zod';
import { WEBSOCKET_CONSTANTS } from '../constants';

export const StreamConfigSchema = z
  .object({
    url: z.string().url(),
    connectionTimeout: z.number().int().positive(),
    // 0 disables the keepalive ping
    pingInterval: z.number().int().nonnegative(),

    // Reconnection delays (exponential backoff in ms)
    reconnectDelays: z.object({
      base: z.number().positive(),
      max: z.number().positive(),
      jitter: z.number().min(0).max(1),
    }),
  })
  .refine((config) => config.reconnectDelays.max >= config.reconnectDelays.base, {
    message: 'reconnectDelays.max must not be below reconnectDelays.base',
    path: ['reconnectDelays', 'max'],
  });

export type StreamConfig = z.infer<typeof StreamConfigSchema>;

export interface StreamConfigOverrides {
  url?: string;
  connectionTimeout?: number;
  pingInterval?: number;
  reconnectDelays?: Partial<StreamConfig['reconnectDelays']>;
}

const defaultConfig: StreamConfig = {
  url: WEBSOCKET_CONSTANTS.DEFAULT_URL,
  connectionTimeout: 30000, // 30 seconds
  pingInterval: 30000, // 30 seconds

  reconnectDelays: {
    base: 1000, // 1 second
    max: 60000, // 1 minute
    jitter: 0.2, // ±20%
  },
};

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Get streaming configuration
 * Defaults can be overridden via environment variables
 */
export function getStreamConfig(env: NodeJS.ProcessEnv = process.env): StreamConfig {
  return StreamConfigSchema.parse({
    url: env.MEMPOOL_WS_URL || defaultConfig.url,
    connectionTimeout: numberFromEnv(env.MEMPOOL_WS_CONNECTION_TIMEOUT, defaultConfig.connectionTimeout),
    pingInterval: numberFromEnv(env.MEMPOOL_WS_PING_INTERVAL, defaultConfig.pingInterval),

    reconnectDelays: {
      base: numberFromEnv(env.MEMPOOL_WS_RECONNECT_BASE, defaultConfig.reconnectDelays.base),
      max: numberFromEnv(env.MEMPOOL_WS_RECONNECT_MAX, defaultConfig.reconnectDelays.max),
      jitter: numberFromEnv(env.MEMPOOL_WS_RECONNECT_JITTER, defaultConfig.reconnectDelays.jitter),
    },
  });
}

/**
 * Apply per-instance overrides on top of a base configuration
 * @throws ZodError when the merged configuration is out of range
 */
export function resolveStreamConfig(
  overrides: StreamConfigOverrides = {},
  base: StreamConfig = getStreamConfig()
): StreamConfig {
  const delays: Partial<StreamConfig['reconnectDelays']> = overrides.reconnectDelays ?? {};

  // An override given as undefined keeps the base value
  return StreamConfigSchema.parse({
    url: overrides.url ?? base.url,
    connectionTimeout: overrides.connectionTimeout ?? base.connectionTimeout,
    pingInterval: overrides.pingInterval ?? base.pingInterval,
    reconnectDelays: {
      base: delays.base ?? base.reconnectDelays.base,
      max: delays.max ?? base.reconnectDelays.max,
      jitter: delays.jitter ?? base.reconnectDelays.jitter,
    },
  });
}

// Re-export constants for convenience
export { WEBSOCKET_CONSTANTS } from '../constants';
