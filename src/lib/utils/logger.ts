/**
 * Logger
 * Leveled console output for the streaming client. Each line is
 * `[time] [LEVEL] message {context}`; context carries connection and channel ids.
 */

export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

export type LogLevelValue = typeof LogLevel[keyof typeof LogLevel];
type LogLevelName = keyof typeof LogLevel;

export interface LogContext {
  connectionId?: string;
  channel?: string;
  attempt?: number;
  delayMs?: number;
  [key: string]: unknown;
}

function isLogLevelName(value: string): value is LogLevelName {
  return value in LogLevel;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return error;
}

export class Logger {
  private readonly threshold: LogLevelValue;
  private readonly enabled: boolean;

  /**
   * Reads `MEMPOOL_WS_LOG_LEVEL` (default INFO). Output is off under
   * `NODE_ENV` production or test unless `MEMPOOL_WS_ENABLE_LOGGING=true`.
   */
  constructor(env: NodeJS.ProcessEnv = process.env) {
    const name = env.MEMPOOL_WS_LOG_LEVEL?.toUpperCase();
    this.threshold = name && isLogLevelName(name) ? LogLevel[name] : LogLevel.INFO;
    const quiet = env.NODE_ENV === 'production' || env.NODE_ENV === 'test';
    this.enabled = !quiet || env.MEMPOOL_WS_ENABLE_LOGGING === 'true';
  }

  debug(message: string, context?: LogContext): void {
    this.write('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('WARN', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.write('ERROR', message, { ...context, error: serializeError(error) });
  }

  private write(level: LogLevelName, message: string, context?: LogContext): void {
    if (!this.enabled || LogLevel[level] < this.threshold) {
      return;
    }

    const suffix = context ? ` ${JSON.stringify(context)}` : '';
    const line = `[${new Date().toISOString()}] [${level}] ${message}${suffix}`;

    switch (level) {
      case 'DEBUG':
        console.debug(line);
        break;
      case 'INFO':
        console.info(line);
        break;
      case 'WARN':
        console.warn(line);
        break;
      case 'ERROR':
        console.error(line);
        break;
    }
  }
}

export const logger = new Logger();
