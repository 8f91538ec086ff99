export * from './lib/websocket';
export { Logger, LogLevel, logger } from './lib/utils/logger';
export type { LogContext, LogLevelValue } from './lib/utils/logger';
