export {
  ConsoleLogger,
  MemoryLogger,
  createLogger,
  decodeException,
  formatMessage,
} from './logger.js';
export type { Logger, LogLevel, LogContext, LogEntry, DecodedException } from './logger.js';
