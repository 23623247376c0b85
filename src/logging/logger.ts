/**
 * Channel logger.
 *
 * Messages are templates with `%name` / `@name` placeholders that are
 * filled from the context map, so the same context can carry the decoded
 * exception fields alongside the values the message interpolates.
 */

export type LogLevel = 'error' | 'warning' | 'info';

export type LogContext = Record<string, string | number | undefined>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warning(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
}

export interface LogEntry {
  level: LogLevel;
  channel: string;
  message: string;
  context: LogContext;
}

/**
 * Fields describing a thrown value, keyed the way message templates
 * reference them.
 */
export interface DecodedException extends LogContext {
  '%type': string;
  '@message': string;
  '%function': string;
  '%file': string;
  '%line': number;
  '@backtrace_string': string;
}

// "    at fn (/path/file.js:10:5)" or "    at /path/file.js:10:5"
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

/**
 * Decode an exception into log context.
 */
export function decodeException(error: unknown): DecodedException {
  if (!(error instanceof Error)) {
    return {
      '%type': typeof error,
      '@message': String(error),
      '%function': '',
      '%file': '',
      '%line': 0,
      '@backtrace_string': '',
    };
  }

  const stack = error.stack ?? '';
  const frames = stack.split('\n').slice(1);
  let fn = '';
  let file = '';
  let line = 0;

  for (const frame of frames) {
    const match = frame.match(FRAME_PATTERN);
    if (match) {
      fn = match[1] ? `${match[1]}()` : '';
      file = match[2];
      line = parseInt(match[3], 10);
      break;
    }
  }

  return {
    '%type': error.name,
    '@message': error.message,
    '%function': fn,
    '%file': file,
    '%line': line,
    '@backtrace_string': frames.map((f) => f.trim()).join('\n'),
  };
}

/**
 * Replace placeholders in a message template with context values, in one
 * pass so substituted values are never rescanned. Longer keys win, so
 * `%file` never eats `%filename`.
 */
export function formatMessage(message: string, context: LogContext = {}): string {
  const keys = Object.keys(context)
    .filter((key) => key.startsWith('%') || key.startsWith('@'))
    .sort((a, b) => b.length - a.length);
  if (keys.length === 0) {
    return message;
  }

  const pattern = new RegExp(keys.map((key) => key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')).join('|'), 'g');
  return message.replace(pattern, (key: string) => {
    const value = context[key];
    return value === undefined ? '' : String(value);
  });
}

/**
 * Logger writing to the console, prefixed with its channel.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly channel: string) {}

  error(message: string, context?: LogContext): void {
    console.error(`[${this.channel}] ${formatMessage(message, context)}`);
  }

  warning(message: string, context?: LogContext): void {
    console.warn(`[${this.channel}] ${formatMessage(message, context)}`);
  }

  info(message: string, context?: LogContext): void {
    console.log(`[${this.channel}] ${formatMessage(message, context)}`);
  }
}

/**
 * Logger that keeps entries in memory (for testing).
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  constructor(private readonly channel = 'test') {}

  error(message: string, context: LogContext = {}): void {
    this.record('error', message, context);
  }

  warning(message: string, context: LogContext = {}): void {
    this.record('warning', message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.record('info', message, context);
  }

  /**
   * Formatted messages of the given level.
   */
  messages(level: LogLevel): string[] {
    return this.entries
      .filter((entry) => entry.level === level)
      .map((entry) => formatMessage(entry.message, entry.context));
  }

  private record(level: LogLevel, message: string, context: LogContext): void {
    this.entries.push({ level, channel: this.channel, message, context });
  }
}

export function createLogger(channel: string): Logger {
  return new ConsoleLogger(channel);
}
