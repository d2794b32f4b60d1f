/**
 * Structured JSON logger for the gatekeeper
 *
 * Log format:
 * { timestamp, level, event, request_id, ... }
 *
 * Credentials never appear in entries; auth events carry the subject,
 * the method and a deny reason only.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Fields supplied by callers; timestamp and level are added on write */
export interface LogFields {
  event: string;
  request_id?: string;
  subject?: string;
  role?: string;
  auth_method?: string;
  remote_addr?: string;
  method?: string;
  url?: string;
  decision?: 'allow' | 'deny';
  deny_reason?: string;
  latency_ms?: number;
  status?: number;
  error?: string;
  [key: string]: unknown;
}

export interface LogEntry extends LogFields {
  timestamp: string;
  level: LogLevel;
}

export interface Logger {
  debug(entry: LogFields): void;
  info(entry: LogFields): void;
  warn(entry: LogFields): void;
  error(entry: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a structured JSON logger
 * @param output Write function (default: console.log)
 * @param minLevel Minimum log level to output
 */
export function createLogger(
  output: (line: string) => void = console.log,
  minLevel: LogLevel = 'info'
): Logger {
  const log = (level: LogLevel, entry: LogFields) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

    output(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        ...entry,
      })
    );
  };

  return {
    debug: (entry) => log('debug', entry),
    info: (entry) => log('info', entry),
    warn: (entry) => log('warn', entry),
    error: (entry) => log('error', entry),
  };
}

/** Logger that drops every entry */
export const silentLogger: Logger = createLogger(() => undefined, 'error');
