import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type Logger = pino.Logger;

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Pretty-print through pino-pretty (interactive use only) */
  pretty?: boolean;
  /** File descriptor to write JSON lines to; stdout when omitted */
  destination?: number;
}

/**
 * Build a fresh logger. Every Master, monitor and remote worker gets its own
 * instance passed in explicitly, so runs stay independent of each other.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const name = options.name ?? 'dispatch-bench';
  const level = options.level ?? 'info';

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: options.destination ?? 1 },
      },
    });
  }

  return pino({ name, level }, pino.destination({ dest: options.destination ?? 1, sync: true }));
}

/**
 * Logger that discards everything. Used by tests and library callers that
 * do not want output.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
