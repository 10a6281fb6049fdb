import pino, { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Human-readable output through pino-pretty instead of JSON lines. */
  pretty?: boolean;
}

export function createLogger({ name = 'tasksync', level = 'info', pretty = false }: LoggerOptions = {}): Logger {
  if (pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true },
      },
    });
  }

  return pino({ name, level });
}
