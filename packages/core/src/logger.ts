import pino from 'pino';
import type { DestinationStream, Logger as PinoInstance } from 'pino';
import type { LogLevel } from '@marquee/shared';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Defaults to stderr; stdout carries the stdio protocol stream. */
  destination?: DestinationStream;
}

// Caller data lives under `data` so it can never overwrite level, time or msg
function createPinoOptions(level: LogLevel): pino.LoggerOptions {
  return {
    level,
    base: null,
    nestedKey: 'data',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };
}

class PinoLogger implements Logger {
  private readonly instance: PinoInstance;

  constructor(private readonly root: PinoInstance, private readonly scope?: string) {
    this.instance = scope ? root.child({ scope }) : root;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  child(scope: string): Logger {
    return new PinoLogger(this.root, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.instance[level](data, message);
    } else {
      this.instance[level](message);
    }
  }
}

/**
 * Structured line logger backed by pino. Each entry is one JSON object:
 * `{ level, time, scope?, data?, msg }`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const root = pino(
    createPinoOptions(options.level ?? 'info'),
    options.destination ?? pino.destination(2),
  );
  return new PinoLogger(root, options.scope);
}

/** Discards everything. Default for components constructed without a logger. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
