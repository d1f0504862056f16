/**
 * Structured logger for Plugstead.
 *
 * - Structured JSON output through pino
 * - Secret-looking fields are redacted before they reach a transport
 * - Child loggers carry component / extension context
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import type { LoggingConfig } from '@plugstead/shared';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component?: string;
  extensionId?: string;
  [key: string]: unknown;
}

export interface Logger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(context: LogContext): Logger;
  level: LogLevel;
}

const REDACTED_KEYS = ['password', 'secret', 'token', 'apiKey', 'api_key', 'authorization'];

function createPinoOptions(config: LoggingConfig): LoggerOptions {
  return {
    level: config.level,
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        name: 'plugstead',
      }),
    },
    redact: {
      paths: [...REDACTED_KEYS, ...REDACTED_KEYS.map((key) => `*.${key}`)],
      censor: '[REDACTED]',
    },
  };
}

/**
 * JSON stdout alone needs no transport: pino(options) writes to fd 1
 * directly. Pretty stdout goes through pino-pretty, files through pino/file.
 */
export function createTransport(
  config: LoggingConfig
): pino.TransportMultiOptions | pino.TransportSingleOptions | undefined {
  const targets: pino.TransportTargetOptions[] = [];
  let jsonStdout = false;

  for (const output of config.output) {
    if (output.type === 'stdout') {
      if (output.format === 'json') {
        jsonStdout = true;
      } else {
        targets.push({
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
          level: config.level,
        });
      }
    } else {
      targets.push({
        target: 'pino/file',
        options: { destination: output.path, mkdir: true },
        level: config.level,
      });
    }
  }

  if (targets.length === 0) return undefined;
  // Once a transport exists, fd 1 only gets what a target writes there
  if (jsonStdout) {
    targets.push({ target: 'pino/file', options: { destination: 1 }, level: config.level });
  }
  if (targets.length === 1) return targets[0];
  return { targets };
}

class PinoLoggerAdapter implements Logger {
  constructor(
    private readonly pino: PinoLogger,
    private readonly defaultContext: LogContext = {}
  ) {}

  get level(): LogLevel {
    const level = this.pino.level;
    return isLogLevel(level) ? level : 'info';
  }

  private merge(context?: LogContext): LogContext {
    return { ...this.defaultContext, ...context };
  }

  trace(msg: string, context?: LogContext): void {
    this.pino.trace(this.merge(context), msg);
  }

  debug(msg: string, context?: LogContext): void {
    this.pino.debug(this.merge(context), msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info(this.merge(context), msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn(this.merge(context), msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error(this.merge(context), msg);
  }

  fatal(msg: string, context?: LogContext): void {
    this.pino.fatal(this.merge(context), msg);
  }

  child(context: LogContext): Logger {
    return new PinoLoggerAdapter(this.pino, this.merge(context));
  }
}

function isLogLevel(value: string): value is LogLevel {
  return ['trace', 'debug', 'info', 'warn', 'error', 'fatal'].includes(value);
}

export function createLogger(config: LoggingConfig): Logger {
  const options = createPinoOptions(config);
  const transport = createTransport(config);
  const instance = transport ? pino(options, pino.transport(transport)) : pino(options);
  return new PinoLoggerAdapter(instance);
}

let globalLogger: Logger | null = null;

export function initializeLogger(config: LoggingConfig): Logger {
  globalLogger = createLogger(config);
  return globalLogger;
}

/** Throws until `initializeLogger()` has run. */
export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error('Logger not initialized. Call initializeLogger() first.');
  }
  return globalLogger;
}

export function isLoggerInitialized(): boolean {
  return globalLogger !== null;
}

/**
 * Logger that discards everything. Used where no logger was supplied.
 */
export function createNoopLogger(): Logger {
  const noop: Logger = {
    trace: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    fatal: () => {},
    child: () => noop,
    level: 'info',
  };
  return noop;
}
