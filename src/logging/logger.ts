import pino, { type DestinationStream, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LogContext {
  component?: string;
  requestId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  level: LogLevel;
  /**
   * File to append JSON lines to. The agent's terminal UI owns stdout, so
   * anything other than `'stderr'` is treated as a path.
   */
  destination?: string | 'stderr';
}

class PinoBackedLogger implements Logger {
  constructor(
    private readonly pino: PinoLogger,
    private readonly context: LogContext = {},
  ) {}

  debug(msg: string, context?: LogContext): void {
    this.pino.debug({ ...this.context, ...context }, msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info({ ...this.context, ...context }, msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn({ ...this.context, ...context }, msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error({ ...this.context, ...context }, msg);
  }

  child(context: LogContext): Logger {
    return new PinoBackedLogger(this.pino, { ...this.context, ...context });
  }
}

function createDestination(destination: LoggerOptions['destination']): DestinationStream {
  if (!destination || destination === 'stderr') {
    return pino.destination(2);
  }

  return pino.destination({ dest: destination, mkdir: true, sync: false });
}

export function createLogger(options: LoggerOptions): Logger {
  const instance = pino(
    {
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      base: { name: 'shellgate', pid: process.pid },
      formatters: {
        level: (label) => ({ level: label }),
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    createDestination(options.destination),
  );

  return new PinoBackedLogger(instance);
}

/** Logger that drops everything; the default wherever none is injected. */
export function createSilentLogger(): Logger {
  return new PinoBackedLogger(pino({ level: 'silent' }));
}
