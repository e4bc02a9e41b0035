import pino, { type DestinationStream, type LoggerOptions } from 'pino';

export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export interface LoggerConfiguration {
  level?: LoggerOptions['level'];
  base?: LoggerOptions['base'];
  destination?: DestinationStream;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_LEVEL: LogLevel = 'silent';
const DEFAULT_BASE = { service: 'crawl-seeds' } as const;

let activeLogger: LoggerLike = createPinoInstance();

export function configureLogger(config: LoggerConfiguration = {}): void {
  const { level = DEFAULT_LEVEL, base = DEFAULT_BASE, destination } = config;
  activeLogger = createPinoInstance({ level, base }, destination);
}

/** Logger bound to one part of the pipeline, e.g. `componentLogger('precheck')`. */
export function componentLogger(component: string): LoggerLike {
  return activeLogger.child({ component });
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

// stdout carries seed documents, so log lines always go to stderr.
function createPinoInstance(
  options: Partial<LoggerOptions> = {},
  destination: DestinationStream = pino.destination(2),
): LoggerLike {
  const merged: LoggerOptions = {
    level: options.level ?? DEFAULT_LEVEL,
    base: options.base ?? DEFAULT_BASE,
  };

  return pino(merged, destination);
}
