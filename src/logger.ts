import pino, { Logger as PinoLogger, LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const validLevels: readonly string[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
];

function isLogLevel(value: string): value is LogLevel {
  return validLevels.includes(value);
}

export function resolveLogLevel(value?: string): LogLevel {
  if (!value) {
    return 'info';
  }
  return isLogLevel(value) ? value : 'info';
}

export interface Logger {
  fatal: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  trace: (...args: unknown[]) => void;
  child: (bindings?: Record<string, unknown>) => Logger;
}

// JSON output unless we're on a terminal and nobody asked for JSON
const isTTY = process.stdout.isTTY;
const useJsonOutput = process.env.VISUAL_DISCOVER_LOG_JSON === 'true';

const baseConfig: LoggerOptions = {
  level: resolveLogLevel(process.env.VISUAL_DISCOVER_LOG_LEVEL),
  base: { app: 'visual-discover' },
};

function hasPrettyTransport(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

const pinoConfig: LoggerOptions =
  isTTY && !useJsonOutput && hasPrettyTransport()
    ? {
        ...baseConfig,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname,app',
            singleLine: false,
            messageFormat: '{msg}',
            // stdout carries the discovery result
            destination: 2,
          },
        },
      }
    : baseConfig;

const baseLogger: PinoLogger = pinoConfig.transport
  ? pino(pinoConfig)
  : pino(pinoConfig, pino.destination({ dest: 2, sync: true }));

export const logger: Logger = wrap(baseLogger);

/**
 * Change the level of the root logger. Children created afterwards inherit it.
 */
export function setLogLevel(level: LogLevel): void {
  baseLogger.level = level;
}

function wrap(instance: PinoLogger): Logger {
  return {
    fatal: (...args) => log(instance, 'fatal', args),
    error: (...args) => log(instance, 'error', args),
    warn: (...args) => log(instance, 'warn', args),
    info: (...args) => log(instance, 'info', args),
    debug: (...args) => log(instance, 'debug', args),
    trace: (...args) => log(instance, 'trace', args),
    child: bindings => wrap(instance.child(bindings ?? {})),
  };
}

/**
 * Forward to pino with either `(msg)` or `(bindings, msg)` call shapes
 */
function log(instance: PinoLogger, level: LogLevel, args: unknown[]): void {
  const [first, second, ...rest] = args;
  if (typeof first === 'string') {
    instance[level](first, second, ...rest);
    return;
  }
  if (typeof second === 'string') {
    instance[level](first, second, ...rest);
    return;
  }
  instance[level](first);
}
