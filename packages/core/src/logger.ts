import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured logger. JSON lines in production and when piped,
 * pretty-printed on an interactive terminal.
 */
function isProduction(): boolean {
  return process.env['NODE_ENV'] === 'production';
}

/** `LOG_LEVEL` when set, else `info`. */
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  return env['LOG_LEVEL'] || 'info';
}

const baseOptions: LoggerOptions = {
  level: defaultLogLevel(),
  base: { service: 'forecastr' },
  redact: {
    paths: [
      '*.apiKey',
      '*.api_key',
      '*.token',
      '*.password',
      'headers.authorization',
    ],
    remove: true,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

const transport =
  process.stderr.isTTY === true && !isProduction()
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      }
    : undefined;

const rootLogger: Logger = transport
  ? pino({ ...baseOptions, transport })
  : pino(baseOptions, pino.destination(2));

// Module loggers are created at import time, before any CLI flag is read.
const moduleLoggers = new Set<Logger>();

/** Child logger with a `module` binding. */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  const child = rootLogger.child({ module: moduleName });
  moduleLoggers.add(child);
  return child;
}

/** Change the level of the root logger and of every module logger. */
export function setLogLevel(level: string): void {
  rootLogger.level = level;
  for (const child of moduleLoggers) child.level = level;
}

export type { Logger };
