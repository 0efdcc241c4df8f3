import { LevelWithSilent, pino } from 'pino';

import { safelyAccessEnvVar } from './env.js';

// Level names follow the relayer binary's own log-level option
// so the same value can be passed through to its config file.

// A custom enum definition because pino does not export an enum
// and because we use 'off' instead of 'silent'
export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Off = 'off',
}

let logLevel: LevelWithSilent =
  toPinoLevel(safelyAccessEnvVar('LOG_LEVEL', true)) || 'info';

export function toPinoLevel(level?: string): LevelWithSilent | undefined {
  if (!level) return undefined;
  if (level === 'none' || level === 'off' || level === 'silent')
    return 'silent';
  switch (level) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
      return level;
    default:
      return undefined;
  }
}

export enum LogFormat {
  Pretty = 'pretty',
  JSON = 'json',
}
let logFormat: LogFormat = LogFormat.JSON;
const envLogFormat = safelyAccessEnvVar('LOG_FORMAT', true);
if (envLogFormat === LogFormat.Pretty || envLogFormat === LogFormat.JSON)
  logFormat = envLogFormat;

export function getLogFormat() {
  return logFormat;
}

// Note, for brevity and convenience, the rootLogger is exported directly
export let rootLogger = createIcmPinoLogger(logLevel, logFormat);

export function configureRootLogger(
  newLogFormat: LogFormat,
  newLogLevel: LogLevel,
) {
  logFormat = newLogFormat;
  logLevel = toPinoLevel(newLogLevel) || logLevel;
  rootLogger = createIcmPinoLogger(logLevel, logFormat);
  return rootLogger;
}

export function createIcmPinoLogger(
  logLevel: LevelWithSilent,
  logFormat: LogFormat,
) {
  return pino({
    level: logLevel,
    name: 'icmctl',
    formatters: {
      // Remove pino's default bindings of hostname but keep pid
      bindings: (defaultBindings) => ({ pid: defaultBindings.pid }),
    },
    hooks: {
      logMethod(inputArgs, method, level) {
        // Pretty output skips pino entirely and goes straight to the console,
        // pino-pretty is not meant for interactive CLIs
        if (
          logFormat === LogFormat.Pretty &&
          logLevel !== 'silent' &&
          level >= pino.levels.values[logLevel]
        ) {
          // eslint-disable-next-line no-console
          console.log(...inputArgs);
          return;
        }
        method.apply(this, inputArgs);
      },
    },
  });
}
