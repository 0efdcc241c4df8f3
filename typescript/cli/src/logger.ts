import chalk, { ChalkInstance } from 'chalk';
import { pino } from 'pino';
import { format } from 'util';

import {
  LogFormat,
  LogLevel,
  configureRootLogger,
  getLogFormat,
  rootLogger,
  safelyAccessEnvVar,
} from '@icmctl/utils';

let logger = rootLogger;

function parseLogFormat(value?: string): LogFormat | undefined {
  return Object.values(LogFormat).find((f) => f === value);
}

function parseLogLevel(value?: string): LogLevel | undefined {
  return Object.values(LogLevel).find((l) => l === value);
}

export function configureLogger(logFormat?: string, logLevel?: string) {
  const resolvedFormat =
    parseLogFormat(logFormat) ??
    parseLogFormat(safelyAccessEnvVar('LOG_FORMAT', true)) ??
    LogFormat.Pretty;
  const resolvedLevel =
    parseLogLevel(logLevel) ??
    parseLogLevel(safelyAccessEnvVar('LOG_LEVEL', true)) ??
    LogLevel.Info;
  logger = configureRootLogger(resolvedFormat, resolvedLevel).child({
    module: 'cli',
  });
}

export const log = (...args: unknown[]) => logger.info(format(...args));

export function logColor(
  level: pino.Level,
  chalkInstance: ChalkInstance,
  ...args: unknown[]
) {
  // Only use color when pretty is enabled
  if (getLogFormat() === LogFormat.Pretty) {
    logger[level](chalkInstance(...args));
  } else {
    logger[level](format(...args));
  }
}
export const logBlue = (...args: unknown[]) =>
  logColor('info', chalk.blue, ...args);
export const logGray = (...args: unknown[]) =>
  logColor('info', chalk.gray, ...args);
export const logGreen = (...args: unknown[]) =>
  logColor('info', chalk.green, ...args);
export const warnYellow = (...args: unknown[]) =>
  logColor('warn', chalk.yellow, ...args);
export const errorRed = (...args: unknown[]) =>
  logColor('error', chalk.red, ...args);

// No support for table in pino so print directly to console
export const logTable = (data: unknown, columns?: string[]) =>
  console.table(data, columns);
