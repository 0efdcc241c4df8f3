export { fetchWithTimeout, pollAsync, retryAsync, sleep } from './async.js';
export { safelyAccessEnvVar } from './env.js';
export { WrappedError, hasErrorCode } from './errors.js';
export {
  DEFAULT_DIR_MODE,
  DEFAULT_FILE_MODE,
  isExecutable,
  isFile,
  readFileAtPath,
  readJson,
  readYaml,
  readYamlOrJson,
  resolveFileFormat,
  resolvePath,
  stringifyJson,
  writeFileAtPath,
  writeFileAtomic,
} from './fs.js';
export type { FileFormat } from './fs.js';
export { lockPathFor, withFileLock } from './lock.js';
export type { FileLockOptions } from './lock.js';
export {
  LogFormat,
  LogLevel,
  configureRootLogger,
  createIcmPinoLogger,
  getLogFormat,
  rootLogger,
  toPinoLevel,
} from './logging.js';
export { ensure0x, errorToString, strip0x } from './strings.js';
