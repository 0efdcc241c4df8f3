import os from 'os';
import path from 'path';
import { Options } from 'yargs';

import {
  DEFAULT_RELAYER_METRICS_PORT,
  LATEST_PRERELEASE_VERSION_TAG,
  NetworkKind,
} from '@icmctl/relayer';
import { LogFormat, LogLevel } from '@icmctl/utils';

import { ENV } from '../utils/env.js';

/* Global options */

export const DEFAULT_HOME = path.join(os.homedir(), '.icmctl');

export const demandOption = (option: Options): Options => ({
  ...option,
  demandOption: true,
});

export const logFormatCommandOption: Options = {
  type: 'string',
  description: 'Log output format',
  choices: Object.values(LogFormat),
};

export const logLevelCommandOption: Options = {
  type: 'string',
  description: 'Log verbosity level',
  choices: Object.values(LogLevel),
};

export const homeCommandOption: Options = {
  type: 'string',
  description: 'Directory holding binaries, keys and relayer run files',
  default: ENV.ICMCTL_HOME ?? DEFAULT_HOME,
  defaultDescription: 'process.env.ICMCTL_HOME or ~/.icmctl',
};

export const networkCommandOption: Options = {
  type: 'string',
  description: 'Network the relayer and contracts belong to',
  choices: Object.values(NetworkKind),
  default: NetworkKind.Local,
  alias: 'n',
};

export const endpointCommandOption: Options = {
  type: 'string',
  description: 'Primary network API endpoint, required for devnets',
};

export const skipConfirmationOption: Options = {
  type: 'boolean',
  description: 'Skip confirmation prompts',
  default: false,
  alias: 'y',
};

export const keyCommandOption: Options = {
  type: 'string',
  description:
    'A hex private key, or the name of a key under <home>/keys, for transaction signing. Defaults to the ICM_KEY env var.',
  alias: 'k',
  default: ENV.ICM_KEY,
  defaultDescription: 'process.env.ICM_KEY',
};

/* Command-specific options */

export const versionCommandOption = (component: string): Options => ({
  type: 'string',
  description: `Release of ${component} to use, a tag, latest or latest-prerelease`,
  default: LATEST_PRERELEASE_VERSION_TAG,
});

export const binPathCommandOption: Options = {
  type: 'string',
  description: 'Run this relayer binary instead of installing a release',
};

export const fundingKeyCommandOption: Options = {
  ...keyCommandOption,
  description:
    'A hex private key, or the name of a key under <home>/keys, funding the relayer. Defaults to the ICM_KEY env var.',
};

export const relayerKeyCommandOption: Options = {
  type: 'string',
  description:
    'Path of the relayer account key file, created when it does not exist',
};

export const waitCommandOption: Options = {
  type: 'boolean',
  description:
    'Wait until the relayer listens on every source chain, disable with --no-wait',
  default: true,
};

export const relayerLogLevelCommandOption: Options = {
  type: 'string',
  description: 'Log level written to the relayer configuration',
  choices: Object.values(LogLevel).filter((level) => level !== LogLevel.Off),
  default: LogLevel.Info,
};

export const metricsPortCommandOption: Options = {
  type: 'number',
  description: 'Port the relayer serves metrics on',
  default: DEFAULT_RELAYER_METRICS_PORT,
};

export const rpcCommandOption: Options = {
  type: 'string',
  description: 'EVM RPC endpoint of the blockchain',
};

export const chainSpecsCommandOption: Options = {
  type: 'string',
  description: 'A YAML or JSON file listing the chains to relay between',
  alias: 'c',
};

export const subnetIdCommandOption: Options = {
  type: 'string',
  description: 'Subnet ID of the blockchain',
};

export const blockchainIdCommandOption: Options = {
  type: 'string',
  description: 'Blockchain ID of the blockchain',
};

export const wsCommandOption: Options = {
  type: 'string',
  description:
    'Websocket endpoint of the blockchain, derived from the RPC endpoint when omitted',
};

export const addressCommandOption = (description: string): Options => ({
  type: 'string',
  description,
});
