import { isDeepStrictEqual } from 'util';

import {
  FileLockOptions,
  isFile,
  readJson,
  rootLogger,
  stringifyJson,
  withFileLock,
  writeFileAtomic,
} from '@icmctl/utils';

import {
  DEFAULT_DB_WRITE_INTERVAL_SECONDS,
  DEFAULT_RELAYER_METRICS_PORT,
  DEFAULT_SIGNATURE_CACHE_SIZE,
  EVM_VM,
  OFF_CHAIN_REGISTRY_SOURCE_ADDRESS,
} from '../consts.js';
import { RelayerConfigError } from '../errors.js';
import { Network, NetworkKind } from '../network.js';

import { deriveWsEndpoint } from './endpoints.js';
import {
  ApiConfig,
  DestinationBlockchain,
  MessageFormat,
  RelayerConfig,
  RelayerConfigSchema,
  SourceBlockchain,
  relayerConfigToFile,
} from './schema.js';

export interface BaseRelayerConfigOptions {
  logLevel: string;
  storageLocation: string;
  network: Network;
  metricsPort?: number;
  // Defaults to true on the local network only
  allowPrivateIPs?: boolean;
}

export interface RelayerSourceInput {
  subnetID: string;
  blockchainID: string;
  rpcEndpoint: string;
  wsEndpoint?: string;
  messengerAddress: string;
  registryAddress: string;
  rewardAddress: string;
}

export interface RelayerDestinationInput {
  subnetID: string;
  blockchainID: string;
  rpcEndpoint: string;
  privateKey: string;
}

export enum MergeOutcome {
  Added = 'added',
  Unchanged = 'unchanged',
  // blockchainID already present with different parameters, first write wins
  Conflict = 'conflict',
}

export interface SourceAndDestinationOutcome {
  source: MergeOutcome;
  destination: MergeOutcome;
}

const getLogger = () => rootLogger.child({ module: 'relayer-config' });

function apiConfig(baseURL: string): ApiConfig {
  return { baseURL, queryParams: {}, extra: {} };
}

export function buildBaseRelayerConfig(
  options: BaseRelayerConfigOptions,
): RelayerConfig {
  const { network } = options;
  return {
    logLevel: options.logLevel,
    pChainAPI: apiConfig(network.endpoint),
    infoAPI: apiConfig(network.endpoint),
    storageLocation: options.storageLocation,
    processMissedBlocks: false,
    metricsPort: options.metricsPort ?? DEFAULT_RELAYER_METRICS_PORT,
    dbWriteIntervalSeconds: DEFAULT_DB_WRITE_INTERVAL_SECONDS,
    signatureCacheSize: DEFAULT_SIGNATURE_CACHE_SIZE,
    allowPrivateIPs:
      options.allowPrivateIPs ?? network.kind === NetworkKind.Local,
    sourceBlockchains: new Map(),
    destinationBlockchains: new Map(),
    extra: {},
  };
}

export function buildSourceBlockchain(
  input: RelayerSourceInput,
): SourceBlockchain {
  return {
    subnetID: input.subnetID,
    blockchainID: input.blockchainID,
    vm: EVM_VM,
    rpcEndpoint: apiConfig(input.rpcEndpoint),
    wsEndpoint: apiConfig(
      input.wsEndpoint || deriveWsEndpoint(input.rpcEndpoint),
    ),
    messageContracts: new Map([
      [
        input.messengerAddress,
        {
          messageFormat: MessageFormat.Teleporter,
          settings: { rewardAddress: input.rewardAddress },
        },
      ],
      [
        OFF_CHAIN_REGISTRY_SOURCE_ADDRESS,
        {
          messageFormat: MessageFormat.OffChainRegistry,
          settings: { teleporterRegistryAddress: input.registryAddress },
        },
      ],
    ]),
    extra: {},
  };
}

export function buildDestinationBlockchain(
  input: RelayerDestinationInput,
): DestinationBlockchain {
  return {
    subnetID: input.subnetID,
    blockchainID: input.blockchainID,
    vm: EVM_VM,
    rpcEndpoint: apiConfig(input.rpcEndpoint),
    accountPrivateKey: input.privateKey,
    extra: {},
  };
}

export function loadRelayerConfig(filepath: string): RelayerConfig {
  let raw: unknown;
  try {
    raw = readJson(filepath);
  } catch (error) {
    throw new RelayerConfigError(
      `Failed to read relayer config at ${filepath}`,
      error,
    );
  }
  const result = RelayerConfigSchema.safeParse(raw);
  if (!result.success) {
    const firstIssue = result.error.issues[0];
    throw new RelayerConfigError(
      `Invalid relayer config at ${filepath}: ${firstIssue.path.join('.')} => ${firstIssue.message}`,
      result.error,
    );
  }
  return result.data;
}

export function serializeRelayerConfig(config: RelayerConfig): string {
  return stringifyJson(relayerConfigToFile(config));
}

export function saveRelayerConfig(
  config: RelayerConfig,
  filepath: string,
): void {
  writeFileAtomic(filepath, serializeRelayerConfig(config));
}

export async function createBaseRelayerConfig(
  filepath: string,
  options: BaseRelayerConfigOptions,
  lockOptions?: FileLockOptions,
): Promise<RelayerConfig> {
  return withFileLock(
    filepath,
    () => {
      const config = buildBaseRelayerConfig(options);
      saveRelayerConfig(config, filepath);
      return config;
    },
    lockOptions,
  );
}

/**
 * Writes a skeleton config unless one already exists.
 * @returns whether a new file was created
 */
export async function createBaseRelayerConfigIfMissing(
  filepath: string,
  options: BaseRelayerConfigOptions,
  lockOptions?: FileLockOptions,
): Promise<boolean> {
  return withFileLock(
    filepath,
    () => {
      if (isFile(filepath)) {
        getLogger().debug({ filepath }, 'Relayer config already exists');
        return false;
      }
      saveRelayerConfig(buildBaseRelayerConfig(options), filepath);
      getLogger().debug({ filepath }, 'Created base relayer config');
      return true;
    },
    lockOptions,
  );
}

// Unmanaged settings of an existing entry do not make it differ from a new one
function withoutExtraSettings(value: unknown): unknown {
  if (value instanceof Map) {
    return new Map(
      [...value].map(([key, entry]) => [key, withoutExtraSettings(entry)]),
    );
  }
  if (Array.isArray(value)) return value.map(withoutExtraSettings);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([key]) => key !== 'extra')
        .map(([key, entry]) => [key, withoutExtraSettings(entry)]),
    );
  }
  return value;
}

function mergeEntry<T extends { blockchainID: string }>(
  table: Map<string, T>,
  entry: T,
  kind: 'source' | 'destination',
): MergeOutcome {
  const existing = table.get(entry.blockchainID);
  if (!existing) {
    table.set(entry.blockchainID, entry);
    return MergeOutcome.Added;
  }
  if (
    isDeepStrictEqual(
      withoutExtraSettings(existing),
      withoutExtraSettings(entry),
    )
  ) {
    return MergeOutcome.Unchanged;
  }
  getLogger().warn(
    { blockchainID: entry.blockchainID, kind },
    `Relayer ${kind} for blockchain ${entry.blockchainID} is already configured with different parameters, keeping the existing entry`,
  );
  return MergeOutcome.Conflict;
}

async function updateRelayerConfig<T>(
  filepath: string,
  update: (config: RelayerConfig) => T,
  lockOptions?: FileLockOptions,
): Promise<T> {
  return withFileLock(
    filepath,
    () => {
      const config = loadRelayerConfig(filepath);
      const result = update(config);
      saveRelayerConfig(config, filepath);
      return result;
    },
    lockOptions,
  );
}

export async function addSourceToRelayerConfig(
  filepath: string,
  source: RelayerSourceInput,
  lockOptions?: FileLockOptions,
): Promise<MergeOutcome> {
  return updateRelayerConfig(
    filepath,
    (config) =>
      mergeEntry(
        config.sourceBlockchains,
        buildSourceBlockchain(source),
        'source',
      ),
    lockOptions,
  );
}

export async function addDestinationToRelayerConfig(
  filepath: string,
  destination: RelayerDestinationInput,
  lockOptions?: FileLockOptions,
): Promise<MergeOutcome> {
  return updateRelayerConfig(
    filepath,
    (config) =>
      mergeEntry(
        config.destinationBlockchains,
        buildDestinationBlockchain(destination),
        'destination',
      ),
    lockOptions,
  );
}

export async function addSourceAndDestinationToRelayerConfig(
  filepath: string,
  source: RelayerSourceInput,
  destination: RelayerDestinationInput,
  lockOptions?: FileLockOptions,
): Promise<SourceAndDestinationOutcome> {
  return updateRelayerConfig(
    filepath,
    (config) => ({
      source: mergeEntry(
        config.sourceBlockchains,
        buildSourceBlockchain(source),
        'source',
      ),
      destination: mergeEntry(
        config.destinationBlockchains,
        buildDestinationBlockchain(destination),
        'destination',
      ),
    }),
    lockOptions,
  );
}
