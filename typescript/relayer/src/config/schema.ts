import { z } from 'zod';

import {
  DEFAULT_DB_WRITE_INTERVAL_SECONDS,
  DEFAULT_SIGNATURE_CACHE_SIZE,
} from '../consts.js';

export enum MessageFormat {
  Teleporter = 'teleporter',
  OffChainRegistry = 'off-chain-registry',
}

// Settings the relayer accepts that are not managed here, written back as read
export type ExtraSettings = Record<string, unknown>;

export interface ApiConfig {
  baseURL: string;
  queryParams: Record<string, string>;
  extra: ExtraSettings;
}

export interface TeleporterProtocolConfig {
  messageFormat: MessageFormat.Teleporter;
  settings: { rewardAddress: string };
}

export interface OffChainRegistryProtocolConfig {
  messageFormat: MessageFormat.OffChainRegistry;
  settings: { teleporterRegistryAddress: string };
}

export type MessageProtocolConfig =
  | TeleporterProtocolConfig
  | OffChainRegistryProtocolConfig;

export interface SourceBlockchain {
  subnetID: string;
  blockchainID: string;
  vm: string;
  rpcEndpoint: ApiConfig;
  wsEndpoint: ApiConfig;
  // keyed by contract address, in insertion order
  messageContracts: Map<string, MessageProtocolConfig>;
  extra: ExtraSettings;
}

export interface DestinationBlockchain {
  subnetID: string;
  blockchainID: string;
  vm: string;
  rpcEndpoint: ApiConfig;
  accountPrivateKey: string;
  extra: ExtraSettings;
}

export interface RelayerConfig {
  logLevel: string;
  pChainAPI: ApiConfig;
  infoAPI: ApiConfig;
  storageLocation: string;
  processMissedBlocks: boolean;
  metricsPort: number;
  dbWriteIntervalSeconds: number;
  signatureCacheSize: number;
  allowPrivateIPs: boolean;
  // keyed by blockchainID, in insertion order
  sourceBlockchains: Map<string, SourceBlockchain>;
  destinationBlockchains: Map<string, DestinationBlockchain>;
  extra: ExtraSettings;
}

/* On-disk shape, as read by the relayer binary */

const ApiConfigFileSchema = z
  .object({
    'base-url': z.string(),
    'query-parameters': z.record(z.string()).nullish(),
  })
  .passthrough();

const MessageProtocolFileSchema = z.discriminatedUnion('message-format', [
  z.object({
    'message-format': z.literal(MessageFormat.Teleporter),
    settings: z.object({ 'reward-address': z.string() }),
  }),
  z.object({
    'message-format': z.literal(MessageFormat.OffChainRegistry),
    settings: z.object({ 'teleporter-registry-address': z.string() }),
  }),
]);

const SourceBlockchainFileSchema = z
  .object({
    'subnet-id': z.string(),
    'blockchain-id': z.string(),
    vm: z.string(),
    'rpc-endpoint': ApiConfigFileSchema,
    'ws-endpoint': ApiConfigFileSchema,
    'message-contracts': z.record(MessageProtocolFileSchema),
  })
  .passthrough();

const DestinationBlockchainFileSchema = z
  .object({
    'subnet-id': z.string(),
    'blockchain-id': z.string(),
    vm: z.string(),
    'rpc-endpoint': ApiConfigFileSchema,
    'account-private-key': z.string(),
  })
  .passthrough();

export const RelayerConfigFileSchema = z
  .object({
    'log-level': z.string(),
    'p-chain-api': ApiConfigFileSchema,
    'info-api': ApiConfigFileSchema,
    'storage-location': z.string(),
    'process-missed-blocks': z.boolean().default(false),
    'source-blockchains': z.array(SourceBlockchainFileSchema).nullish(),
    'destination-blockchains': z
      .array(DestinationBlockchainFileSchema)
      .nullish(),
    'metrics-port': z.number().int().nonnegative(),
    'db-write-interval-seconds': z
      .number()
      .int()
      .positive()
      .default(DEFAULT_DB_WRITE_INTERVAL_SECONDS),
    'signature-cache-size': z
      .number()
      .int()
      .positive()
      .default(DEFAULT_SIGNATURE_CACHE_SIZE),
    'allow-private-ips': z.boolean().default(false),
  })
  .passthrough();

type ApiConfigFile = z.infer<typeof ApiConfigFileSchema>;
type MessageProtocolFile = z.infer<typeof MessageProtocolFileSchema>;
type SourceBlockchainFile = z.infer<typeof SourceBlockchainFileSchema>;
type DestinationBlockchainFile = z.infer<
  typeof DestinationBlockchainFileSchema
>;
export type RelayerConfigFile = z.infer<typeof RelayerConfigFileSchema>;

function extraSettings(
  entry: Record<string, unknown>,
  schema: { shape: Record<string, unknown> },
): ExtraSettings {
  return Object.fromEntries(
    Object.entries(entry).filter(([key]) => !(key in schema.shape)),
  );
}

function apiConfigFromFile(api: ApiConfigFile): ApiConfig {
  return {
    baseURL: api['base-url'],
    queryParams: api['query-parameters'] ?? {},
    extra: extraSettings(api, ApiConfigFileSchema),
  };
}

function apiConfigToFile(api: ApiConfig): ApiConfigFile {
  return {
    'base-url': api.baseURL,
    'query-parameters': api.queryParams,
    ...api.extra,
  };
}

function messageProtocolFromFile(
  protocol: MessageProtocolFile,
): MessageProtocolConfig {
  switch (protocol['message-format']) {
    case MessageFormat.Teleporter:
      return {
        messageFormat: MessageFormat.Teleporter,
        settings: { rewardAddress: protocol.settings['reward-address'] },
      };
    case MessageFormat.OffChainRegistry:
      return {
        messageFormat: MessageFormat.OffChainRegistry,
        settings: {
          teleporterRegistryAddress:
            protocol.settings['teleporter-registry-address'],
        },
      };
  }
}

function messageProtocolToFile(
  protocol: MessageProtocolConfig,
): MessageProtocolFile {
  switch (protocol.messageFormat) {
    case MessageFormat.Teleporter:
      return {
        'message-format': MessageFormat.Teleporter,
        settings: { 'reward-address': protocol.settings.rewardAddress },
      };
    case MessageFormat.OffChainRegistry:
      return {
        'message-format': MessageFormat.OffChainRegistry,
        settings: {
          'teleporter-registry-address':
            protocol.settings.teleporterRegistryAddress,
        },
      };
  }
}

function sourceFromFile(source: SourceBlockchainFile): SourceBlockchain {
  return {
    subnetID: source['subnet-id'],
    blockchainID: source['blockchain-id'],
    vm: source.vm,
    rpcEndpoint: apiConfigFromFile(source['rpc-endpoint']),
    wsEndpoint: apiConfigFromFile(source['ws-endpoint']),
    messageContracts: new Map(
      Object.entries(source['message-contracts']).map(
        ([address, protocol]) => [address, messageProtocolFromFile(protocol)],
      ),
    ),
    extra: extraSettings(source, SourceBlockchainFileSchema),
  };
}

function sourceToFile(source: SourceBlockchain): SourceBlockchainFile {
  return {
    'subnet-id': source.subnetID,
    'blockchain-id': source.blockchainID,
    vm: source.vm,
    'rpc-endpoint': apiConfigToFile(source.rpcEndpoint),
    'ws-endpoint': apiConfigToFile(source.wsEndpoint),
    'message-contracts': Object.fromEntries(
      [...source.messageContracts].map(([address, protocol]) => [
        address,
        messageProtocolToFile(protocol),
      ]),
    ),
    ...source.extra,
  };
}

function destinationFromFile(
  destination: DestinationBlockchainFile,
): DestinationBlockchain {
  return {
    subnetID: destination['subnet-id'],
    blockchainID: destination['blockchain-id'],
    vm: destination.vm,
    rpcEndpoint: apiConfigFromFile(destination['rpc-endpoint']),
    accountPrivateKey: destination['account-private-key'],
    extra: extraSettings(destination, DestinationBlockchainFileSchema),
  };
}

function destinationToFile(
  destination: DestinationBlockchain,
): DestinationBlockchainFile {
  return {
    'subnet-id': destination.subnetID,
    'blockchain-id': destination.blockchainID,
    vm: destination.vm,
    'rpc-endpoint': apiConfigToFile(destination.rpcEndpoint),
    'account-private-key': destination.accountPrivateKey,
    ...destination.extra,
  };
}

function indexByBlockchainID<T extends { blockchainID: string }>(
  entries: T[],
  table: string,
  ctx: z.RefinementCtx,
): Map<string, T> {
  const indexed = new Map<string, T>();
  for (const entry of entries) {
    if (indexed.has(entry.blockchainID)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate ${table} entry for blockchain ${entry.blockchainID}`,
      });
      continue;
    }
    indexed.set(entry.blockchainID, entry);
  }
  return indexed;
}

export const RelayerConfigSchema = RelayerConfigFileSchema.transform(
  (file, ctx): RelayerConfig => ({
    logLevel: file['log-level'],
    pChainAPI: apiConfigFromFile(file['p-chain-api']),
    infoAPI: apiConfigFromFile(file['info-api']),
    storageLocation: file['storage-location'],
    processMissedBlocks: file['process-missed-blocks'],
    metricsPort: file['metrics-port'],
    dbWriteIntervalSeconds: file['db-write-interval-seconds'],
    signatureCacheSize: file['signature-cache-size'],
    allowPrivateIPs: file['allow-private-ips'],
    sourceBlockchains: indexByBlockchainID(
      (file['source-blockchains'] ?? []).map(sourceFromFile),
      'source',
      ctx,
    ),
    destinationBlockchains: indexByBlockchainID(
      (file['destination-blockchains'] ?? []).map(destinationFromFile),
      'destination',
      ctx,
    ),
    extra: extraSettings(file, RelayerConfigFileSchema),
  }),
);

/**
 * Converts the in-memory config to the relayer's file layout. Managed keys
 * come first in a fixed order, followed by any other settings read from disk.
 */
export function relayerConfigToFile(config: RelayerConfig): RelayerConfigFile {
  return {
    'log-level': config.logLevel,
    'p-chain-api': apiConfigToFile(config.pChainAPI),
    'info-api': apiConfigToFile(config.infoAPI),
    'storage-location': config.storageLocation,
    'process-missed-blocks': config.processMissedBlocks,
    'source-blockchains': [...config.sourceBlockchains.values()].map(
      sourceToFile,
    ),
    'destination-blockchains': [...config.destinationBlockchains.values()].map(
      destinationToFile,
    ),
    'metrics-port': config.metricsPort,
    'db-write-interval-seconds': config.dbWriteIntervalSeconds,
    'signature-cache-size': config.signatureCacheSize,
    'allow-private-ips': config.allowPrivateIPs,
    ...config.extra,
  };
}
