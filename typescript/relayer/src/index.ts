export {
  DEFAULT_RELAYER_METRICS_PORT,
  ICM_RELAYER_BIN,
  LATEST_PRERELEASE_VERSION_TAG,
  LATEST_RELEASE_VERSION_TAG,
  OFF_CHAIN_REGISTRY_SOURCE_ADDRESS,
  RELAYER_REQUIRED_BALANCE,
} from './consts.js';
export {
  RelayerAlreadyRunningError,
  RelayerConfigError,
  RelayerFundingError,
  RelayerInstallError,
  RelayerLaunchError,
  RelayerNotRunningError,
  RelayerShutdownError,
} from './errors.js';
export { NetworkKind, getNetwork } from './network.js';
export type { Network } from './network.js';
export { getKeyPath, getRelayerPaths, getRunDir } from './paths.js';
export type { RelayerPaths } from './paths.js';

export { deriveWsEndpoint } from './config/endpoints.js';
export {
  MessageFormat,
  RelayerConfigFileSchema,
  RelayerConfigSchema,
  relayerConfigToFile,
} from './config/schema.js';
export type {
  ApiConfig,
  DestinationBlockchain,
  ExtraSettings,
  MessageProtocolConfig,
  RelayerConfig,
  RelayerConfigFile,
  SourceBlockchain,
} from './config/schema.js';
export {
  MergeOutcome,
  addDestinationToRelayerConfig,
  addSourceAndDestinationToRelayerConfig,
  addSourceToRelayerConfig,
  buildBaseRelayerConfig,
  buildDestinationBlockchain,
  buildSourceBlockchain,
  createBaseRelayerConfig,
  createBaseRelayerConfigIfMissing,
  loadRelayerConfig,
  saveRelayerConfig,
  serializeRelayerConfig,
} from './config/RelayerConfig.js';
export type {
  BaseRelayerConfigOptions,
  RelayerDestinationInput,
  RelayerSourceInput,
  SourceAndDestinationOutcome,
} from './config/RelayerConfig.js';
export {
  RelayerChainRole,
  RelayerChainSpecSchema,
  isDestinationChain,
  isSourceChain,
  readRelayerChainSpecs,
} from './config/chainSpecs.js';
export type { RelayerChainSpec } from './config/chainSpecs.js';

export {
  getProcessStartTime,
  readRelayerRunFile,
  removeRelayerRunFile,
  saveRelayerRunFile,
} from './process/runFile.js';
export type { RelayerRunRecord } from './process/runFile.js';
export {
  isProcessAlive,
  isRelayerUp,
  relayerCleanup,
  stopProcess,
} from './process/RelayerProcess.js';
export type {
  RelayerLiveness,
  RelayerStopOptions,
} from './process/RelayerProcess.js';

export {
  GithubDownloader,
  ReleaseKind,
  selectReleaseTag,
} from './install/downloader.js';
export type { Downloader, GithubRelease } from './install/downloader.js';
export {
  getRelayerBinPath,
  getRelayerUrl,
  installRelayer,
  resolveRelayerVersion,
} from './install/installer.js';
export type { InstallRelayerOptions } from './install/installer.js';

export { LocalRelayer, RelayerState } from './core/LocalRelayer.js';
export type {
  LocalRelayerOptions,
  RelayerDeployOptions,
  RelayerDeployResult,
} from './core/LocalRelayer.js';

export { ensureRelayerFunded } from './funding/funding.js';
export type {
  EnsureRelayerFundedParams,
  RelayerFundingResult,
} from './funding/funding.js';
export { getRelayerKeyInfo } from './funding/keys.js';
export type { RelayerKeyInfo } from './funding/keys.js';
