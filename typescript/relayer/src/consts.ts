import { ethers } from 'ethers';

export const ICM_RELAYER_BIN = 'icm-relayer';
export const ICM_RELAYER_COMPONENT = 'icm-relayer';

export const GITHUB_ORG = 'ava-labs';
export const ICM_SERVICES_REPO = 'icm-services';

export const LATEST_RELEASE_VERSION_TAG = 'latest';
export const LATEST_PRERELEASE_VERSION_TAG = 'latest-prerelease';

export const EVM_VM = 'evm';

// Sender address used by the relayer for registry-update messages
export const OFF_CHAIN_REGISTRY_SOURCE_ADDRESS =
  '0x0000000000000000000000000000000000000000';

export const DEFAULT_RELAYER_METRICS_PORT = 9091;
export const DEFAULT_DB_WRITE_INTERVAL_SECONDS = 10;
export const DEFAULT_SIGNATURE_CACHE_SIZE = 1024 * 1024;

// Process lifecycle timings
export const RELAYER_SETUP_GRACE_MS = 2_000;
export const RELAYER_CHECK_POLL_MS = 100;
export const RELAYER_STOP_TIMEOUT_MS = 3_000;
export const RELAYER_INIT_TIMEOUT_MS = 120_000;

export const RELAYER_INITIALIZED_LOG_MARKER = 'Listener initialized';

export const RELAYER_REQUIRED_BALANCE = ethers.utils.parseEther('500');
