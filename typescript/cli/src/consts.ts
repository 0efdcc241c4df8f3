import { ethers } from 'ethers';

export const ICM_CONTRACTS_DIR = 'icm-contracts';
export const ICM_CONTRACTS_RELEASE_URL =
  'https://github.com/ava-labs/icm-contracts/releases/download';
export const DEFAULT_ICM_CONTRACTS_VERSION = 'v1.0.0';

// The messenger deployer is a one-time account whose raw transaction is
// published with each release
export const MESSENGER_DEPLOYER_REQUIRED_BALANCE =
  ethers.utils.parseEther('10');

export const REGISTRY_CONSTRUCTOR_ABI = [
  'constructor(tuple(uint256 version, address protocolAddress)[] initialEntries)',
];

export const MESSENGER_ABI = [
  'function sendCrossChainMessage(tuple(bytes32 destinationBlockchainID, address destinationAddress, tuple(address feeTokenAddress, uint256 amount) feeInfo, uint256 requiredGasLimit, address[] allowedRelayerAddresses, bytes message) messageInput) returns (bytes32)',
  'function messageReceived(bytes32 messageID) view returns (bool)',
  'event SendCrossChainMessage(bytes32 indexed messageID, bytes32 indexed destinationBlockchainID, tuple(uint256 messageNonce, address originSenderAddress, bytes32 destinationBlockchainID, address destinationAddress, uint256 requiredGasLimit, address[] allowedRelayerAddresses, tuple(uint256 receivedMessageNonce, address relayerRewardAddress)[] receipts, bytes message) message, tuple(address feeTokenAddress, uint256 amount) feeInfo)',
];

export const MESSAGE_DELIVERY_POLL_MS = 100;
export const MESSAGE_DELIVERY_TIMEOUT_MS = 10_000;

export const TOKEN_BRIDGES_FILE = 'token-bridges.json';

export const ERC20_TOKEN_HOME_CONSTRUCTOR_ABI = [
  'constructor(address teleporterRegistryAddress, address teleporterManager, address tokenAddress, uint8 tokenDecimals)',
];

export const ERC20_TOKEN_REMOTE_CONSTRUCTOR_ABI = [
  'constructor(tuple(address teleporterRegistryAddress, address teleporterManager, bytes32 tokenHomeBlockchainID, address tokenHomeAddress, uint8 tokenHomeDecimals) settings, string tokenName, string tokenSymbol, uint8 tokenDecimals)',
];

export const TOKEN_BRIDGE_ABI = [
  'function token() view returns (address)',
  'function tokenDecimals() view returns (uint8)',
  'function registeredRemotes(bytes32 remoteBlockchainID, address remoteAddress) view returns (bool registered, uint256 collateralNeeded, uint256 tokenMultiplier, bool multiplyOnRemote)',
  'function registerWithHome(tuple(address feeTokenAddress, uint256 amount) feeInfo)',
  'function name() view returns (string)',
  'function symbol() view returns (string)',
  'function decimals() view returns (uint8)',
];

export const TOKEN_BRIDGE_REGISTRATION_POLL_MS = 100;
export const TOKEN_BRIDGE_REGISTRATION_TIMEOUT_MS = 10_000;
