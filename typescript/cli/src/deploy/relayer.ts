import { BigNumber, Wallet, providers } from 'ethers';

import {
  MergeOutcome,
  RelayerChainSpec,
  RelayerConfigError,
  RelayerKeyInfo,
  RelayerSourceInput,
  addDestinationToRelayerConfig,
  addSourceAndDestinationToRelayerConfig,
  addSourceToRelayerConfig,
  createBaseRelayerConfigIfMissing,
  ensureRelayerFunded,
  isDestinationChain,
  isSourceChain,
} from '@icmctl/relayer';
import { rootLogger } from '@icmctl/utils';

import { CommandContext } from '../context/types.js';

export interface ConfigureRelayerParams {
  context: CommandContext;
  chains: RelayerChainSpec[];
  relayerKey: RelayerKeyInfo;
  logLevel: string;
  metricsPort?: number;
}

export interface ChainMergeReport {
  chain: string;
  blockchainId: string;
  source?: MergeOutcome;
  destination?: MergeOutcome;
}

function chainLabel(spec: RelayerChainSpec): string {
  return spec.name ?? spec.blockchainId;
}

function toSourceInput(
  spec: RelayerChainSpec,
  rewardAddress: string,
): RelayerSourceInput {
  const { messengerAddress, registryAddress } = spec;
  if (!messengerAddress || !registryAddress) {
    throw new RelayerConfigError(
      `Source chain ${chainLabel(spec)} needs a messenger and a registry address`,
    );
  }
  return {
    subnetID: spec.subnetId,
    blockchainID: spec.blockchainId,
    rpcEndpoint: spec.rpcUrl,
    wsEndpoint: spec.wsUrl,
    messengerAddress,
    registryAddress,
    rewardAddress,
  };
}

/**
 * Creates the relayer configuration when missing and merges every chain
 * into it. The relayer account is both the reward address on sources and
 * the paying account on destinations.
 */
export async function configureRelayerForChains({
  context,
  chains,
  relayerKey,
  logLevel,
  metricsPort,
}: ConfigureRelayerParams): Promise<ChainMergeReport[]> {
  const { configPath, storageDir } = context.paths;
  await createBaseRelayerConfigIfMissing(configPath, {
    logLevel,
    storageLocation: storageDir,
    network: context.network,
    metricsPort,
  });

  const reports: ChainMergeReport[] = [];
  for (const spec of chains) {
    const report: ChainMergeReport = {
      chain: chainLabel(spec),
      blockchainId: spec.blockchainId,
    };
    const destination = {
      subnetID: spec.subnetId,
      blockchainID: spec.blockchainId,
      rpcEndpoint: spec.rpcUrl,
      privateKey: relayerKey.privateKey,
    };
    if (isSourceChain(spec) && isDestinationChain(spec)) {
      Object.assign(
        report,
        await addSourceAndDestinationToRelayerConfig(
          configPath,
          toSourceInput(spec, relayerKey.address),
          destination,
        ),
      );
    } else if (isSourceChain(spec)) {
      report.source = await addSourceToRelayerConfig(
        configPath,
        toSourceInput(spec, relayerKey.address),
      );
    } else {
      report.destination = await addDestinationToRelayerConfig(
        configPath,
        destination,
      );
    }
    reports.push(report);
  }
  return reports;
}

export interface FundRelayerParams {
  chains: RelayerChainSpec[];
  relayerAddress: string;
  fundingKey: string;
  requiredBalance?: BigNumber;
  getProvider?: (rpcUrl: string) => providers.Provider;
}

export interface ChainFundingReport {
  chain: string;
  balance: BigNumber;
  transferred: BigNumber;
}

/**
 * Tops up the relayer account on every chain it delivers messages to.
 */
export async function fundRelayerOnDestinations({
  chains,
  relayerAddress,
  fundingKey,
  requiredBalance,
  getProvider = (rpcUrl) => new providers.JsonRpcProvider(rpcUrl),
}: FundRelayerParams): Promise<ChainFundingReport[]> {
  const logger = rootLogger.child({ module: 'relayer-deploy' });
  const reports: ChainFundingReport[] = [];
  for (const spec of chains.filter(isDestinationChain)) {
    const provider = getProvider(spec.rpcUrl);
    const funder = new Wallet(fundingKey, provider);
    logger.debug(
      { chain: chainLabel(spec), funder: funder.address },
      'Funding relayer',
    );
    const { balance, transferred } = await ensureRelayerFunded({
      provider,
      funder,
      relayerAddress,
      requiredBalance,
    });
    reports.push({ chain: chainLabel(spec), balance, transferred });
  }
  return reports;
}
