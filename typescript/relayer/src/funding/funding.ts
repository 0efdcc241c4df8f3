import { BigNumber, Signer, providers, utils } from 'ethers';

import { rootLogger } from '@icmctl/utils';

import { RELAYER_REQUIRED_BALANCE } from '../consts.js';
import { RelayerFundingError } from '../errors.js';

export interface EnsureRelayerFundedParams {
  provider: providers.Provider;
  // Must be connected to the same chain as provider
  funder: Signer;
  relayerAddress: string;
  requiredBalance?: BigNumber;
}

export interface RelayerFundingResult {
  balance: BigNumber;
  transferred: BigNumber;
}

/**
 * Tops the relayer account up to the required balance, so it can pay for
 * message delivery as soon as it starts.
 */
export async function ensureRelayerFunded({
  provider,
  funder,
  relayerAddress,
  requiredBalance = RELAYER_REQUIRED_BALANCE,
}: EnsureRelayerFundedParams): Promise<RelayerFundingResult> {
  const logger = rootLogger.child({ module: 'relayer-funding' });
  const required = utils.formatEther(requiredBalance);

  const readBalance = async () => {
    try {
      return await provider.getBalance(relayerAddress);
    } catch (error) {
      throw new RelayerFundingError(
        `Failed to read the balance of relayer ${relayerAddress}`,
        relayerAddress,
        required,
        undefined,
        error,
      );
    }
  };

  const balance = await readBalance();
  if (balance.gte(requiredBalance)) {
    logger.debug(
      { relayerAddress, balance: utils.formatEther(balance) },
      'Relayer already funded',
    );
    return { balance, transferred: BigNumber.from(0) };
  }

  const shortfall = requiredBalance.sub(balance);
  logger.info(
    `Funding relayer ${relayerAddress} with ${utils.formatEther(shortfall)}`,
  );
  try {
    const tx = await funder.sendTransaction({
      to: relayerAddress,
      value: shortfall,
    });
    await tx.wait();
  } catch (error) {
    throw new RelayerFundingError(
      `Failed to fund relayer ${relayerAddress}`,
      relayerAddress,
      required,
      utils.formatEther(balance),
      error,
    );
  }

  const newBalance = await readBalance();
  if (newBalance.lt(requiredBalance)) {
    throw new RelayerFundingError(
      `Relayer ${relayerAddress} balance ${utils.formatEther(newBalance)} is below the required ${required} after funding`,
      relayerAddress,
      required,
      utils.formatEther(newBalance),
    );
  }
  return { balance: newBalance, transferred: shortfall };
}
