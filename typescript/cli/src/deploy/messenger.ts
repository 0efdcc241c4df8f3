import { ContractFactory, Signer, providers, utils } from 'ethers';
import path from 'path';

import { Downloader, GithubDownloader } from '@icmctl/relayer';
import {
  WrappedError,
  ensure0x,
  isFile,
  readFileAtPath,
  rootLogger,
  writeFileAtPath,
} from '@icmctl/utils';

import {
  ICM_CONTRACTS_RELEASE_URL,
  MESSENGER_DEPLOYER_REQUIRED_BALANCE,
  REGISTRY_CONSTRUCTOR_ABI,
} from '../consts.js';

export class MessengerDeployError extends WrappedError {}

export interface MessengerAssets {
  messengerContractAddress: string;
  messengerDeployerAddress: string;
  messengerDeployerTx: string;
  registryBytecode: string;
}

const ASSET_FILES: Record<keyof MessengerAssets, (version: string) => string> =
  {
    messengerContractAddress: (v) =>
      `TeleporterMessenger_Contract_Address_${v}.txt`,
    messengerDeployerAddress: (v) =>
      `TeleporterMessenger_Deployer_Address_${v}.txt`,
    messengerDeployerTx: (v) =>
      `TeleporterMessenger_Deployment_Transaction_${v}.txt`,
    registryBytecode: (v) => `TeleporterRegistry_Bytecode_${v}.txt`,
  };

export function getMessengerAssetUrl(version: string, file: string): string {
  return `${ICM_CONTRACTS_RELEASE_URL}/${encodeURIComponent(version)}/${file}`;
}

export interface MessengerDeployOptions {
  deployMessenger: boolean;
  deployRegistry: boolean;
  // Deploy a registry even when the messenger was already on chain
  forceRegistryDeploy?: boolean;
}

export interface MessengerDeployResult {
  alreadyDeployed: boolean;
  messengerAddress?: string;
  registryAddress?: string;
}

/**
 * Deploys the messenger through its published keyless deployment
 * transaction, so it lands on the same address on every chain, and a
 * registry pointing at it.
 */
export class MessengerDeployer {
  protected readonly logger = rootLogger.child({ module: 'MessengerDeployer' });

  constructor(
    protected readonly provider: providers.Provider,
    protected readonly funder: Signer,
    protected readonly assets: MessengerAssets,
  ) {}

  static async fromRelease(
    assetsDir: string,
    version: string,
    provider: providers.Provider,
    funder: Signer,
    downloader: Downloader = new GithubDownloader(),
  ): Promise<MessengerDeployer> {
    const assets = await getMessengerAssets(assetsDir, version, downloader);
    return new MessengerDeployer(provider, funder, assets);
  }

  get messengerAddress(): string {
    return this.assets.messengerContractAddress;
  }

  async deploy({
    deployMessenger,
    deployRegistry,
    forceRegistryDeploy = false,
  }: MessengerDeployOptions): Promise<MessengerDeployResult> {
    const result: MessengerDeployResult = { alreadyDeployed: false };
    if (deployMessenger) {
      result.alreadyDeployed = await this.deployMessenger();
      result.messengerAddress = this.messengerAddress;
    }
    // A messenger found on chain already has its registry
    if (
      deployRegistry &&
      (!deployMessenger || !result.alreadyDeployed || forceRegistryDeploy)
    ) {
      result.registryAddress = await this.deployRegistry();
    }
    return result;
  }

  /**
   * @returns whether the messenger was already deployed
   */
  async deployMessenger(): Promise<boolean> {
    const { messengerContractAddress, messengerDeployerAddress } = this.assets;
    let code: string;
    try {
      code = await this.provider.getCode(messengerContractAddress);
    } catch (error) {
      throw new MessengerDeployError(
        `Failed to read code at ${messengerContractAddress}`,
        error,
      );
    }
    if (code !== '0x') {
      this.logger.info(
        `Messenger has already been deployed at ${messengerContractAddress}`,
      );
      return true;
    }

    await this.fundDeployer(messengerDeployerAddress);
    try {
      const tx = await this.provider.sendTransaction(
        this.assets.messengerDeployerTx,
      );
      await tx.wait();
    } catch (error) {
      throw new MessengerDeployError(
        'Failed to broadcast the messenger deployment transaction',
        error,
      );
    }
    this.logger.info(`Messenger deployed at ${messengerContractAddress}`);
    return false;
  }

  async deployRegistry(): Promise<string> {
    const factory = new ContractFactory(
      REGISTRY_CONSTRUCTOR_ABI,
      this.assets.registryBytecode,
      this.funder,
    );
    const deployTx = factory.getDeployTransaction([
      { version: 1, protocolAddress: this.messengerAddress },
    ]);
    let contractAddress: string | undefined;
    try {
      const tx = await this.funder.sendTransaction(deployTx);
      ({ contractAddress } = await tx.wait());
    } catch (error) {
      throw new MessengerDeployError('Failed to deploy the registry', error);
    }
    if (!contractAddress) {
      throw new MessengerDeployError(
        'Registry deployment receipt has no contract address',
      );
    }
    this.logger.info(`Registry deployed at ${contractAddress}`);
    return contractAddress;
  }

  protected async fundDeployer(deployerAddress: string): Promise<void> {
    const balance = await this.provider.getBalance(deployerAddress);
    if (balance.gte(MESSENGER_DEPLOYER_REQUIRED_BALANCE)) return;
    const shortfall = MESSENGER_DEPLOYER_REQUIRED_BALANCE.sub(balance);
    this.logger.info(
      `Funding messenger deployer ${deployerAddress} with ${utils.formatEther(shortfall)}`,
    );
    try {
      const tx = await this.funder.sendTransaction({
        to: deployerAddress,
        value: shortfall,
      });
      await tx.wait();
    } catch (error) {
      throw new MessengerDeployError(
        `Failed to fund messenger deployer ${deployerAddress}`,
        error,
      );
    }
  }
}

/**
 * Reads the release assets of a contracts version from assetsDir/<version>,
 * downloading the ones not cached yet.
 */
export async function getMessengerAssets(
  assetsDir: string,
  version: string,
  downloader: Downloader = new GithubDownloader(),
): Promise<MessengerAssets> {
  const versionDir = path.join(assetsDir, version);
  const read = async (key: keyof MessengerAssets): Promise<string> => {
    const file = ASSET_FILES[key](version);
    const assetPath = path.join(versionDir, file);
    if (!isFile(assetPath)) {
      const content = await downloader.download(
        getMessengerAssetUrl(version, file),
      );
      writeFileAtPath(assetPath, Buffer.from(content).toString('utf8'));
    }
    return readFileAtPath(assetPath).trim();
  };

  const messengerContractAddress = await read('messengerContractAddress');
  const messengerDeployerAddress = await read('messengerDeployerAddress');
  const messengerDeployerTx = await read('messengerDeployerTx');
  const registryBytecode = await read('registryBytecode');

  for (const [name, address] of [
    ['messenger contract address', messengerContractAddress],
    ['messenger deployer address', messengerDeployerAddress],
  ]) {
    if (!utils.isAddress(address)) {
      throw new MessengerDeployError(
        `Invalid ${name} ${address} in release ${version}`,
      );
    }
  }
  return {
    messengerContractAddress: utils.getAddress(messengerContractAddress),
    messengerDeployerAddress: utils.getAddress(messengerDeployerAddress),
    messengerDeployerTx: ensure0x(messengerDeployerTx),
    registryBytecode: ensure0x(registryBytecode),
  };
}
