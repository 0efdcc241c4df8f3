import { ContractFactory, Signer, constants, providers, utils } from 'ethers';
import path from 'path';
import { z } from 'zod';

import {
  FileLockOptions,
  WrappedError,
  ensure0x,
  isFile,
  readFileAtPath,
  readJson,
  rootLogger,
  sleep,
  stringifyJson,
  withFileLock,
  writeFileAtomic,
} from '@icmctl/utils';

import {
  ERC20_TOKEN_HOME_CONSTRUCTOR_ABI,
  ERC20_TOKEN_REMOTE_CONSTRUCTOR_ABI,
  TOKEN_BRIDGE_ABI,
  TOKEN_BRIDGE_REGISTRATION_POLL_MS,
  TOKEN_BRIDGE_REGISTRATION_TIMEOUT_MS,
} from '../consts.js';
import { blockchainIdToBytes32 } from '../utils/blockchainId.js';

export class TokenBridgeDeployError extends WrappedError {}

export enum TokenBridgeContract {
  ERC20TokenHome = 'ERC20TokenHome',
  ERC20TokenRemote = 'ERC20TokenRemote',
}

const TOKEN_BRIDGE_INTERFACE = new utils.Interface(TOKEN_BRIDGE_ABI);

// Deploying both halves and registering can take a while
const BRIDGE_REGISTRY_LOCK_OPTIONS: FileLockOptions = {
  staleMs: 10 * 60_000,
  retryDelayMs: 500,
  maxAttempts: 600,
};

const TokenBridgeRecordSchema = z.object({
  homeBlockchainId: z.string(),
  homeAddress: z.string(),
  tokenAddress: z.string(),
  remoteBlockchainId: z.string(),
  remoteAddress: z.string(),
});

export type TokenBridgeRecord = z.infer<typeof TokenBridgeRecordSchema>;

export interface TokenBridgeEndpoint {
  // Connected to the endpoint's chain, deploys and manages its contract
  signer: Signer;
  blockchainId: string;
  registryAddress: string;
}

export interface TokenBridgeDeployRequest {
  // A token bridged through a new home, or an existing home
  home: TokenBridgeEndpoint & { tokenAddress?: string; homeAddress?: string };
  remote: TokenBridgeEndpoint & { decimals?: number };
}

export interface TokenBridgeDeployResult extends TokenBridgeRecord {
  alreadyDeployed: boolean;
  homeDeployed: boolean;
}

export interface TokenBridgeDeployerOptions {
  registrationPollMs?: number;
  registrationTimeoutMs?: number;
  lockOptions?: FileLockOptions;
}

export function getContractBinPath(
  contractsDir: string,
  contract: TokenBridgeContract,
): string {
  return path.join(contractsDir, 'out', `${contract}.sol`, `${contract}.bin`);
}

export function readContractBytecode(
  contractsDir: string,
  contract: TokenBridgeContract,
): string {
  const binPath = getContractBinPath(contractsDir, contract);
  if (!isFile(binPath)) {
    throw new TokenBridgeDeployError(
      `No compiled ${contract} found at ${binPath}, build the contracts with forge build --extra-output-files bin`,
    );
  }
  return ensure0x(readFileAtPath(binPath).trim());
}

export function readTokenBridgeRecords(
  registryPath: string,
): TokenBridgeRecord[] {
  if (!isFile(registryPath)) return [];
  const result = z.array(TokenBridgeRecordSchema).safeParse(
    readJson(registryPath),
  );
  if (!result.success) {
    const firstIssue = result.error.issues[0];
    throw new TokenBridgeDeployError(
      `Invalid token bridge registry at ${registryPath}: ${firstIssue.path.join('.')} => ${firstIssue.message}`,
      result.error,
    );
  }
  return result.data;
}

/**
 * Deploys ERC20 token bridges, a home on the token's chain and a remote on
 * another chain, and records them in a per-network registry file. A bridge
 * already recorded for the same token and chains is never deployed again.
 */
export class TokenBridgeDeployer {
  protected readonly logger = rootLogger.child({
    module: 'TokenBridgeDeployer',
  });
  protected readonly registrationPollMs: number;
  protected readonly registrationTimeoutMs: number;

  constructor(
    protected readonly registryPath: string,
    protected readonly contractsDir: string,
    protected readonly options: TokenBridgeDeployerOptions = {},
  ) {
    this.registrationPollMs =
      options.registrationPollMs ?? TOKEN_BRIDGE_REGISTRATION_POLL_MS;
    this.registrationTimeoutMs =
      options.registrationTimeoutMs ?? TOKEN_BRIDGE_REGISTRATION_TIMEOUT_MS;
  }

  async deploy(
    request: TokenBridgeDeployRequest,
  ): Promise<TokenBridgeDeployResult> {
    const homeBlockchainId = blockchainIdToBytes32(request.home.blockchainId);
    const remoteBlockchainId = blockchainIdToBytes32(
      request.remote.blockchainId,
    );
    if (homeBlockchainId === remoteBlockchainId) {
      throw new TokenBridgeDeployError(
        'Home and remote must be on different blockchains',
      );
    }

    return withFileLock(
      this.registryPath,
      () => this.deployLocked(request, homeBlockchainId, remoteBlockchainId),
      this.options.lockOptions ?? BRIDGE_REGISTRY_LOCK_OPTIONS,
    );
  }

  protected async deployLocked(
    { home, remote }: TokenBridgeDeployRequest,
    homeBlockchainId: string,
    remoteBlockchainId: string,
  ): Promise<TokenBridgeDeployResult> {
    const homeProvider = this.getProvider(home.signer);
    const remoteProvider = this.getProvider(remote.signer);
    const records = readTokenBridgeRecords(this.registryPath);

    let homeAddress = home.homeAddress
      ? utils.getAddress(home.homeAddress)
      : undefined;
    let tokenAddress: string;
    if (homeAddress) {
      [tokenAddress] = await this.read(
        homeProvider,
        homeAddress,
        'token',
        z.tuple([z.string()]),
      );
    } else if (home.tokenAddress) {
      tokenAddress = home.tokenAddress;
    } else {
      throw new TokenBridgeDeployError(
        'Either a token or an existing home address is required',
      );
    }
    tokenAddress = utils.getAddress(tokenAddress);

    const isSameToken = (record: TokenBridgeRecord) =>
      record.homeBlockchainId === homeBlockchainId &&
      record.tokenAddress === tokenAddress;
    const isSameBridge = (record: TokenBridgeRecord) =>
      isSameToken(record) && record.remoteBlockchainId === remoteBlockchainId;

    const existing = records.find(isSameBridge);
    if (
      existing &&
      (await this.hasCode(remoteProvider, existing.remoteAddress))
    ) {
      this.logger.info(
        `Token bridge for ${tokenAddress} already deployed with remote ${existing.remoteAddress}`,
      );
      return { ...existing, alreadyDeployed: true, homeDeployed: false };
    }

    let homeDeployed = false;
    if (!homeAddress) {
      const knownHome = records.find(isSameToken)?.homeAddress;
      if (knownHome && (await this.hasCode(homeProvider, knownHome))) {
        this.logger.info(`Reusing token home ${knownHome}`);
        homeAddress = knownHome;
      } else {
        homeAddress = await this.deployHome(home, tokenAddress);
        homeDeployed = true;
      }
    }

    const remoteAddress = await this.deployRemote(
      remote,
      homeProvider,
      homeBlockchainId,
      homeAddress,
      tokenAddress,
    );
    await this.registerRemote(remote.signer, remoteAddress);
    await this.waitForRegistration(
      homeProvider,
      homeAddress,
      remoteBlockchainId,
      remoteAddress,
    );

    const record: TokenBridgeRecord = {
      homeBlockchainId,
      homeAddress,
      tokenAddress,
      remoteBlockchainId,
      remoteAddress,
    };
    writeFileAtomic(
      this.registryPath,
      stringifyJson([...records.filter((r) => !isSameBridge(r)), record]),
    );
    return { ...record, alreadyDeployed: false, homeDeployed };
  }

  protected async deployHome(
    home: TokenBridgeEndpoint,
    tokenAddress: string,
  ): Promise<string> {
    const homeProvider = this.getProvider(home.signer);
    const [decimals] = await this.read(
      homeProvider,
      tokenAddress,
      'decimals',
      z.tuple([z.number().int()]),
    );
    const address = await this.deployContract(
      home.signer,
      TokenBridgeContract.ERC20TokenHome,
      ERC20_TOKEN_HOME_CONSTRUCTOR_ABI,
      [
        home.registryAddress,
        await home.signer.getAddress(),
        tokenAddress,
        decimals,
      ],
    );
    this.logger.info(`Token home deployed at ${address}`);
    return address;
  }

  protected async deployRemote(
    remote: TokenBridgeDeployRequest['remote'],
    homeProvider: providers.Provider,
    homeBlockchainId: string,
    homeAddress: string,
    tokenAddress: string,
  ): Promise<string> {
    const [name] = await this.read(
      homeProvider,
      tokenAddress,
      'name',
      z.tuple([z.string()]),
    );
    const [symbol] = await this.read(
      homeProvider,
      tokenAddress,
      'symbol',
      z.tuple([z.string()]),
    );
    const [homeDecimals] = await this.read(
      homeProvider,
      homeAddress,
      'tokenDecimals',
      z.tuple([z.number().int()]),
    );

    const address = await this.deployContract(
      remote.signer,
      TokenBridgeContract.ERC20TokenRemote,
      ERC20_TOKEN_REMOTE_CONSTRUCTOR_ABI,
      [
        {
          teleporterRegistryAddress: remote.registryAddress,
          teleporterManager: await remote.signer.getAddress(),
          tokenHomeBlockchainID: homeBlockchainId,
          tokenHomeAddress: homeAddress,
          tokenHomeDecimals: homeDecimals,
        },
        name,
        symbol,
        remote.decimals ?? homeDecimals,
      ],
    );
    this.logger.info(`Token remote deployed at ${address}`);
    return address;
  }

  protected async registerRemote(
    signer: Signer,
    remoteAddress: string,
  ): Promise<void> {
    try {
      const tx = await signer.sendTransaction({
        to: remoteAddress,
        data: TOKEN_BRIDGE_INTERFACE.encodeFunctionData('registerWithHome', [
          { feeTokenAddress: constants.AddressZero, amount: 0 },
        ]),
      });
      await tx.wait();
    } catch (error) {
      throw new TokenBridgeDeployError(
        `Failed to register remote ${remoteAddress} with its home`,
        error,
      );
    }
  }

  // Registration reaches the home through the relayer
  protected async waitForRegistration(
    homeProvider: providers.Provider,
    homeAddress: string,
    remoteBlockchainId: string,
    remoteAddress: string,
  ): Promise<void> {
    const deadline = Date.now() + this.registrationTimeoutMs;
    for (;;) {
      const [registered] = await this.read(
        homeProvider,
        homeAddress,
        'registeredRemotes',
        z.tuple([z.boolean()]).rest(z.unknown()),
        [remoteBlockchainId, remoteAddress],
      );
      if (registered) return;
      if (Date.now() >= deadline) {
        throw new TokenBridgeDeployError(
          `Timed out after ${this.registrationTimeoutMs}ms waiting for remote ${remoteAddress} to register with home ${homeAddress}`,
        );
      }
      await sleep(this.registrationPollMs);
    }
  }

  protected async deployContract(
    signer: Signer,
    contract: TokenBridgeContract,
    abi: string[],
    args: unknown[],
  ): Promise<string> {
    const factory = new ContractFactory(
      abi,
      readContractBytecode(this.contractsDir, contract),
      signer,
    );
    let contractAddress: string | undefined;
    try {
      const tx = await signer.sendTransaction(
        factory.getDeployTransaction(...args),
      );
      ({ contractAddress } = await tx.wait());
    } catch (error) {
      throw new TokenBridgeDeployError(`Failed to deploy ${contract}`, error);
    }
    if (!contractAddress) {
      throw new TokenBridgeDeployError(
        `${contract} deployment receipt has no contract address`,
      );
    }
    return contractAddress;
  }

  protected async read<T extends z.ZodTypeAny>(
    provider: providers.Provider,
    address: string,
    method: string,
    schema: T,
    args: unknown[] = [],
  ): Promise<z.infer<T>> {
    let data: string;
    try {
      data = await provider.call({
        to: address,
        data: TOKEN_BRIDGE_INTERFACE.encodeFunctionData(method, args),
      });
    } catch (error) {
      throw new TokenBridgeDeployError(
        `Failed to call ${method} on ${address}`,
        error,
      );
    }
    const result = schema.safeParse([
      ...TOKEN_BRIDGE_INTERFACE.decodeFunctionResult(method, data),
    ]);
    if (!result.success) {
      throw new TokenBridgeDeployError(
        `Unexpected result of ${method} on ${address}`,
        result.error,
      );
    }
    return result.data;
  }

  protected async hasCode(
    provider: providers.Provider,
    address: string,
  ): Promise<boolean> {
    try {
      return (await provider.getCode(address)) !== '0x';
    } catch (error) {
      throw new TokenBridgeDeployError(
        `Failed to read code at ${address}`,
        error,
      );
    }
  }

  protected getProvider(signer: Signer): providers.Provider {
    if (!signer.provider) {
      throw new TokenBridgeDeployError('Signer is not connected to a chain');
    }
    return signer.provider;
  }
}
