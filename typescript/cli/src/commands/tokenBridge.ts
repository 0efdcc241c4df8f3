import { providers } from 'ethers';
import path from 'path';
import { CommandModule } from 'yargs';

import { getRunDir } from '@icmctl/relayer';

import { TOKEN_BRIDGES_FILE } from '../consts.js';
import { CommandModuleWithContext } from '../context/types.js';
import { TokenBridgeDeployer } from '../deploy/bridge.js';
import { log, logBlue, logGreen, logTable } from '../logger.js';
import { getSigner } from '../utils/keys.js';

import {
  addressCommandOption,
  blockchainIdCommandOption,
  demandOption,
  keyCommandOption,
  rpcCommandOption,
} from './options.js';

/**
 * Parent command
 */
export const tokenBridgeCommand: CommandModule = {
  command: 'token-bridge',
  describe: 'Deploy ERC20 token bridges between blockchains',
  builder: (yargs) =>
    yargs.command(deployCommand).version(false).demandCommand(),
  handler: () => log('Command required'),
};

const deployCommand: CommandModuleWithContext<{
  homeRpc: string;
  homeBlockchainId: string;
  homeRegistry: string;
  homeKey?: string;
  erc20Token?: string;
  useHome?: string;
  remoteRpc: string;
  remoteBlockchainId: string;
  remoteRegistry: string;
  remoteKey?: string;
  remoteDecimals?: number;
  contractsDir: string;
}> = {
  command: 'deploy',
  describe: 'Deploy a token home and a token remote, and register them',
  builder: {
    'home-rpc': demandOption({
      ...rpcCommandOption,
      description: 'EVM RPC endpoint of the token home blockchain',
    }),
    'home-blockchain-id': demandOption({
      ...blockchainIdCommandOption,
      description: 'Blockchain ID of the token home blockchain',
    }),
    'home-registry': demandOption(
      addressCommandOption('Messenger registry on the token home blockchain'),
    ),
    'home-key': {
      ...keyCommandOption,
      alias: undefined,
      description:
        'Key deploying the token home, a hex private key or a key name. Defaults to the ICM_KEY env var.',
    },
    'erc20-token': {
      ...addressCommandOption('ERC20 token to bridge through a new home'),
      conflicts: 'use-home',
    },
    'use-home': addressCommandOption(
      'Existing token home to bridge instead of deploying one',
    ),
    'remote-rpc': demandOption({
      ...rpcCommandOption,
      description: 'EVM RPC endpoint of the token remote blockchain',
    }),
    'remote-blockchain-id': demandOption({
      ...blockchainIdCommandOption,
      description: 'Blockchain ID of the token remote blockchain',
    }),
    'remote-registry': demandOption(
      addressCommandOption('Messenger registry on the token remote blockchain'),
    ),
    'remote-key': {
      ...keyCommandOption,
      alias: undefined,
      description:
        'Key deploying the token remote, a hex private key or a key name. Defaults to the ICM_KEY env var.',
    },
    'remote-decimals': {
      type: 'number',
      description: 'Decimals of the token remote, those of the home by default',
    },
    'contracts-dir': demandOption({
      type: 'string',
      description:
        'Token bridge contracts checkout, built with forge build --extra-output-files bin',
    }),
  },
  handler: async ({
    context,
    homeRpc,
    homeBlockchainId,
    homeRegistry,
    homeKey,
    erc20Token,
    useHome,
    remoteRpc,
    remoteBlockchainId,
    remoteRegistry,
    remoteKey,
    remoteDecimals,
    contractsDir,
  }) => {
    const homeSigner = await getSigner({
      home: context.home,
      key: homeKey,
      provider: new providers.JsonRpcProvider(homeRpc),
      skipConfirmation: context.skipConfirmation,
    });
    const remoteSigner = await getSigner({
      home: context.home,
      key: remoteKey,
      provider: new providers.JsonRpcProvider(remoteRpc),
      skipConfirmation: context.skipConfirmation,
    });

    logBlue(`Deploying token bridge from ${homeRpc} to ${remoteRpc}...`);
    const deployer = new TokenBridgeDeployer(
      path.join(
        getRunDir(context.home, context.network.kind),
        TOKEN_BRIDGES_FILE,
      ),
      contractsDir,
    );
    const result = await deployer.deploy({
      home: {
        signer: homeSigner,
        blockchainId: homeBlockchainId,
        registryAddress: homeRegistry,
        tokenAddress: erc20Token,
        homeAddress: useHome,
      },
      remote: {
        signer: remoteSigner,
        blockchainId: remoteBlockchainId,
        registryAddress: remoteRegistry,
        decimals: remoteDecimals,
      },
    });

    logTable([
      {
        token: result.tokenAddress,
        home: result.homeAddress,
        remote: result.remoteAddress,
        alreadyDeployed: result.alreadyDeployed,
      },
    ]);
    logGreen(
      result.alreadyDeployed
        ? '✅ Token bridge already deployed'
        : '✅ Token bridge deployment complete',
    );
  },
};
