import { providers } from 'ethers';
import path from 'path';
import { CommandModule, Options } from 'yargs';

import { DEFAULT_ICM_CONTRACTS_VERSION, ICM_CONTRACTS_DIR } from '../consts.js';
import { CommandModuleWithContext } from '../context/types.js';
import { MessengerDeployer, getMessengerAssets } from '../deploy/messenger.js';
import { log, logBlue, logGreen, logTable } from '../logger.js';
import {
  assertMessengerDeployed,
  encodeMessage,
  sendCrossChainMessage,
  waitForMessageDelivery,
} from '../send/message.js';
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
export const messengerCommand: CommandModule = {
  command: 'messenger',
  describe: 'Deploy the interchain messenger and send messages through it',
  builder: (yargs) =>
    yargs
      .command(deployCommand)
      .command(sendMessageCommand)
      .version(false)
      .demandCommand(),
  handler: () => log('Command required'),
};

const versionOption: Options = {
  type: 'string',
  description: 'Release of the messenger contracts',
  default: DEFAULT_ICM_CONTRACTS_VERSION,
};

const assetsDirOption: Options = {
  type: 'string',
  description: 'Directory caching the release assets',
  defaultDescription: '<home>/bin/icm-contracts',
};

const deployCommand: CommandModuleWithContext<{
  rpc: string;
  version: string;
  key?: string;
  registry: boolean;
  forceRegistry: boolean;
  assetsDir?: string;
}> = {
  command: 'deploy',
  describe: 'Deploy the messenger and a registry to an EVM blockchain',
  builder: {
    rpc: demandOption(rpcCommandOption),
    version: versionOption,
    key: keyCommandOption,
    registry: {
      type: 'boolean',
      description: 'Deploy a registry next to a new messenger',
      default: true,
    },
    'force-registry': {
      type: 'boolean',
      description: 'Deploy a registry even if the messenger already exists',
      default: false,
    },
    'assets-dir': assetsDirOption,
  },
  handler: async ({
    context,
    rpc,
    version,
    key,
    registry,
    forceRegistry,
    assetsDir,
  }) => {
    const provider = new providers.JsonRpcProvider(rpc);
    const funder = await getSigner({
      home: context.home,
      key,
      provider,
      skipConfirmation: context.skipConfirmation,
    });

    logBlue(`Deploying messenger ${version} to ${rpc}...`);
    const deployer = await MessengerDeployer.fromRelease(
      assetsDir ?? path.join(context.home, 'bin', ICM_CONTRACTS_DIR),
      version,
      provider,
      funder,
      context.downloader,
    );
    const result = await deployer.deploy({
      deployMessenger: true,
      deployRegistry: registry,
      forceRegistryDeploy: forceRegistry,
    });

    logTable([
      {
        messenger: result.messengerAddress ?? '-',
        alreadyDeployed: result.alreadyDeployed,
        registry: result.registryAddress ?? '-',
      },
    ]);
    logGreen('✅ Messenger deployment complete');
  },
};

const sendMessageCommand: CommandModuleWithContext<{
  message: string;
  sourceRpc: string;
  destRpc: string;
  destinationBlockchainId: string;
  destinationAddress?: string;
  messenger?: string;
  hexEncoded: boolean;
  key?: string;
  version: string;
  assetsDir?: string;
}> = {
  command: 'send-msg <message>',
  describe: 'Send a message between two blockchains and wait for its delivery',
  builder: {
    message: {
      type: 'string',
      description: 'Message to send',
    },
    'source-rpc': demandOption({
      ...rpcCommandOption,
      description: 'EVM RPC endpoint of the source blockchain',
    }),
    'dest-rpc': demandOption({
      ...rpcCommandOption,
      description: 'EVM RPC endpoint of the destination blockchain',
    }),
    'destination-blockchain-id': demandOption({
      ...blockchainIdCommandOption,
      description: 'Blockchain ID of the destination blockchain',
    }),
    'destination-address': addressCommandOption(
      'Contract receiving the message on the destination blockchain',
    ),
    messenger: addressCommandOption(
      'Messenger address, the one of the contracts release by default',
    ),
    'hex-encoded': {
      type: 'boolean',
      description: 'The message is a hex encoded payload',
      default: false,
    },
    key: keyCommandOption,
    version: versionOption,
    'assets-dir': assetsDirOption,
  },
  handler: async ({
    context,
    message,
    sourceRpc,
    destRpc,
    destinationBlockchainId,
    destinationAddress,
    messenger,
    hexEncoded,
    key,
    version,
    assetsDir,
  }) => {
    const payload = encodeMessage(message, hexEncoded);
    const sourceProvider = new providers.JsonRpcProvider(sourceRpc);
    const destProvider = new providers.JsonRpcProvider(destRpc);
    const messengerAddress =
      messenger ??
      (
        await getMessengerAssets(
          assetsDir ?? path.join(context.home, 'bin', ICM_CONTRACTS_DIR),
          version,
          context.downloader,
        )
      ).messengerContractAddress;
    await assertMessengerDeployed(sourceProvider, messengerAddress, sourceRpc);
    await assertMessengerDeployed(destProvider, messengerAddress, destRpc);

    const signer = await getSigner({
      home: context.home,
      key,
      provider: sourceProvider,
      skipConfirmation: context.skipConfirmation,
    });
    logBlue(`Delivering message from ${sourceRpc} to ${destRpc}...`);
    const { messageId, txHash } = await sendCrossChainMessage({
      signer,
      messengerAddress,
      destinationBlockchainId,
      destinationAddress,
      message: payload,
    });
    log(`Message ${messageId} sent in transaction ${txHash}`);
    await waitForMessageDelivery({
      provider: destProvider,
      messengerAddress,
      messageId,
    });

    logTable([{ messageId, txHash, delivered: true }]);
    logGreen('✅ Message successfully delivered');
  },
};
