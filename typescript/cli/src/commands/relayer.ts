import { providers, utils } from 'ethers';
import { CommandModule } from 'yargs';

import {
  ICM_RELAYER_BIN,
  LocalRelayer,
  MergeOutcome,
  addDestinationToRelayerConfig,
  addSourceAndDestinationToRelayerConfig,
  addSourceToRelayerConfig,
  createBaseRelayerConfig,
  createBaseRelayerConfigIfMissing,
  ensureRelayerFunded,
  getKeyPath,
  getRelayerKeyInfo,
  loadRelayerConfig,
  readRelayerChainSpecs,
} from '@icmctl/relayer';
import { LogLevel, isFile } from '@icmctl/utils';

import { autoConfirm } from '../config/prompts.js';
import { CommandContext, CommandModuleWithContext } from '../context/types.js';
import {
  configureRelayerForChains,
  fundRelayerOnDestinations,
} from '../deploy/relayer.js';
import {
  log,
  logBlue,
  logGray,
  logGreen,
  logTable,
  warnYellow,
} from '../logger.js';
import { getSigner, resolvePrivateKey } from '../utils/keys.js';

import {
  addressCommandOption,
  binPathCommandOption,
  blockchainIdCommandOption,
  chainSpecsCommandOption,
  demandOption,
  fundingKeyCommandOption,
  metricsPortCommandOption,
  relayerKeyCommandOption,
  relayerLogLevelCommandOption,
  rpcCommandOption,
  subnetIdCommandOption,
  versionCommandOption,
  waitCommandOption,
  wsCommandOption,
} from './options.js';

/**
 * Parent command
 */
export const relayerCommand: CommandModule = {
  command: 'relayer',
  describe: 'Install, configure and run the ICM relayer',
  builder: (yargs) =>
    yargs
      .command(deployCommand)
      .command(startCommand)
      .command(stopCommand)
      .command(statusCommand)
      .command(configCommand)
      .command(fundCommand)
      .version(false)
      .demandCommand(),
  handler: () => log('Command required'),
};

function getRelayer(context: CommandContext): LocalRelayer {
  return new LocalRelayer(context.paths, { downloader: context.downloader });
}

function relayerKeyPath(context: CommandContext, override?: string): string {
  return override ?? getKeyPath(context.home, ICM_RELAYER_BIN);
}

function logMergeOutcome(
  kind: string,
  blockchainID: string,
  outcome: MergeOutcome,
) {
  switch (outcome) {
    case MergeOutcome.Added:
      logGreen(`Added ${kind} ${blockchainID}`);
      break;
    case MergeOutcome.Unchanged:
      logGray(`${kind} ${blockchainID} is already configured`);
      break;
    case MergeOutcome.Conflict:
      warnYellow(
        `${kind} ${blockchainID} is already configured with different parameters, the existing entry was kept`,
      );
      break;
  }
}

/**
 * Deploy command
 */
const deployCommand: CommandModuleWithContext<{
  chains: string;
  version: string;
  binPath?: string;
  fundingKey?: string;
  relayerKey?: string;
  logLevel: string;
  metricsPort: number;
  wait: boolean;
}> = {
  command: 'deploy',
  describe:
    'Configure the relayer for a set of chains, fund it and (re)start it',
  builder: {
    chains: demandOption(chainSpecsCommandOption),
    version: versionCommandOption('the relayer'),
    'bin-path': binPathCommandOption,
    'funding-key': fundingKeyCommandOption,
    'relayer-key': relayerKeyCommandOption,
    'log-level': relayerLogLevelCommandOption,
    'metrics-port': metricsPortCommandOption,
    wait: waitCommandOption,
  },
  handler: async ({
    context,
    chains,
    version,
    binPath,
    fundingKey,
    relayerKey,
    logLevel,
    metricsPort,
    wait,
  }) => {
    const relayer = getRelayer(context);
    if (
      relayer.isUp().alive &&
      !(await autoConfirm(
        'A relayer is already running on this network, replace it?',
        context.skipConfirmation,
      ))
    ) {
      log('Relayer deployment cancelled');
      return;
    }

    const specs = readRelayerChainSpecs(chains);
    const relayerKeyInfo = getRelayerKeyInfo(
      relayerKeyPath(context, relayerKey),
    );
    logBlue(
      `Configuring relayer ${relayerKeyInfo.address} for ${specs.length} chain(s)...`,
    );
    const reports = await configureRelayerForChains({
      context,
      chains: specs,
      relayerKey: relayerKeyInfo,
      logLevel,
      metricsPort,
    });
    logTable(
      reports.map(({ chain, blockchainId, source, destination }) => ({
        chain,
        blockchainId,
        source: source ?? '-',
        destination: destination ?? '-',
      })),
    );
    if (
      reports.some(
        (r) =>
          r.source === MergeOutcome.Conflict ||
          r.destination === MergeOutcome.Conflict,
      )
    ) {
      warnYellow(
        `Some chains were already configured with different parameters, edit ${context.paths.configPath} to change them`,
      );
    }

    if (fundingKey) {
      logBlue('Funding relayer on destination chains...');
      const funding = await fundRelayerOnDestinations({
        chains: specs,
        relayerAddress: relayerKeyInfo.address,
        fundingKey: resolvePrivateKey(context.home, fundingKey),
      });
      logTable(
        funding.map(({ chain, balance, transferred }) => ({
          chain,
          balance: utils.formatEther(balance),
          transferred: utils.formatEther(transferred),
        })),
      );
    } else {
      warnYellow(
        'No funding key given, the relayer account must be funded on every destination chain',
      );
    }

    logBlue('Starting relayer...');
    const { pid } = await relayer.deploy({
      version,
      binPath,
      waitForInitialization: wait,
    });
    logGreen(`✅ Relayer running with pid ${pid}`);
    log(`Logs can be found at ${context.paths.logPath}`);
  },
};

/**
 * Start command
 */
const startCommand: CommandModuleWithContext<{
  version: string;
  binPath?: string;
  wait: boolean;
}> = {
  command: 'start',
  describe: 'Start the relayer with its current configuration',
  builder: {
    version: versionCommandOption('the relayer'),
    'bin-path': binPathCommandOption,
    wait: waitCommandOption,
  },
  handler: async ({ context, version, binPath, wait }) => {
    if (wait) logBlue('Waiting for the relayer to listen on every source...');
    const { pid } = await getRelayer(context).start({
      version,
      binPath,
      waitForInitialization: wait,
    });
    logGreen(`✅ Relayer running with pid ${pid}`);
    log(`Logs can be found at ${context.paths.logPath}`);
  },
};

/**
 * Stop command
 */
const stopCommand: CommandModuleWithContext<{}> = {
  command: 'stop',
  describe: 'Stop the running relayer and clear its storage',
  handler: async ({ context }) => {
    await getRelayer(context).stop();
    logGreen('✅ Relayer stopped');
  },
};

/**
 * Status command
 */
const statusCommand: CommandModuleWithContext<{}> = {
  command: 'status',
  describe: 'Show the state of the relayer',
  handler: ({ context }) => {
    const relayer = getRelayer(context);
    const liveness = relayer.isUp();
    logTable([
      {
        network: context.network.kind,
        state: relayer.getState(),
        pid: liveness.alive ? liveness.pid : '-',
        config: context.paths.configPath,
        log: context.paths.logPath,
      },
    ]);
  },
};

/**
 * Config commands
 */
const configCommand: CommandModule = {
  command: 'config',
  describe: 'Create and edit the relayer configuration',
  builder: (yargs) =>
    yargs
      .command(configInitCommand)
      .command(configAddSourceCommand)
      .command(configAddDestinationCommand)
      .command(configAddCommand)
      .command(configListCommand)
      .version(false)
      .demandCommand(),
  handler: () => log('Command required'),
};

async function ensureBaseConfig(context: CommandContext) {
  const created = await createBaseRelayerConfigIfMissing(
    context.paths.configPath,
    {
      logLevel: LogLevel.Info,
      storageLocation: context.paths.storageDir,
      network: context.network,
    },
  );
  if (created) logGray(`Created ${context.paths.configPath}`);
}

const configInitCommand: CommandModuleWithContext<{
  logLevel: string;
  metricsPort: number;
}> = {
  command: 'init',
  describe: 'Write an empty relayer configuration for the network',
  builder: {
    'log-level': relayerLogLevelCommandOption,
    'metrics-port': metricsPortCommandOption,
  },
  handler: async ({ context, logLevel, metricsPort }) => {
    const { configPath, storageDir } = context.paths;
    if (
      isFile(configPath) &&
      !(await autoConfirm(
        `${configPath} already exists, overwrite it?`,
        context.skipConfirmation,
      ))
    ) {
      log('Keeping the existing relayer configuration');
      return;
    }
    await createBaseRelayerConfig(configPath, {
      logLevel,
      storageLocation: storageDir,
      network: context.network,
      metricsPort,
    });
    logGreen(`✅ Relayer configuration written to ${configPath}`);
  },
};

interface SourceArgs {
  subnetId: string;
  blockchainId: string;
  rpc: string;
  ws?: string;
  messengerAddress: string;
  registryAddress: string;
  rewardAddress?: string;
  relayerKey?: string;
}

interface DestinationArgs {
  subnetId: string;
  blockchainId: string;
  rpc: string;
  relayerKey?: string;
}

const destinationBuilder = {
  'subnet-id': demandOption(subnetIdCommandOption),
  'blockchain-id': demandOption(blockchainIdCommandOption),
  rpc: demandOption(rpcCommandOption),
  'relayer-key': relayerKeyCommandOption,
};

const sourceBuilder = {
  ...destinationBuilder,
  ws: wsCommandOption,
  'messenger-address': demandOption(
    addressCommandOption('Messenger contract address on the chain'),
  ),
  'registry-address': demandOption(
    addressCommandOption('Registry contract address on the chain'),
  ),
  'reward-address': addressCommandOption(
    'Address receiving relayer rewards, defaults to the relayer account',
  ),
};

function toSource(context: CommandContext, args: SourceArgs) {
  return {
    subnetID: args.subnetId,
    blockchainID: args.blockchainId,
    rpcEndpoint: args.rpc,
    wsEndpoint: args.ws,
    messengerAddress: args.messengerAddress,
    registryAddress: args.registryAddress,
    rewardAddress:
      args.rewardAddress ??
      getRelayerKeyInfo(relayerKeyPath(context, args.relayerKey)).address,
  };
}

function toDestination(context: CommandContext, args: DestinationArgs) {
  return {
    subnetID: args.subnetId,
    blockchainID: args.blockchainId,
    rpcEndpoint: args.rpc,
    privateKey: getRelayerKeyInfo(relayerKeyPath(context, args.relayerKey))
      .privateKey,
  };
}

const configAddSourceCommand: CommandModuleWithContext<SourceArgs> = {
  command: 'add-source',
  describe: 'Relay messages sent from a chain',
  builder: sourceBuilder,
  handler: async ({ context, ...args }) => {
    await ensureBaseConfig(context);
    const outcome = await addSourceToRelayerConfig(
      context.paths.configPath,
      toSource(context, args),
    );
    logMergeOutcome('source', args.blockchainId, outcome);
  },
};

const configAddDestinationCommand: CommandModuleWithContext<DestinationArgs> =
  {
    command: 'add-destination',
    describe: 'Deliver messages to a chain',
    builder: destinationBuilder,
    handler: async ({ context, ...args }) => {
      await ensureBaseConfig(context);
      const outcome = await addDestinationToRelayerConfig(
        context.paths.configPath,
        toDestination(context, args),
      );
      logMergeOutcome('destination', args.blockchainId, outcome);
    },
  };

const configAddCommand: CommandModuleWithContext<SourceArgs> = {
  command: 'add',
  describe: 'Relay messages both from and to a chain',
  builder: sourceBuilder,
  handler: async ({ context, ...args }) => {
    await ensureBaseConfig(context);
    const { source, destination } =
      await addSourceAndDestinationToRelayerConfig(
        context.paths.configPath,
        toSource(context, args),
        toDestination(context, args),
      );
    logMergeOutcome('source', args.blockchainId, source);
    logMergeOutcome('destination', args.blockchainId, destination);
  },
};

const configListCommand: CommandModuleWithContext<{}> = {
  command: 'list',
  describe: 'List the chains the relayer relays between',
  handler: ({ context }) => {
    const { configPath } = context.paths;
    if (!isFile(configPath)) {
      log(`No relayer configuration found at ${configPath}`);
      return;
    }
    const config = loadRelayerConfig(configPath);
    logBlue('Source blockchains:');
    logTable(
      [...config.sourceBlockchains.values()].map((source) => ({
        blockchainID: source.blockchainID,
        subnetID: source.subnetID,
        rpc: source.rpcEndpoint.baseURL,
        ws: source.wsEndpoint.baseURL,
        contracts: [...source.messageContracts.keys()].join(', '),
      })),
    );
    logBlue('Destination blockchains:');
    logTable(
      [...config.destinationBlockchains.values()].map((destination) => ({
        blockchainID: destination.blockchainID,
        subnetID: destination.subnetID,
        rpc: destination.rpcEndpoint.baseURL,
      })),
    );
  },
};

/**
 * Fund command
 */
const fundCommand: CommandModuleWithContext<{
  rpc: string;
  fundingKey?: string;
  relayerKey?: string;
  amount: string;
}> = {
  command: 'fund',
  describe: 'Top up the relayer account on a chain',
  builder: {
    rpc: demandOption(rpcCommandOption),
    'funding-key': fundingKeyCommandOption,
    'relayer-key': relayerKeyCommandOption,
    amount: {
      type: 'string',
      description: 'Balance the relayer account should hold, in native units',
      default: '500',
    },
  },
  handler: async ({ context, rpc, fundingKey, relayerKey, amount }) => {
    const provider = new providers.JsonRpcProvider(rpc);
    const funder = await getSigner({
      home: context.home,
      key: fundingKey,
      provider,
      skipConfirmation: context.skipConfirmation,
    });
    const { address } = getRelayerKeyInfo(relayerKeyPath(context, relayerKey));
    const { balance, transferred } = await ensureRelayerFunded({
      provider,
      funder,
      relayerAddress: address,
      requiredBalance: utils.parseEther(amount),
    });
    logGreen(
      `✅ Relayer ${address} holds ${utils.formatEther(balance)} (transferred ${utils.formatEther(transferred)})`,
    );
  },
};
