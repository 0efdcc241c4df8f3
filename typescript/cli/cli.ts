#!/usr/bin/env -S node --import tsx
import chalk from 'chalk';
import yargs from 'yargs';

import { errorToString } from '@icmctl/utils';

import { messengerCommand } from './src/commands/messenger.js';
import {
  endpointCommandOption,
  homeCommandOption,
  logFormatCommandOption,
  logLevelCommandOption,
  networkCommandOption,
  skipConfirmationOption,
} from './src/commands/options.js';
import { relayerCommand } from './src/commands/relayer.js';
import { tokenBridgeCommand } from './src/commands/tokenBridge.js';
import { contextMiddleware } from './src/context/context.js';
import { configureLogger, errorRed } from './src/logger.js';
import { VERSION } from './src/version.js';

console.log(chalk.blue('ICM'), chalk.magentaBright('CLI'));

try {
  await yargs(process.argv.slice(2))
    .scriptName('icmctl')
    .option('log', logFormatCommandOption)
    .option('verbosity', logLevelCommandOption)
    .option('home', homeCommandOption)
    .option('network', networkCommandOption)
    .option('endpoint', endpointCommandOption)
    .option('yes', skipConfirmationOption)
    .global(['log', 'verbosity', 'home', 'network', 'endpoint', 'yes'])
    .middleware([
      (argv) => {
        configureLogger(
          typeof argv.log === 'string' ? argv.log : undefined,
          typeof argv.verbosity === 'string' ? argv.verbosity : undefined,
        );
      },
      contextMiddleware,
    ])
    .command(messengerCommand)
    .command(relayerCommand)
    .command(tokenBridgeCommand)
    .version(VERSION)
    .demandCommand()
    .strict()
    .help()
    .showHelpOnFail(false)
    .fail(false).argv;
} catch (error: unknown) {
  errorRed('Error: ' + errorToString(error, 1000));
  process.exit(1);
}
