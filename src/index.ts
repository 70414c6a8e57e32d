// SPDX-License-Identifier: Apache-2.0

// eslint-disable-next-line n/no-extraneous-import
import 'reflect-metadata';
import 'dotenv/config';
import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import {container} from 'tsyringe-neo';

import {Flags as flags} from './commands/flags.js';
import * as commands from './commands/index.js';
import {type BotLogger} from './core/logging/bot-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {HelmBotError} from './core/errors/helm-bot-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {getBotVersion} from '../version.js';

export async function main(argv: string[], context?: {logger?: BotLogger}): Promise<void> {
  // logging is configured before the arguments are parsed
  const verbose = argv.includes(`--${flags.verbose.name}`);
  const developmentMode = argv.includes(`--${flags.devMode.name}`);

  try {
    Container.getInstance().init({logLevel: verbose ? 'debug' : 'info', developmentMode, consoleLogging: verbose});
  } catch (error) {
    console.error(`Error initializing container: ${error instanceof Error ? error.message : String(error)}`);
    throw new HelmBotError('Error initializing container', error);
  }

  const logger = container.resolve<BotLogger>(InjectTokens.BotLogger);

  if (context) {
    // save the logger so that helm-bot.ts can use it after the run
    context.logger = logger;
  }
  process.on('unhandledRejection', reason => {
    logger.showUserError(new HelmBotError(`Unhandled Rejection, reason: ${String(reason)}`, reason));
  });
  process.on('uncaughtException', (error, origin) => {
    logger.showUserError(new HelmBotError(`Uncaught Exception: ${error.message}, origin: ${origin}`, error));
  });

  logger.debug('Initializing Helm Upgrade Bot');
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2])) {
    logger.showUser(chalk.cyan('\n************************** Helm Upgrade Bot **************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getBotVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  logger.debug('Initializing commands');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('helm-bot')
    .usage('Usage:\n  helm-bot <repo-owner> <repo-name> <chart-name> [options]')
    .alias('h', 'help')
    .version(false)
    .strict();

  for (const definition of commands.Initialize()) {
    rootCmd.command(definition);
  }

  rootCmd.fail((message, error) => {
    if (error) {
      throw error;
    }
    logger.showUser(message);
    rootCmd.showHelp();
    throw new HelmBotError(`Error running helm-bot, failure occurred: ${message}`);
  });

  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}
