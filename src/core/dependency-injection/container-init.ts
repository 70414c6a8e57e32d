// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {container, Lifecycle} from 'tsyringe-neo';
import {Octokit} from '@octokit/rest';
import {type BotLogger} from '../logging/bot-logger.js';
import {WinstonBotLogger} from '../logging/winston-bot-logger.js';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {ConfigManager} from '../config-manager.js';
import {ErrorHandler} from '../error-handler.js';
import {CommandRunner} from '../command-runner.js';
import {DefaultGitClient} from '../../integration/git/impl/default-git-client.js';
import {OctokitGitHubClient} from '../../integration/github/impl/octokit-github-client.js';
import {type GitHubClientFactory} from '../../integration/github/github-client.js';
import {SecretStoreFactory} from '../../integration/secrets/secret-store-factory.js';
import {ChartVersionFetcher} from '../charts/chart-version-fetcher.js';
import {VersionComparator} from '../charts/version-comparator.js';
import {ManifestMutator} from '../charts/manifest-mutator.js';
import {PullRequestPublisher} from '../repository/pull-request-publisher.js';
import {CleanupHandler} from '../repository/cleanup-handler.js';
import {RepositoryLifecycleManager} from '../repository/repository-lifecycle-manager.js';
import {UpgradeCommand} from '../../commands/upgrade.js';

export interface ContainerOptions {
  logLevel?: string;
  developmentMode?: boolean;
  /** mirror log records to the console */
  consoleLogging?: boolean;
  logFilePath?: string;
  testLogger?: BotLogger;
}

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   */
  public init(options: ContainerOptions = {}): void {
    if (Container.isInitialized) {
      container.resolve<BotLogger>(InjectTokens.BotLogger).debug('Container already initialized');
      return;
    }

    const logFilePath = options.logFilePath ?? path.join(constants.HELM_BOT_LOGS_DIR, constants.HELM_BOT_LOG_FILE);

    // BotLogger
    container.register(InjectTokens.LogLevel, {useValue: options.logLevel ?? 'info'});
    container.register(InjectTokens.DevelopmentMode, {useValue: options.developmentMode ?? false});
    container.register(InjectTokens.LogFilePath, {useValue: logFilePath});
    container.register(InjectTokens.ConsoleLogging, {useValue: options.consoleLogging ?? false});
    if (options.testLogger) {
      container.registerInstance(InjectTokens.BotLogger, options.testLogger);
      container.resolve<BotLogger>(InjectTokens.BotLogger).debug('Using test logger');
    } else {
      fs.mkdirSync(path.dirname(logFilePath), {recursive: true});
      container.register(InjectTokens.BotLogger, {useClass: WinstonBotLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<BotLogger>(InjectTokens.BotLogger).debug('Using default logger');
    }

    container.register(InjectTokens.ConfigManager, {useClass: ConfigManager}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});

    // external systems
    container.register(InjectTokens.CommandRunner, {useClass: CommandRunner}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.GitExecutable, {useValue: constants.GIT});
    container.register(InjectTokens.GitClient, {useClass: DefaultGitClient}, {lifecycle: Lifecycle.Singleton});
    const gitHubClientFactory: GitHubClientFactory = token =>
      new OctokitGitHubClient(new Octokit({auth: token}), container.resolve<BotLogger>(InjectTokens.BotLogger));
    container.register(InjectTokens.GitHubClientFactory, {useValue: gitHubClientFactory});
    container.register(
      InjectTokens.SecretStoreFactory,
      {useClass: SecretStoreFactory},
      {lifecycle: Lifecycle.Singleton},
    );

    // charts
    container.register(InjectTokens.ManifestMutator, {useClass: ManifestMutator}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.ChartVersionFetcher,
      {useClass: ChartVersionFetcher},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.VersionComparator,
      {useClass: VersionComparator},
      {lifecycle: Lifecycle.Singleton},
    );

    // repository lifecycle
    container.register(InjectTokens.ForkPollAttempts, {useValue: constants.FORK_POLL_MAX_ATTEMPTS});
    container.register(InjectTokens.ForkPollInterval, {useValue: constants.FORK_POLL_INTERVAL_MS});
    container.register(
      InjectTokens.PullRequestPublisher,
      {useClass: PullRequestPublisher},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.CleanupHandler, {useClass: CleanupHandler}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.RepositoryLifecycleManager,
      {useClass: RepositoryLifecycleManager},
      {lifecycle: Lifecycle.Singleton},
    );

    // Commands
    container.register(InjectTokens.ListrRenderer, {useValue: constants.LISTR_DEFAULT_RENDERER});
    container.register(InjectTokens.UpgradeCommand, {useClass: UpgradeCommand}, {lifecycle: Lifecycle.Singleton});

    container.resolve<BotLogger>(InjectTokens.BotLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   */
  public reset(options?: ContainerOptions): void {
    if (Container.instance && Container.isInitialized) {
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(options);
  }

}
