// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import chalk from 'chalk';
import {Listr, type ListrRendererValue} from 'listr2';
import {inject, injectable} from 'tsyringe-neo';
import {BaseCommand} from './base.js';
import {Flags as flags} from './flags.js';
import * as constants from '../core/constants.js';
import {HelmBotError} from '../core/errors/helm-bot-error.js';
import {type BotLogger} from '../core/logging/bot-logger.js';
import {type ConfigManager} from '../core/config-manager.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {createRunContext, type RunContext} from '../core/run-context.js';
import {type ChartVersionFetcher} from '../core/charts/chart-version-fetcher.js';
import {type VersionComparator} from '../core/charts/version-comparator.js';
import {type ChartDependency, type ChartVersionRecord} from '../core/charts/chart-version-record.js';
import {type RepositoryLifecycleManager} from '../core/repository/repository-lifecycle-manager.js';
import {type RepositoryState} from '../core/repository/repository-state.js';
import {type SecretStoreFactory} from '../integration/secrets/secret-store-factory.js';
import {type GitHubClientFactory} from '../integration/github/github-client.js';
import {type ArgvStruct, type CommandDefinition} from '../types/index.js';
import {type CommandFlag} from '../types/flag-types.js';

interface UpgradeConfig {
  repoOwner: string;
  repoName: string;
  chartName: string;
  keyvault?: string;
  tokenName?: string;
  identity: boolean;
  botAccount?: string;
  chartSources?: string;
}

export interface UpgradeContext {
  config?: UpgradeConfig;
  token: string;
  runContext?: RunContext;
  deployed: ChartDependency[];
  published: Map<string, string>;
  records: ReadonlyMap<string, ChartVersionRecord>;
  charts: string[];
  report: string;
  state?: RepositoryState;
}

function required<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new HelmBotError(`${name} has not been initialized`);
  }
  return value;
}

/**
 * Checks a deployment's chart dependencies and opens a pull request upgrading the outdated ones.
 */
@injectable()
export class UpgradeCommand extends BaseCommand {
  public static readonly COMMAND_NAME = '$0';

  private readonly secretStoreFactory: SecretStoreFactory;
  private readonly gitHubClientFactory: GitHubClientFactory;
  private readonly versionFetcher: ChartVersionFetcher;
  private readonly versionComparator: VersionComparator;
  private readonly lifecycleManager: RepositoryLifecycleManager;
  private readonly listrRenderer: ListrRendererValue;

  public constructor(
    @inject(InjectTokens.BotLogger) logger?: BotLogger,
    @inject(InjectTokens.ConfigManager) configManager?: ConfigManager,
    @inject(InjectTokens.SecretStoreFactory) secretStoreFactory?: SecretStoreFactory,
    @inject(InjectTokens.GitHubClientFactory) gitHubClientFactory?: GitHubClientFactory,
    @inject(InjectTokens.ChartVersionFetcher) versionFetcher?: ChartVersionFetcher,
    @inject(InjectTokens.VersionComparator) versionComparator?: VersionComparator,
    @inject(InjectTokens.RepositoryLifecycleManager) lifecycleManager?: RepositoryLifecycleManager,
    @inject(InjectTokens.ListrRenderer) listrRenderer?: ListrRendererValue,
  ) {
    super(logger, configManager);
    this.secretStoreFactory = patchInject(secretStoreFactory, InjectTokens.SecretStoreFactory, this.constructor.name);
    this.gitHubClientFactory = patchInject(
      gitHubClientFactory,
      InjectTokens.GitHubClientFactory,
      this.constructor.name,
    );
    this.versionFetcher = patchInject(versionFetcher, InjectTokens.ChartVersionFetcher, this.constructor.name);
    this.versionComparator = patchInject(versionComparator, InjectTokens.VersionComparator, this.constructor.name);
    this.lifecycleManager = patchInject(
      lifecycleManager,
      InjectTokens.RepositoryLifecycleManager,
      this.constructor.name,
    );
    this.listrRenderer = patchInject(listrRenderer, InjectTokens.ListrRenderer, this.constructor.name);
  }

  /** Executes the upgrade CLI command */
  public async upgrade(argv: ArgvStruct): Promise<UpgradeContext> {
    this.logger.nextTraceId();

    const tasks = new Listr<UpgradeContext, ListrRendererValue>(
      [
        {
          title: 'Initialize',
          task: context_ => {
            this.configManager.update(argv);

            context_.config = {
              repoOwner: this.requiredFlag(flags.repoOwner),
              repoName: this.requiredFlag(flags.repoName),
              chartName: this.requiredFlag(flags.chartName),
              keyvault: this.configManager.getString(flags.keyvault),
              tokenName: this.configManager.getString(flags.tokenName),
              identity: this.configManager.getBoolean(flags.identity),
              botAccount: this.configManager.getString(flags.botAccount),
              chartSources: this.configManager.getString(flags.chartSources),
            };
          },
        },
        {
          title: 'Retrieve API token',
          task: async (context_, task) => {
            const config = required(context_.config, 'config');
            const {store, secretName} = this.secretStoreFactory.resolve(config);
            task.title = `Retrieve API token from ${store.description}`;
            context_.token = await store.getSecret(secretName);
          },
        },
        {
          title: 'Resolve bot account',
          task: async (context_, task) => {
            const config = required(context_.config, 'config');
            const botAccount =
              config.botAccount ?? (await this.gitHubClientFactory(context_.token).authenticatedLogin());
            task.title = `Resolve bot account: ${botAccount}`;

            context_.runContext = createRunContext({
              repoOwner: config.repoOwner,
              repoName: config.repoName,
              chartName: config.chartName,
              botAccount,
              targetBranch: this.configManager.getString(flags.targetBranch) ?? constants.DEFAULT_TARGET_BRANCH,
              baseBranch: this.configManager.getString(flags.baseBranch) ?? constants.DEFAULT_BASE_BRANCH,
              labels: this.configManager.getArray(flags.labels),
              manifestFile: this.configManager.getString(flags.manifestFile) ?? constants.DEFAULT_MANIFEST_FILE,
              workingDirectory: path.resolve(this.configManager.getString(flags.workDirectory) ?? process.cwd()),
              dryRun: this.configManager.getBoolean(flags.dryRun),
              gitIdentity: {name: constants.DEFAULT_GIT_USER_NAME, email: constants.DEFAULT_GIT_USER_EMAIL},
              token: context_.token,
            });
          },
        },
        {
          title: 'Fetch deployed chart versions',
          task: async context_ => {
            context_.deployed = await this.versionFetcher.fetchDeployedVersions(
              required(context_.runContext, 'run context'),
            );
          },
        },
        {
          title: 'Fetch published chart versions',
          task: async context_ => {
            const chartSources = required(context_.config, 'config').chartSources;
            const overrides = chartSources
              ? this.versionFetcher.loadChartSources(chartSources)
              : new Map<string, string>();
            context_.published = await this.versionFetcher.fetchPublishedVersions(context_.deployed, overrides);
          },
        },
        {
          title: 'Compare chart versions',
          task: context_ => {
            const runContext = required(context_.runContext, 'run context');
            const deployed = new Map(context_.deployed.map(d => [d.name, d.version]));

            context_.records = this.versionComparator.buildVersionRecords(deployed, context_.published);
            context_.charts = this.versionComparator.findChartsToUpgrade(
              deployed,
              context_.published,
              runContext.chartName,
            );
            context_.report = this.versionComparator.reportUpgrades(
              runContext.chartName,
              context_.charts,
              runContext.dryRun,
            );
          },
        },
        {
          title: 'Open pull request with upgraded chart versions',
          skip: context_ => {
            if (context_.charts.length === 0) {
              return 'Charts are up-to-date';
            }
            return context_.runContext?.dryRun ? 'Dry run' : false;
          },
          task: async (context_, task) => {
            context_.state = await this.lifecycleManager.runUpgrade(
              required(context_.runContext, 'run context'),
              context_.records,
              context_.charts,
              step => {
                task.output = step;
              },
            );
          },
        },
      ],
      {
        concurrent: false,
        renderer: this.listrRenderer,
      },
    );

    let result: UpgradeContext;
    try {
      result = await tasks.run({
        token: '',
        deployed: [],
        published: new Map(),
        records: new Map(),
        charts: [],
        report: '',
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new HelmBotError(`Error upgrading helm chart dependencies: ${message}`, error);
    }

    this.logger.showUser(chalk.green(result.report));
    if (result.state?.pullRequestUrl) {
      this.logger.showUser(chalk.cyan(`Pull Request: ${result.state.pullRequestUrl}`));
    }
    return result;
  }

  private requiredFlag(flag: CommandFlag): string {
    const value = this.configManager.getString(flag);
    if (value === undefined) {
      throw new HelmBotError(`Missing required argument: ${flag.name}`);
    }
    return value;
  }

  /**
   * Return Yargs command definition for the upgrade command
   * @returns A object representing the Yargs command definition
   */
  public getCommandDefinition(): CommandDefinition {
    return {
      command: `${UpgradeCommand.COMMAND_NAME} <${flags.repoOwner.name}> <${flags.repoName.name}> <${flags.chartName.name}>`,
      describe: 'Upgrade the chart dependencies of a helm chart deployment',
      builder: y => {
        flags.setPositionalCommandFlags(y, ...flags.positionalFlags);
        return flags.setOptionalCommandFlags(
          y,
          flags.keyvault,
          flags.tokenName,
          flags.targetBranch,
          flags.baseBranch,
          flags.labels,
          flags.botAccount,
          flags.manifestFile,
          flags.chartSources,
          flags.workDirectory,
          flags.identity,
          flags.dryRun,
          flags.verbose,
          flags.devMode,
        );
      },
      handler: async argv => {
        await this.upgrade(argv);
      },
    };
  }
}
