// SPDX-License-Identifier: Apache-2.0

import * as constants from '../core/constants.js';
import {type CommandFlag} from '../types/flag-types.js';
import {type AnyYargs} from '../types/index.js';

export class Flags {
  /**
   * Set positional arguments of the command
   * @param y instance of yargs
   * @param commandFlags a set of command flags, in positional order
   */
  public static setPositionalCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): AnyYargs {
    for (const flag of commandFlags) {
      y.positional(flag.name, {describe: flag.definition.describe, type: 'string'});
    }
    return y;
  }

  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   *
   */
  public static setOptionalCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): AnyYargs {
    for (const flag of commandFlags) {
      const defaultValue = flag.definition.defaultValue === '' ? undefined : flag.definition.defaultValue;
      y.option(flag.name, {
        describe: flag.definition.describe,
        alias: flag.definition.alias,
        type: flag.definition.type,
        default: defaultValue,
      });
    }
    return y;
  }

  public static readonly repoOwner: CommandFlag = {
    constName: 'repoOwner',
    name: 'repo-owner',
    definition: {
      describe: 'The GitHub repository owner',
      type: 'string',
    },
  };

  public static readonly repoName: CommandFlag = {
    constName: 'repoName',
    name: 'repo-name',
    definition: {
      describe: 'The deployment repository name',
      type: 'string',
    },
  };

  public static readonly chartName: CommandFlag = {
    constName: 'chartName',
    name: 'chart-name',
    definition: {
      describe: 'The name of the local helm chart',
      type: 'string',
    },
  };

  public static readonly keyvault: CommandFlag = {
    constName: 'keyvault',
    name: 'keyvault',
    definition: {
      describe: 'Name of the Azure Key Vault storing secrets for the bot',
      alias: 'k',
      type: 'string',
    },
  };

  public static readonly tokenName: CommandFlag = {
    constName: 'tokenName',
    name: 'token-name',
    definition: {
      describe: 'Name of the bot API token in the Key Vault',
      alias: 'n',
      type: 'string',
    },
  };

  public static readonly targetBranch: CommandFlag = {
    constName: 'targetBranch',
    name: 'target-branch',
    definition: {
      describe: 'The git branch to commit to',
      alias: 't',
      defaultValue: constants.DEFAULT_TARGET_BRANCH,
      type: 'string',
    },
  };

  public static readonly baseBranch: CommandFlag = {
    constName: 'baseBranch',
    name: 'base-branch',
    definition: {
      describe: 'The base branch to open the Pull Request against',
      alias: 'b',
      defaultValue: constants.DEFAULT_BASE_BRANCH,
      type: 'string',
    },
  };

  public static readonly labels: CommandFlag = {
    constName: 'labels',
    name: 'labels',
    definition: {
      describe: 'List of labels to assign to the Pull Request',
      alias: 'l',
      defaultValue: [],
      type: 'array',
    },
  };

  public static readonly botAccount: CommandFlag = {
    constName: 'botAccount',
    name: 'bot-account',
    definition: {
      describe: 'GitHub account owning the fork, defaults to the account the token belongs to',
      type: 'string',
    },
  };

  public static readonly manifestFile: CommandFlag = {
    constName: 'manifestFile',
    name: 'manifest-file',
    definition: {
      describe: 'Dependency manifest inside the chart directory',
      defaultValue: constants.DEFAULT_MANIFEST_FILE,
      type: 'string',
    },
  };

  public static readonly chartSources: CommandFlag = {
    constName: 'chartSources',
    name: 'chart-sources',
    definition: {
      describe: 'YAML file mapping chart names to the URL their latest version is read from',
      type: 'string',
    },
  };

  public static readonly workDirectory: CommandFlag = {
    constName: 'workDirectory',
    name: 'work-dir',
    definition: {
      describe: 'Directory the fork is cloned into, defaults to the current directory',
      type: 'string',
    },
  };

  public static readonly identity: CommandFlag = {
    constName: 'identity',
    name: 'identity',
    definition: {
      describe: 'Login to Azure with a Managed System Identity',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly dryRun: CommandFlag = {
    constName: 'dryRun',
    name: 'dry-run',
    definition: {
      describe: 'Perform a dry-run helm upgrade',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly verbose: CommandFlag = {
    constName: 'verbose',
    name: 'verbose',
    definition: {
      describe: 'Print verbose output to the console',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly positionalFlags: CommandFlag[] = [Flags.repoOwner, Flags.repoName, Flags.chartName];

  public static readonly allFlags: CommandFlag[] = [
    ...Flags.positionalFlags,
    Flags.baseBranch,
    Flags.botAccount,
    Flags.chartSources,
    Flags.devMode,
    Flags.dryRun,
    Flags.identity,
    Flags.keyvault,
    Flags.labels,
    Flags.manifestFile,
    Flags.targetBranch,
    Flags.tokenName,
    Flags.verbose,
    Flags.workDirectory,
  ];
}
