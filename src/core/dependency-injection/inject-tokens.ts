// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogFilePath: Symbol.for('LogFilePath'),
  ConsoleLogging: Symbol.for('ConsoleLogging'),
  BotLogger: Symbol.for('BotLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  ConfigManager: Symbol.for('ConfigManager'),
  CommandRunner: Symbol.for('CommandRunner'),
  GitExecutable: Symbol.for('GitExecutable'),
  GitClient: Symbol.for('GitClient'),
  GitHubClientFactory: Symbol.for('GitHubClientFactory'),
  SecretStoreFactory: Symbol.for('SecretStoreFactory'),
  ChartVersionFetcher: Symbol.for('ChartVersionFetcher'),
  VersionComparator: Symbol.for('VersionComparator'),
  ManifestMutator: Symbol.for('ManifestMutator'),
  PullRequestPublisher: Symbol.for('PullRequestPublisher'),
  CleanupHandler: Symbol.for('CleanupHandler'),
  RepositoryLifecycleManager: Symbol.for('RepositoryLifecycleManager'),
  ForkPollAttempts: Symbol.for('ForkPollAttempts'),
  ForkPollInterval: Symbol.for('ForkPollInterval'),
  ListrRenderer: Symbol.for('ListrRenderer'),
  UpgradeCommand: Symbol.for('UpgradeCommand'),
} as const;
