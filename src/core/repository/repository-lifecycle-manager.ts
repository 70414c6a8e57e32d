// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {type BotLogger} from '../logging/bot-logger.js';
import {type RunContext, cloneDirectory, manifestPath} from '../run-context.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {ForkOperationError} from '../errors/fork-operation-error.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {sleep} from '../helpers.js';
import {type ManifestMutator} from '../charts/manifest-mutator.js';
import {type ChartVersionRecord} from '../charts/chart-version-record.js';
import {type GitClient} from '../../integration/git/git-client.js';
import {GitRemote} from '../../integration/git/model/git-remote.js';
import {type GitHubClient, type GitHubClientFactory} from '../../integration/github/github-client.js';
import {type PullRequestPublisher} from './pull-request-publisher.js';
import {type CleanupHandler} from './cleanup-handler.js';
import {advance, assertPhase, initialRepositoryState, RepositoryPhase, type RepositoryState} from './repository-state.js';

export type ProgressListener = (step: string) => void;

/**
 * Drives the fork of a deployment repository from `NoFork` to `Published`: fork, clone, prepare the working
 * branch, commit the patched manifest, push and open a pull request. Each step takes the current state and
 * returns the next one, and refuses to run from any other phase.
 */
@injectable()
export class RepositoryLifecycleManager {
  private readonly logger: BotLogger;
  private readonly git: GitClient;
  private readonly gitHubClientFactory: GitHubClientFactory;
  private readonly manifestMutator: ManifestMutator;
  private readonly publisher: PullRequestPublisher;
  private readonly cleanupHandler: CleanupHandler;
  private readonly forkPollAttempts: number;
  private readonly forkPollInterval: number;

  public constructor(
    @inject(InjectTokens.BotLogger) logger?: BotLogger,
    @inject(InjectTokens.GitClient) git?: GitClient,
    @inject(InjectTokens.GitHubClientFactory) gitHubClientFactory?: GitHubClientFactory,
    @inject(InjectTokens.ManifestMutator) manifestMutator?: ManifestMutator,
    @inject(InjectTokens.PullRequestPublisher) publisher?: PullRequestPublisher,
    @inject(InjectTokens.CleanupHandler) cleanupHandler?: CleanupHandler,
    @inject(InjectTokens.ForkPollAttempts) forkPollAttempts?: number,
    @inject(InjectTokens.ForkPollInterval) forkPollInterval?: number,
  ) {
    this.logger = patchInject(logger, InjectTokens.BotLogger, this.constructor.name);
    this.git = patchInject(git, InjectTokens.GitClient, this.constructor.name);
    this.gitHubClientFactory = patchInject(gitHubClientFactory, InjectTokens.GitHubClientFactory, this.constructor.name);
    this.manifestMutator = patchInject(manifestMutator, InjectTokens.ManifestMutator, this.constructor.name);
    this.publisher = patchInject(publisher, InjectTokens.PullRequestPublisher, this.constructor.name);
    this.cleanupHandler = patchInject(cleanupHandler, InjectTokens.CleanupHandler, this.constructor.name);
    this.forkPollAttempts = patchInject(forkPollAttempts, InjectTokens.ForkPollAttempts, this.constructor.name);
    this.forkPollInterval = patchInject(forkPollInterval, InjectTokens.ForkPollInterval, this.constructor.name);
  }

  /**
   * Runs every step for the given charts. Cleanup runs exactly once, after success or before a failure is
   * rethrown; a cleanup failure never replaces the original error.
   */
  public async runUpgrade(
    context: RunContext,
    records: ReadonlyMap<string, ChartVersionRecord>,
    charts: readonly string[],
    progress: ProgressListener = () => {},
  ): Promise<RepositoryState> {
    const github = this.gitHubClientFactory(context.token);
    let state = initialRepositoryState();

    if (charts.length === 0) {
      return this.cleanup(context, github, state);
    }

    try {
      progress(`Forking ${context.repoOwner}/${context.repoName}`);
      state = await this.requestFork(context, github, state);
      state = await this.awaitFork(context, github, state);
      progress(`Cloning ${context.botAccount}/${context.repoName}`);
      state = await this.clone(context, state);
      progress(`Preparing branch ${context.targetBranch}`);
      state = await this.prepareBranch(context, github, state);
      progress('Committing and pushing the updated manifest');
      state = await this.commitAndPush(context, state, records, charts);
      progress('Opening pull request');
      state = await this.publish(context, github, state, records, charts);
      await this.labelPullRequest(context, github, state);
    } catch (error) {
      await this.cleanupAfterFailure(context, github, state, error);
      throw error;
    }

    progress('Cleaning up');
    return this.cleanup(context, github, state);
  }

  public async fork(context: RunContext, github: GitHubClient, state: RepositoryState): Promise<RepositoryState> {
    return this.awaitFork(context, github, await this.requestFork(context, github, state));
  }

  /**
   * Reuses an existing fork, otherwise asks for one. A requested fork is owned by this run from here on, even
   * before it becomes visible.
   */
  public async requestFork(
    context: RunContext,
    github: GitHubClient,
    state: RepositoryState,
  ): Promise<RepositoryState> {
    assertPhase(state, RepositoryPhase.NO_FORK, 'fork');
    const {botAccount, repoOwner, repoName} = context;

    if (await github.repositoryExists(botAccount, repoName)) {
      this.logger.info(`Fork exists: ${botAccount}/${repoName}`);
      return advance(state, {phase: RepositoryPhase.FORKED, forkExists: true, forkCreatedByRun: false});
    }

    await github.createFork(repoOwner, repoName, botAccount);
    return advance(state, {forkExists: true, forkCreatedByRun: true});
  }

  public async awaitFork(context: RunContext, github: GitHubClient, state: RepositoryState): Promise<RepositoryState> {
    if (state.phase === RepositoryPhase.FORKED) {
      return state;
    }
    assertPhase(state, RepositoryPhase.NO_FORK, 'wait for the fork');
    const {botAccount, repoName} = context;

    for (let attempt = 1; attempt <= this.forkPollAttempts; attempt++) {
      if (await github.repositoryExists(botAccount, repoName)) {
        this.logger.info(`Created fork: ${botAccount}/${repoName}`);
        return advance(state, {phase: RepositoryPhase.FORKED});
      }
      this.logger.debug(`Fork ${botAccount}/${repoName} not visible yet, attempt ${attempt}/${this.forkPollAttempts}`);
      await sleep(this.forkPollInterval);
    }

    throw new ForkOperationError(
      `Fork ${botAccount}/${repoName} did not become available after ${this.forkPollAttempts} attempts`,
      `${botAccount}/${repoName}`,
    );
  }

  public async clone(context: RunContext, state: RepositoryState): Promise<RepositoryState> {
    assertPhase(state, RepositoryPhase.FORKED, 'clone');
    const directory = cloneDirectory(context);

    fs.mkdirSync(context.workingDirectory, {recursive: true});
    if (fs.existsSync(directory)) {
      this.logger.warn(`Removing stale local repository: ${directory}`);
      this.cleanupHandler.removeLocalClone(context);
    }

    this.logger.info(`Cloning fork: ${context.botAccount}/${context.repoName}`);
    await this.git.clone(context.workingDirectory, this.forkRemote(context), context.repoName);
    await this.git.setConfig(directory, 'user.name', context.gitIdentity.name);
    await this.git.setConfig(directory, 'user.email', context.gitIdentity.email);
    this.logger.info(`Successfully cloned repo: ${context.repoName}`);

    return advance(state, {phase: RepositoryPhase.CLONED, localClonePresent: true});
  }

  public async prepareBranch(
    context: RunContext,
    github: GitHubClient,
    state: RepositoryState,
  ): Promise<RepositoryState> {
    assertPhase(state, RepositoryPhase.CLONED, 'prepare the branch');
    const directory = cloneDirectory(context);
    const {targetBranch} = context;

    const branches = await github.listBranches(context.botAccount, context.repoName);
    if (branches.includes(targetBranch)) {
      this.logger.info(`Deleting branch: ${targetBranch}`);
      await this.git.deleteRemoteBranch(directory, this.forkRemote(context), targetBranch);
      if (await this.git.localBranchExists(directory, targetBranch)) {
        await this.git.deleteLocalBranch(directory, targetBranch);
      }
      this.logger.info(`Successfully deleted branch: ${targetBranch}`);
    } else {
      this.logger.info(`Branch does not exist: ${targetBranch}`);
    }

    this.logger.info(`Pulling main branch of: ${context.repoOwner}/${context.repoName}`);
    await this.git.pull(directory, GitRemote.of(context.repoOwner, context.repoName), context.baseBranch);

    this.logger.info(`Checking out branch: ${targetBranch}`);
    await this.git.checkoutNewBranch(directory, targetBranch);
    this.logger.info(`Successfully checked out branch: ${targetBranch}`);

    return advance(state, {phase: RepositoryPhase.BRANCH_READY, branchExists: false});
  }

  public async commitAndPush(
    context: RunContext,
    state: RepositoryState,
    records: ReadonlyMap<string, ChartVersionRecord>,
    charts: readonly string[],
  ): Promise<RepositoryState> {
    assertPhase(state, RepositoryPhase.BRANCH_READY, 'commit');
    const directory = cloneDirectory(context);

    const versions = new Map<string, string>();
    for (const chart of charts) {
      const record = records.get(chart);
      if (record) {
        versions.set(chart, record.publishedVersion);
      }
    }

    const manifest = manifestPath(context);
    const manifestFile = path.join(directory, manifest);
    const patched = this.manifestMutator.patchManifest(fs.readFileSync(manifestFile, 'utf8'), versions);
    fs.writeFileSync(manifestFile, patched);
    this.logger.info(`Updated versions in: ${manifest}`);

    for (const file of [manifest]) {
      this.logger.info(`Adding file: ${file}`);
      await this.git.add(directory, file);
      this.logger.info('Successfully added file');
    }

    this.logger.info('Committing file');
    await this.git.commit(
      directory,
      `Bump chart dependencies ${[...versions.keys()].join(', ')} to versions ${[...versions.values()].join(', ')}`,
    );

    this.logger.info('Pushing commits to branch');
    await this.git.push(directory, this.forkRemote(context), context.targetBranch);
    this.logger.info(`Successfully pushed changes to branch: ${context.targetBranch}`);

    return advance(state, {phase: RepositoryPhase.COMMITS_PUSHED, branchExists: true});
  }

  public async publish(
    context: RunContext,
    github: GitHubClient,
    state: RepositoryState,
    records: ReadonlyMap<string, ChartVersionRecord>,
    charts: readonly string[],
  ): Promise<RepositoryState> {
    assertPhase(state, RepositoryPhase.COMMITS_PUSHED, 'publish');
    const pullRequest = await this.publisher.open(context, github, records, charts);
    return advance(state, {
      phase: RepositoryPhase.PUBLISHED,
      pullRequestUrl: pullRequest.htmlUrl,
      pullRequestNumber: pullRequest.number,
    });
  }

  /** Labels are attached once the pull request is open; a failure here leaves the fork in place. */
  public async labelPullRequest(context: RunContext, github: GitHubClient, state: RepositoryState): Promise<void> {
    assertPhase(state, RepositoryPhase.PUBLISHED, 'label the pull request');
    if (state.pullRequestNumber === undefined) {
      throw new IllegalArgumentError('Cannot label a pull request without its number', state.pullRequestUrl);
    }
    await this.publisher.addLabels(context, github, state.pullRequestNumber);
  }

  public async cleanup(context: RunContext, github: GitHubClient, state: RepositoryState): Promise<RepositoryState> {
    if (state.phase === RepositoryPhase.CLEANED) {
      return state;
    }
    return this.cleanupHandler.cleanup(context, github, state);
  }

  private async cleanupAfterFailure(
    context: RunContext,
    github: GitHubClient,
    state: RepositoryState,
    failure: unknown,
  ): Promise<void> {
    const reason = failure instanceof Error ? failure.message : String(failure);
    this.logger.error(`Upgrade failed in phase ${state.phase}: ${reason}`);
    try {
      await this.cleanup(context, github, state);
    } catch (cleanupError) {
      const message = cleanupError instanceof Error ? cleanupError.message : String(cleanupError);
      this.logger.error(`Cleanup failed after an earlier error: ${message}`);
    }
  }

  private forkRemote(context: RunContext): GitRemote {
    return GitRemote.authenticated(context.botAccount, context.repoName, context.token);
  }
}
