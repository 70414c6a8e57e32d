// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type GitClient} from '../git-client.js';
import {type GitRemote} from '../model/git-remote.js';
import {type GitRequest} from '../request/git-request.js';
import {GitExecutionBuilder} from '../execution/git-execution-builder.js';
import {GitCommandError} from '../git-command-error.js';
import {CloneRequest} from '../request/repository/clone-request.js';
import {PullBranchRequest} from '../request/repository/pull-branch-request.js';
import {PushRequest} from '../request/repository/push-request.js';
import {RemoteBranchDeleteRequest} from '../request/repository/remote-branch-delete-request.js';
import {BranchListRequest} from '../request/branch/branch-list-request.js';
import {BranchDeleteRequest} from '../request/branch/branch-delete-request.js';
import {CheckoutBranchRequest} from '../request/branch/checkout-branch-request.js';
import {AddRequest} from '../request/change/add-request.js';
import {CommitRequest} from '../request/change/commit-request.js';
import {ConfigRequest} from '../request/config/config-request.js';
import {type CommandResult, type CommandRunner} from '../../../core/command-runner.js';
import {type BotLogger} from '../../../core/logging/bot-logger.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';

@injectable()
/**
 * The default implementation of the GitClient interface, running the git executable through the CommandRunner.
 */
export class DefaultGitClient implements GitClient {
  private readonly gitExecutable: string;
  private readonly runner: CommandRunner;
  private readonly logger: BotLogger;

  public constructor(
    @inject(InjectTokens.GitExecutable) gitExecutable?: string,
    @inject(InjectTokens.CommandRunner) runner?: CommandRunner,
    @inject(InjectTokens.BotLogger) logger?: BotLogger,
  ) {
    this.gitExecutable = patchInject(gitExecutable, InjectTokens.GitExecutable, this.constructor.name);
    this.runner = patchInject(runner, InjectTokens.CommandRunner, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.BotLogger, this.constructor.name);
  }

  public async clone(workingDirectory: string, remote: GitRemote, destination: string): Promise<void> {
    await this.execute(workingDirectory, new CloneRequest(remote, destination));
  }

  public async setConfig(repositoryDirectory: string, key: string, value: string): Promise<void> {
    await this.execute(repositoryDirectory, new ConfigRequest(key, value));
  }

  public async localBranchExists(repositoryDirectory: string, branch: string): Promise<boolean> {
    const result = await this.execute(repositoryDirectory, new BranchListRequest(branch));
    // output lines look like '  name' or '* name'
    return result.output
      .split(/\r?\n/)
      .map(line => line.replace(/^\*/, '').trim())
      .includes(branch);
  }

  public async deleteLocalBranch(repositoryDirectory: string, branch: string): Promise<void> {
    await this.execute(repositoryDirectory, new BranchDeleteRequest(branch));
  }

  public async deleteRemoteBranch(repositoryDirectory: string, remote: GitRemote, branch: string): Promise<void> {
    await this.execute(repositoryDirectory, new RemoteBranchDeleteRequest(remote, branch));
  }

  public async pull(repositoryDirectory: string, remote: GitRemote, branch: string): Promise<void> {
    await this.execute(repositoryDirectory, new PullBranchRequest(remote, branch));
  }

  public async checkoutNewBranch(repositoryDirectory: string, branch: string): Promise<void> {
    await this.execute(repositoryDirectory, new CheckoutBranchRequest(branch));
  }

  public async add(repositoryDirectory: string, file: string): Promise<void> {
    await this.execute(repositoryDirectory, new AddRequest(file));
  }

  public async commit(repositoryDirectory: string, message: string): Promise<void> {
    await this.execute(repositoryDirectory, new CommitRequest(message));
  }

  public async push(repositoryDirectory: string, remote: GitRemote, branch: string): Promise<void> {
    await this.execute(repositoryDirectory, new PushRequest(remote, branch));
  }

  /**
   * Builds the invocation for the request, runs it and converts a non-zero exit status into a GitCommandError.
   */
  private async execute(workingDirectory: string, request: GitRequest): Promise<CommandResult> {
    const builder = new GitExecutionBuilder(this.gitExecutable).workingDirectory(workingDirectory);
    request.apply(builder);
    const execution = builder.build();

    const result = await this.runner.run(execution.executable, execution.arguments, {
      workingDirectory: execution.workingDirectory,
      secrets: execution.secrets,
    });

    if (result.status !== 0) {
      this.logger.error(`git command failed: ${execution.display}`, {diagnostic: result.diagnostic});
      throw new GitCommandError(execution.display, result);
    }
    return result;
  }
}
