// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import {type BotLogger} from '../logging/bot-logger.js';
import {type RunContext, cloneDirectory} from '../run-context.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {HelmBotError} from '../errors/helm-bot-error.js';
import {type GitHubClient} from '../../integration/github/github-client.js';
import {advance, RepositoryPhase, type RepositoryState} from './repository-state.js';

/**
 * Removes what a run leaves behind: the local clone always, and the fork when this run created it and no pull
 * request was opened from it.
 */
@injectable()
export class CleanupHandler {
  private readonly logger: BotLogger;

  public constructor(@inject(InjectTokens.BotLogger) logger?: BotLogger) {
    this.logger = patchInject(logger, InjectTokens.BotLogger, this.constructor.name);
  }

  public async cleanup(context: RunContext, github: GitHubClient, state: RepositoryState): Promise<RepositoryState> {
    this.removeLocalClone(context);

    let forkExists = state.forkExists;
    if (state.forkExists && state.forkCreatedByRun && state.phase !== RepositoryPhase.PUBLISHED) {
      await github.deleteRepository(context.botAccount, context.repoName);
      this.logger.info(`Deleted fork: ${context.botAccount}/${context.repoName}`);
      forkExists = false;
    }

    return advance(state, {
      phase: RepositoryPhase.CLEANED,
      forkExists,
      branchExists: forkExists && state.branchExists,
      localClonePresent: false,
    });
  }

  public removeLocalClone(context: RunContext): void {
    const directory = cloneDirectory(context);
    if (!fs.existsSync(directory)) {
      return;
    }

    this.logger.info(`Deleting local repository: ${context.repoName}`);
    try {
      fs.rmSync(directory, {recursive: true, force: true});
    } catch (error) {
      throw new HelmBotError(`Could not delete local repository: ${directory}`, error);
    }
    this.logger.info(`Deleted local repository: ${context.repoName}`);
  }
}
