// SPDX-License-Identifier: Apache-2.0

import * as semver from 'semver';
import {inject, injectable} from 'tsyringe-neo';
import {type BotLogger} from '../logging/bot-logger.js';
import {type RunContext} from '../run-context.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type ChartVersionRecord} from '../charts/chart-version-record.js';
import {type GitHubClient} from '../../integration/github/github-client.js';
import {
  type PullRequestRequest,
  type PullRequestSummary,
} from '../../integration/github/model/pull-request-request.js';

export type ChangeLevel = 'major' | 'minor' | 'patch' | 'downgrade';

/** Size of the step between two versions, undefined when either is not a semantic version */
export function changeLevel(deployedVersion: string, publishedVersion: string): ChangeLevel | undefined {
  if (semver.valid(deployedVersion) === null || semver.valid(publishedVersion) === null) {
    return undefined;
  }
  if (semver.lt(publishedVersion, deployedVersion)) {
    return 'downgrade';
  }
  if (semver.major(publishedVersion) !== semver.major(deployedVersion)) {
    return 'major';
  }
  if (semver.minor(publishedVersion) !== semver.minor(deployedVersion)) {
    return 'minor';
  }
  return 'patch';
}

@injectable()
export class PullRequestPublisher {
  private readonly logger: BotLogger;

  public constructor(@inject(InjectTokens.BotLogger) logger?: BotLogger) {
    this.logger = patchInject(logger, InjectTokens.BotLogger, this.constructor.name);
  }

  public buildRequest(
    context: RunContext,
    records: ReadonlyMap<string, ChartVersionRecord>,
    charts: readonly string[],
  ): PullRequestRequest {
    const lines = ['This PR is updating the following chart dependencies to their latest releases:', ''];
    for (const chart of charts) {
      const record = records.get(chart);
      if (!record) {
        continue;
      }
      const level = changeLevel(record.deployedVersion, record.publishedVersion);
      const suffix = level ? ` (${level})` : '';
      lines.push(`- ${chart}: \`${record.deployedVersion}\` → \`${record.publishedVersion}\`${suffix}`);
    }

    return {
      title: `Bumping helm chart dependency versions: ${charts.join(', ')}`,
      body: lines.join('\n'),
      baseBranch: context.baseBranch,
      headRef: `${context.botAccount}:${context.targetBranch}`,
    };
  }

  /**
   * Opens the pull request against the upstream repository.
   * @throws PublishError when the hosting service rejects the request
   */
  public async open(
    context: RunContext,
    github: GitHubClient,
    records: ReadonlyMap<string, ChartVersionRecord>,
    charts: readonly string[],
  ): Promise<PullRequestSummary> {
    const request = this.buildRequest(context, records, charts);

    this.logger.info(`Creating Pull Request on ${context.repoOwner}/${context.repoName}: ${request.title}`);
    const pullRequest = await github.createPullRequest(context.repoOwner, context.repoName, request);
    this.logger.info(`Pull Request created: ${pullRequest.htmlUrl}`);
    return pullRequest;
  }

  /** @throws PublishError when the hosting service rejects the labels */
  public async addLabels(context: RunContext, github: GitHubClient, pullRequestNumber: number): Promise<void> {
    const labels = [...new Set(context.labels)];
    if (labels.length === 0) {
      return;
    }

    this.logger.info(`Add labels to Pull Request #${pullRequestNumber}`);
    await github.addLabels(context.repoOwner, context.repoName, pullRequestNumber, labels);
    this.logger.info(`Assigned labels: ${labels.join(', ')}`);
  }
}
