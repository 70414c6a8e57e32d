// SPDX-License-Identifier: Apache-2.0

import {type Octokit} from '@octokit/rest';
import {StatusCodes} from 'http-status-codes';
import {type GitHubClient} from '../github-client.js';
import {type PullRequestRequest, type PullRequestSummary} from '../model/pull-request-request.js';
import {type BotLogger} from '../../../core/logging/bot-logger.js';
import {ForkOperationError} from '../../../core/errors/fork-operation-error.js';
import {PublishError} from '../../../core/errors/publish-error.js';
import {HelmBotError} from '../../../core/errors/helm-bot-error.js';

/** HTTP status carried by an Octokit request error, if any */
export function responseStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/** response body carried by an Octokit request error, serialized */
export function responseBody(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'response' in error) {
    const response = error.response;
    if (typeof response === 'object' && response !== null && 'data' in response) {
      return typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
    }
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * GitHubClient backed by the GitHub REST API.
 */
export class OctokitGitHubClient implements GitHubClient {
  public constructor(
    private readonly octokit: Octokit,
    private readonly logger: BotLogger,
  ) {}

  public async authenticatedLogin(): Promise<string> {
    try {
      const {data} = await this.octokit.rest.users.getAuthenticated();
      return data.login;
    } catch (error) {
      throw new HelmBotError(`Could not determine the authenticated GitHub account: ${responseBody(error)}`, error);
    }
  }

  public async repositoryExists(owner: string, name: string): Promise<boolean> {
    try {
      await this.octokit.rest.repos.get({owner, repo: name});
      return true;
    } catch (error) {
      if (responseStatus(error) === StatusCodes.NOT_FOUND) {
        return false;
      }
      throw new ForkOperationError(
        `Could not check whether repository exists: ${owner}/${name}: ${responseBody(error)}`,
        `${owner}/${name}`,
        error,
      );
    }
  }

  public async createFork(owner: string, name: string, account: string): Promise<void> {
    const login = await this.authenticatedLogin();
    const organization = account === login ? undefined : account;

    this.logger.info(`Creating fork of: ${owner}/${name} in ${account}`);
    try {
      await this.octokit.rest.repos.createFork({owner, repo: name, organization});
    } catch (error) {
      throw new ForkOperationError(
        `Could not fork repository: ${owner}/${name}: ${responseBody(error)}`,
        `${owner}/${name}`,
        error,
      );
    }
  }

  public async deleteRepository(owner: string, name: string): Promise<void> {
    this.logger.info(`Deleting repository: ${owner}/${name}`);
    try {
      await this.octokit.rest.repos.delete({owner, repo: name});
    } catch (error) {
      throw new ForkOperationError(
        `Could not delete repository: ${owner}/${name}: ${responseBody(error)}`,
        `${owner}/${name}`,
        error,
      );
    }
  }

  public async listBranches(owner: string, name: string): Promise<string[]> {
    try {
      const branches = await this.octokit.paginate(this.octokit.rest.repos.listBranches, {
        owner,
        repo: name,
        per_page: 100,
      });
      return branches.map(branch => branch.name);
    } catch (error) {
      throw new ForkOperationError(
        `Could not list branches of: ${owner}/${name}: ${responseBody(error)}`,
        `${owner}/${name}`,
        error,
      );
    }
  }

  public async createPullRequest(
    owner: string,
    name: string,
    request: PullRequestRequest,
  ): Promise<PullRequestSummary> {
    try {
      const {data} = await this.octokit.rest.pulls.create({
        owner,
        repo: name,
        title: request.title,
        body: request.body,
        base: request.baseBranch,
        head: request.headRef,
      });
      return {number: data.number, htmlUrl: data.html_url};
    } catch (error) {
      const body = responseBody(error);
      throw new PublishError(
        `Could not open pull request on: ${owner}/${name}: ${body}`,
        responseStatus(error) ?? 0,
        body,
        error,
      );
    }
  }

  public async addLabels(owner: string, name: string, issueNumber: number, labels: readonly string[]): Promise<void> {
    try {
      await this.octokit.rest.issues.addLabels({owner, repo: name, issue_number: issueNumber, labels: [...labels]});
    } catch (error) {
      const body = responseBody(error);
      throw new PublishError(
        `Could not add labels to pull request #${issueNumber}: ${body}`,
        responseStatus(error) ?? 0,
        body,
        error,
      );
    }
  }
}
