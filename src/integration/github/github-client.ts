// SPDX-License-Identifier: Apache-2.0

import {type PullRequestRequest, type PullRequestSummary} from './model/pull-request-request.js';

/**
 * The hosting service operations used by the bot.
 */
export interface GitHubClient {
  /** login of the account the token belongs to */
  authenticatedLogin(): Promise<string>;

  repositoryExists(owner: string, name: string): Promise<boolean>;

  /**
   * request a fork of `owner/name` into `account`, which is either the token owner or an organization it belongs
   * to; GitHub completes it asynchronously
   */
  createFork(owner: string, name: string, account: string): Promise<void>;

  deleteRepository(owner: string, name: string): Promise<void>;

  listBranches(owner: string, name: string): Promise<string[]>;

  createPullRequest(owner: string, name: string, request: PullRequestRequest): Promise<PullRequestSummary>;

  addLabels(owner: string, name: string, issueNumber: number, labels: readonly string[]): Promise<void>;
}

export type GitHubClientFactory = (token: string) => GitHubClient;
