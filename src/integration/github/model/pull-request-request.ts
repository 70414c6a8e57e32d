// SPDX-License-Identifier: Apache-2.0

/**
 * A pull request to open: built once and sent once.
 */
export interface PullRequestRequest {
  readonly title: string;
  readonly body: string;
  readonly baseBranch: string;
  /** `owner:branch` of the branch holding the changes */
  readonly headRef: string;
}

export interface PullRequestSummary {
  readonly number: number;
  readonly htmlUrl: string;
}
