// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

export enum RepositoryPhase {
  NO_FORK = 'NoFork',
  FORKED = 'Forked',
  CLONED = 'Cloned',
  BRANCH_READY = 'BranchReady',
  COMMITS_PUSHED = 'CommitsPushed',
  PUBLISHED = 'Published',
  CLEANED = 'Cleaned',
}

/**
 * Where a run stands with the fork and the local clone. Every lifecycle step returns a new value.
 */
export interface RepositoryState {
  readonly phase: RepositoryPhase;
  readonly forkExists: boolean;
  /** true only when the fork did not exist before this run */
  readonly forkCreatedByRun: boolean;
  readonly branchExists: boolean;
  readonly localClonePresent: boolean;
  readonly pullRequestUrl?: string;
  readonly pullRequestNumber?: number;
}

export function initialRepositoryState(): RepositoryState {
  return Object.freeze({
    phase: RepositoryPhase.NO_FORK,
    forkExists: false,
    forkCreatedByRun: false,
    branchExists: false,
    localClonePresent: false,
  });
}

export function advance(state: RepositoryState, changes: Partial<RepositoryState>): RepositoryState {
  return Object.freeze({...state, ...changes});
}

/**
 * @throws IllegalArgumentError when `state` is not in the phase `operation` starts from
 */
export function assertPhase(state: RepositoryState, expected: RepositoryPhase, operation: string): void {
  if (state.phase !== expected) {
    throw new IllegalArgumentError(
      `Cannot ${operation} while the repository is in phase ${state.phase}, expected ${expected}`,
      state.phase,
    );
  }
}
