// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import {MissingArgumentError} from './errors/missing-argument-error.js';

export interface GitIdentity {
  readonly name: string;
  readonly email: string;
}

/**
 * Everything a single run needs. Built once from the parsed flags and passed to every step; never mutated.
 */
export interface RunContext {
  readonly repoOwner: string;
  readonly repoName: string;
  readonly chartName: string;
  readonly botAccount: string;
  readonly targetBranch: string;
  readonly baseBranch: string;
  readonly labels: readonly string[];
  readonly manifestFile: string;
  readonly workingDirectory: string;
  readonly dryRun: boolean;
  readonly gitIdentity: GitIdentity;
  readonly token: string;
}

export function createRunContext(values: RunContext): RunContext {
  for (const key of ['repoOwner', 'repoName', 'chartName', 'botAccount', 'targetBranch', 'baseBranch'] as const) {
    if (!values[key] || values[key].trim() === '') {
      throw new MissingArgumentError(`${key} is required`);
    }
  }

  return Object.freeze({
    ...values,
    labels: Object.freeze([...values.labels]),
    gitIdentity: Object.freeze({...values.gitIdentity}),
  });
}

/** Directory the fork is cloned into */
export function cloneDirectory(context: RunContext): string {
  return path.join(context.workingDirectory, context.repoName);
}

/** Manifest path relative to the repository root */
export function manifestPath(context: Pick<RunContext, 'chartName' | 'manifestFile'>): string {
  return path.posix.join(context.chartName, context.manifestFile);
}
