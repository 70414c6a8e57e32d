// SPDX-License-Identifier: Apache-2.0

import {type GitExecutionBuilder} from '../../execution/git-execution-builder.js';
import {type GitRequest, requireNonBlank} from '../git-request.js';
import {type GitRemote} from '../../model/git-remote.js';

/**
 * A request to pull a branch of another remote into the current branch.
 */
export class PullBranchRequest implements GitRequest {
  public constructor(
    private readonly remote: GitRemote,
    private readonly branch: string,
  ) {
    requireNonBlank(branch, 'branch');
  }

  public apply(builder: GitExecutionBuilder): void {
    builder
      .subcommands('pull')
      .flag('--no-edit')
      .positional(this.remote.url())
      .positional(this.branch)
      .secrets(...this.remote.secrets());
  }
}
