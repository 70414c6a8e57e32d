// SPDX-License-Identifier: Apache-2.0

import {type GitExecutionBuilder} from '../../execution/git-execution-builder.js';
import {type GitRequest, requireNonBlank} from '../git-request.js';
import {type GitRemote} from '../../model/git-remote.js';

export class PushRequest implements GitRequest {
  public constructor(
    private readonly remote: GitRemote,
    private readonly branch: string,
  ) {
    requireNonBlank(branch, 'branch');
  }

  public apply(builder: GitExecutionBuilder): void {
    builder
      .subcommands('push')
      .positional(this.remote.url())
      .positional(this.branch)
      .secrets(...this.remote.secrets());
  }
}
