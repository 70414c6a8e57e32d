// SPDX-License-Identifier: Apache-2.0

import {type GitExecutionBuilder} from '../../execution/git-execution-builder.js';
import {type GitRequest, requireNonBlank} from '../git-request.js';

export class BranchListRequest implements GitRequest {
  public constructor(private readonly branch: string) {
    requireNonBlank(branch, 'branch');
  }

  public apply(builder: GitExecutionBuilder): void {
    builder.subcommands('branch').flag('--list').positional(this.branch);
  }
}
