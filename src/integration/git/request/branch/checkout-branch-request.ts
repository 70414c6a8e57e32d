// SPDX-License-Identifier: Apache-2.0

import {type GitExecutionBuilder} from '../../execution/git-execution-builder.js';
import {type GitRequest, requireNonBlank} from '../git-request.js';

/**
 * A request to create a new branch from the current HEAD and check it out.
 */
export class CheckoutBranchRequest implements GitRequest {
  public constructor(private readonly branch: string) {
    requireNonBlank(branch, 'branch');
  }

  public apply(builder: GitExecutionBuilder): void {
    builder.subcommands('checkout').flag('-b').positional(this.branch);
  }
}
