// SPDX-License-Identifier: Apache-2.0

import {type GitExecutionBuilder} from '../../execution/git-execution-builder.js';
import {type GitRequest, requireNonBlank} from '../git-request.js';

export class CommitRequest implements GitRequest {
  public constructor(private readonly message: string) {
    requireNonBlank(message, 'message');
  }

  public apply(builder: GitExecutionBuilder): void {
    builder.subcommands('commit').argument('message', this.message);
  }
}
