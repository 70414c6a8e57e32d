// SPDX-License-Identifier: Apache-2.0

import {type GitExecutionBuilder} from '../../execution/git-execution-builder.js';
import {type GitRequest, requireNonBlank} from '../git-request.js';

export class AddRequest implements GitRequest {
  public constructor(private readonly file: string) {
    requireNonBlank(file, 'file');
  }

  public apply(builder: GitExecutionBuilder): void {
    builder.subcommands('add').positional(this.file);
  }
}
