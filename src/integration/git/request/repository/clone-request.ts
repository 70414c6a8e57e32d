// SPDX-License-Identifier: Apache-2.0

import {type GitExecutionBuilder} from '../../execution/git-execution-builder.js';
import {type GitRequest, requireNonBlank} from '../git-request.js';
import {type GitRemote} from '../../model/git-remote.js';

/**
 * A request to clone a remote repository into a local directory.
 */
export class CloneRequest implements GitRequest {
  public constructor(
    private readonly remote: GitRemote,
    private readonly destination: string,
  ) {
    requireNonBlank(destination, 'destination');
  }

  public apply(builder: GitExecutionBuilder): void {
    builder
      .subcommands('clone')
      .positional(this.remote.url())
      .positional(this.destination)
      .secrets(...this.remote.secrets());
  }
}
