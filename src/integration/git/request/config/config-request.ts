// SPDX-License-Identifier: Apache-2.0

import {type GitExecutionBuilder} from '../../execution/git-execution-builder.js';
import {type GitRequest, requireNonBlank} from '../git-request.js';

/**
 * A request to set a configuration value in the repository's local config.
 */
export class ConfigRequest implements GitRequest {
  public constructor(
    private readonly key: string,
    private readonly value: string,
  ) {
    requireNonBlank(key, 'key');
    requireNonBlank(value, 'value');
  }

  public apply(builder: GitExecutionBuilder): void {
    builder.subcommands('config').positional(this.key).positional(this.value);
  }
}
