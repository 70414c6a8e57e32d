// SPDX-License-Identifier: Apache-2.0

import {type GitExecutionBuilder} from '../execution/git-execution-builder.js';

/**
 * Interface for git request parameters that can be applied to a GitExecutionBuilder.
 */
export interface GitRequest {
  /**
   * Applies this request's parameters to the given builder.
   * @param builder The builder to apply the parameters to
   */
  apply(builder: GitExecutionBuilder): void;
}

export function requireNonBlank(value: string, name: string): void {
  if (!value || value.trim() === '') {
    throw new Error(`${name} must not be null or blank`);
  }
}
