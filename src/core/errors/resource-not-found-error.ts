// SPDX-License-Identifier: Apache-2.0

import {HelmBotError} from './helm-bot-error.js';

export class ResourceNotFoundError extends HelmBotError {
  /**
   * Create a custom error for resource not found scenario
   *
   * error metadata will include `resource`
   *
   * @param message - error message
   * @param resource - name of the resource
   * @param cause - source error (if any)
   */
  public constructor(message: string, resource: string, cause?: unknown) {
    super(message, cause, {resource});
  }
}
