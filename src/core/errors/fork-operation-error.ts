// SPDX-License-Identifier: Apache-2.0

import {HelmBotError} from './helm-bot-error.js';

export class ForkOperationError extends HelmBotError {
  /**
   * @param message - error message
   * @param repository - `owner/name` of the repository the operation targeted
   * @param cause - source error (if any)
   */
  public constructor(message: string, repository: string, cause?: unknown) {
    super(message, cause, {repository});
  }
}
