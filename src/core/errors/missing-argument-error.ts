// SPDX-License-Identifier: Apache-2.0

import {HelmBotError} from './helm-bot-error.js';

export class MissingArgumentError extends HelmBotError {
  /**
   * Create a custom error for missing argument scenario
   *
   * @param message - error message
   * @param cause - source error (if any)
   */
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
