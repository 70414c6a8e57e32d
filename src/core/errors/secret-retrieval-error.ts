// SPDX-License-Identifier: Apache-2.0

import {HelmBotError} from './helm-bot-error.js';

export class SecretRetrievalError extends HelmBotError {
  /**
   * Raised when the API token cannot be read from the configured secret store
   *
   * @param message - error message
   * @param secretName - name of the secret that was requested
   * @param cause - source error (if any)
   */
  public constructor(message: string, secretName: string, cause?: unknown) {
    super(message, cause, {secretName});
  }
}
