// SPDX-License-Identifier: Apache-2.0

import {HelmBotError} from './helm-bot-error.js';

export class PublishError extends HelmBotError {
  /**
   * @param message - error message
   * @param status - HTTP status of the failed response
   * @param responseBody - body of the failed response, serialized
   * @param cause - source error (if any)
   */
  public constructor(
    message: string,
    public readonly status: number,
    public readonly responseBody: string,
    cause?: unknown,
  ) {
    super(message, cause, {status, responseBody});
  }
}
