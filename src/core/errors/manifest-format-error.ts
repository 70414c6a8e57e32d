// SPDX-License-Identifier: Apache-2.0

import {HelmBotError} from './helm-bot-error.js';

export class ManifestFormatError extends HelmBotError {
  /**
   * Raised when the dependency manifest does not have the expected shape
   *
   * @param message - error message
   * @param path - location inside the document, e.g. `dependencies[chartA].version`
   */
  public constructor(message: string, path: string) {
    super(message, undefined, {path});
  }
}
