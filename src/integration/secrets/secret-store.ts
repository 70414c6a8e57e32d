// SPDX-License-Identifier: Apache-2.0

/**
 * Source of the API token. Implementations reject with a SecretRetrievalError.
 */
export interface SecretStore {
  readonly description: string;

  getSecret(name: string): Promise<string>;
}
