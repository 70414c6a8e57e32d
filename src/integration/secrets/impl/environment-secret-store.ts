// SPDX-License-Identifier: Apache-2.0

import {type SecretStore} from '../secret-store.js';
import {SecretRetrievalError} from '../../../core/errors/secret-retrieval-error.js';

/**
 * Reads secrets from environment variables; the secret name is the variable name.
 */
export class EnvironmentSecretStore implements SecretStore {
  public readonly description = 'environment';

  public constructor(private readonly environment: NodeJS.ProcessEnv = process.env) {}

  public async getSecret(name: string): Promise<string> {
    const value = this.environment[name];
    if (value === undefined || value.trim() === '') {
      throw new SecretRetrievalError(`Environment variable ${name} is not set`, name);
    }
    return value.trim();
  }
}
