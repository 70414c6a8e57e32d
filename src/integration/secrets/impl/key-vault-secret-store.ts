// SPDX-License-Identifier: Apache-2.0

import {SecretClient} from '@azure/keyvault-secrets';
import {DefaultAzureCredential, ManagedIdentityCredential, type TokenCredential} from '@azure/identity';
import {type SecretStore} from '../secret-store.js';
import {SecretRetrievalError} from '../../../core/errors/secret-retrieval-error.js';
import {type BotLogger} from '../../../core/logging/bot-logger.js';

/** The subset of the Key Vault SecretClient used here */
export interface SecretReader {
  getSecret(name: string): Promise<{value?: string}>;
}

export function keyVaultUrl(vaultName: string): string {
  return `https://${vaultName}.vault.azure.net`;
}

/**
 * Reads secrets from an Azure Key Vault. With `useManagedIdentity` the vault is accessed with the managed
 * identity of the host; otherwise the default credential chain (environment, Azure CLI login, ...) is used.
 */
export class KeyVaultSecretStore implements SecretStore {
  public readonly description: string;
  private readonly client: SecretReader;

  public constructor(
    vaultName: string,
    useManagedIdentity: boolean,
    private readonly logger: BotLogger,
    client?: SecretReader,
  ) {
    this.description = `key vault ${vaultName}`;
    this.client = client ?? new SecretClient(keyVaultUrl(vaultName), KeyVaultSecretStore.credential(useManagedIdentity));
  }

  private static credential(useManagedIdentity: boolean): TokenCredential {
    return useManagedIdentity ? new ManagedIdentityCredential() : new DefaultAzureCredential();
  }

  public async getSecret(name: string): Promise<string> {
    this.logger.info(`Retrieving secret: ${name} from ${this.description}`);

    let value: string | undefined;
    try {
      const secret = await this.client.getSecret(name);
      value = secret.value;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Could not retrieve secret: ${name}: ${message}`);
      throw new SecretRetrievalError(`Could not retrieve secret ${name} from ${this.description}`, name, error);
    }

    if (!value) {
      throw new SecretRetrievalError(`Secret ${name} in ${this.description} has no value`, name);
    }

    this.logger.info(`Successfully retrieved secret: ${name}`);
    return value;
  }
}
