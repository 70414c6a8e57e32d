// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type SecretStore} from './secret-store.js';
import {EnvironmentSecretStore} from './impl/environment-secret-store.js';
import {KeyVaultSecretStore} from './impl/key-vault-secret-store.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {type BotLogger} from '../../core/logging/bot-logger.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {API_TOKEN_ENV} from '../../core/constants.js';

export interface SecretLocation {
  readonly store: SecretStore;
  readonly secretName: string;
}

export interface SecretStoreOptions {
  readonly keyvault?: string;
  readonly tokenName?: string;
  readonly identity: boolean;
}

/**
 * Picks where the API token comes from: a key vault when both a vault and a secret name are given, the
 * API_TOKEN environment variable when neither is.
 */
@injectable()
export class SecretStoreFactory {
  private readonly logger: BotLogger;

  public constructor(@inject(InjectTokens.BotLogger) logger?: BotLogger) {
    this.logger = patchInject(logger, InjectTokens.BotLogger, this.constructor.name);
  }

  public resolve(options: SecretStoreOptions): SecretLocation {
    const {keyvault, tokenName} = options;

    if (keyvault && tokenName) {
      return {store: new KeyVaultSecretStore(keyvault, options.identity, this.logger), secretName: tokenName};
    }

    if (!keyvault && !tokenName) {
      this.logger.debug(`No key vault configured, reading token from ${API_TOKEN_ENV}`);
      return {store: new EnvironmentSecretStore(), secretName: API_TOKEN_ENV};
    }

    throw new IllegalArgumentError(
      'Both a key vault name and a token name must be provided to retrieve the token from a key vault',
      keyvault ?? tokenName,
    );
  }
}
