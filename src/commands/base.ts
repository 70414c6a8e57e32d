// SPDX-License-Identifier: Apache-2.0

import {inject} from 'tsyringe-neo';
import {type ConfigManager} from '../core/config-manager.js';
import {type BotLogger} from '../core/logging/bot-logger.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type CommandDefinition} from '../types/index.js';

export abstract class BaseCommand {
  protected readonly logger: BotLogger;
  public readonly configManager: ConfigManager;

  protected constructor(
    @inject(InjectTokens.BotLogger) logger?: BotLogger,
    @inject(InjectTokens.ConfigManager) configManager?: ConfigManager,
  ) {
    this.logger = patchInject(logger, InjectTokens.BotLogger, this.constructor.name);
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
  }

  public abstract getCommandDefinition(): CommandDefinition;
}
