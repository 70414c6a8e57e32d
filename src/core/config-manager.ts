// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {HelmBotError} from './errors/helm-bot-error.js';
import {MissingArgumentError} from './errors/missing-argument-error.js';
import {type BotLogger} from './logging/bot-logger.js';
import {Flags as flags} from '../commands/flags.js';
import {type CommandFlag, type FlagValue} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/index.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {splitFlagInput} from './helpers.js';

/**
 * ConfigManager holds the command flag values of the current run, coerced to the type each flag declares.
 */
@injectable()
export class ConfigManager {
  private flagValues = new Map<string, FlagValue>();
  private readonly logger: BotLogger;

  public constructor(@inject(InjectTokens.BotLogger) logger?: BotLogger) {
    this.logger = patchInject(logger, InjectTokens.BotLogger, this.constructor.name);
  }

  /** Reset config */
  public reset(): void {
    this.flagValues = new Map();
  }

  /** Update the config using the argv */
  public update(argv: ArgvStruct): void {
    if (!argv || Object.keys(argv).length === 0) {
      return;
    }

    for (const flag of flags.allFlags) {
      const value: unknown = argv[flag.name];
      if (value === undefined || value === null) {
        continue;
      }

      switch (flag.definition.type) {
        case 'string': {
          this.flagValues.set(flag.name, `${value}`); // force convert to string
          break;
        }

        case 'boolean': {
          this.flagValues.set(flag.name, value === true || value === 'true'); // use comparison to enforce boolean value
          break;
        }

        case 'array': {
          const items: unknown[] = Array.isArray(value) ? value : [value];
          this.flagValues.set(
            flag.name,
            items.flatMap(item => splitFlagInput(`${item}`)),
          );
          break;
        }

        default: {
          throw new HelmBotError(`Unsupported field type for flag '${flag.name}': ${flag.definition.type}`);
        }
      }
    }

    const flagMessage = [...this.flagValues.entries()]
      .map(([key, value]) => `${key}=${value}`)
      .join(', ');

    if (flagMessage) {
      this.logger.debug(`Updated config with flags: ${flagMessage}`);
    }
  }

  /** Check if a flag value is set */
  public hasFlag(flag: CommandFlag): boolean {
    return this.flagValues.has(flag.name);
  }

  /**
   * Return the value of the given flag
   * @returns value of the flag or undefined if flag value is not available
   */
  public getFlag(flag: CommandFlag): FlagValue | undefined {
    return this.flagValues.get(flag.name);
  }

  /** the flag's value, or undefined when it is not set or blank */
  public getString(flag: CommandFlag): string | undefined {
    const value = this.getFlag(flag);
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
  }

  public getBoolean(flag: CommandFlag): boolean {
    return this.getFlag(flag) === true;
  }

  public getArray(flag: CommandFlag): string[] {
    const value = this.getFlag(flag);
    return Array.isArray(value) ? [...value] : [];
  }

  /** Set value for the flag */
  public setFlag(flag: CommandFlag, value: FlagValue): void {
    if (!flag || !flag.name) {
      throw new MissingArgumentError('flag must have a name');
    }
    this.flagValues.set(flag.name, value);
  }
}
