// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {type UpgradeCommand} from './upgrade.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type CommandDefinition} from '../types/index.js';

/**
 * Return a list of Yargs command builder to be exposed through CLI
 * @returns an array of Yargs command builder
 */
export function Initialize(): CommandDefinition[] {
  return [container.resolve<UpgradeCommand>(InjectTokens.UpgradeCommand).getCommandDefinition()];
}
