// SPDX-License-Identifier: Apache-2.0

import {type ArgumentsCamelCase, type Argv} from 'yargs';

export type ArgvStruct = ArgumentsCamelCase;

export type AnyYargs = Argv;

export interface CommandDefinition {
  command: string;
  describe: string;
  builder: (y: AnyYargs) => AnyYargs;
  handler: (argv: ArgvStruct) => Promise<void>;
}
