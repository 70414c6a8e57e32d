// SPDX-License-Identifier: Apache-2.0

export type FlagType = 'string' | 'boolean' | 'array';

export type FlagValue = string | boolean | string[];

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Definition;
}

export interface Definition {
  describe: string;
  defaultValue?: FlagValue;
  alias?: string;
  type: FlagType;
}
