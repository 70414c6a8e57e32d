// SPDX-License-Identifier: Apache-2.0

import {maskSecrets} from '../../../core/command-runner.js';

/** A fully built git invocation */
export interface GitExecution {
  readonly executable: string;
  readonly arguments: readonly string[];
  readonly workingDirectory: string;
  readonly secrets: readonly string[];
  /** command line with secrets masked */
  readonly display: string;
}

/**
 * A builder for creating a git command execution.
 */
export class GitExecutionBuilder {
  private static readonly VALUE_MUST_NOT_BE_NULL = 'value must not be null';

  /**
   * The list of subcommands to be used when executing the git command.
   */
  private readonly _subcommands: string[] = [];

  /**
   * The arguments to be passed to the git command.
   */
  private readonly _arguments: Array<{key: string; value: string}> = [];

  /**
   * The flags to be passed to the git command.
   */
  private readonly _flags: string[] = [];

  /**
   * The positional arguments to be passed to the git command.
   */
  private readonly _positionals: string[] = [];

  /**
   * Values that are replaced with a mask whenever the command is displayed.
   */
  private readonly _secrets: string[] = [];

  private _workingDirectory?: string;

  public constructor(private readonly gitExecutable: string) {}

  public subcommands(...commands: string[]): GitExecutionBuilder {
    this._subcommands.push(...commands);
    return this;
  }

  /**
   * Adds an option with a value, rendered as `--name value`.
   */
  public argument(name: string, value: string): GitExecutionBuilder {
    if (!name) {
      throw new Error('name must not be null');
    }
    if (!value) {
      throw new Error(GitExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._arguments.push({key: name, value});
    return this;
  }

  public flag(flag: string): GitExecutionBuilder {
    if (!flag) {
      throw new Error('flag must not be null');
    }
    this._flags.push(flag);
    return this;
  }

  public positional(value: string): GitExecutionBuilder {
    if (!value) {
      throw new Error(GitExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._positionals.push(value);
    return this;
  }

  public secrets(...values: string[]): GitExecutionBuilder {
    this._secrets.push(...values.filter(value => value.length > 0));
    return this;
  }

  public workingDirectory(workingDirectoryPath: string): GitExecutionBuilder {
    if (!workingDirectoryPath) {
      throw new Error('workingDirectoryPath must not be null');
    }
    this._workingDirectory = workingDirectoryPath;
    return this;
  }

  public build(): GitExecution {
    if (!this._workingDirectory) {
      throw new Error('workingDirectory must be set before building a git execution');
    }

    const command = this.buildCommand();
    return {
      executable: this.gitExecutable,
      arguments: command,
      workingDirectory: this._workingDirectory,
      secrets: [...this._secrets],
      display: maskSecrets([this.gitExecutable, ...command].join(' '), this._secrets),
    };
  }

  private buildCommand(): string[] {
    const command: string[] = [...this._subcommands, ...this._flags];

    for (const {key, value} of this._arguments) {
      command.push(`--${key}`, value);
    }

    command.push(...this._positionals);
    return command;
  }
}
