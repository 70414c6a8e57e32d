// SPDX-License-Identifier: Apache-2.0

import {HelmBotError} from '../../core/errors/helm-bot-error.js';
import {type CommandResult} from '../../core/command-runner.js';

/**
 * Raised when a git invocation exits with a non-zero status.
 */
export class GitCommandError extends HelmBotError {
  /**
   * The default message to use when no message is provided
   */
  private static readonly DEFAULT_MESSAGE = "Git command '%s' failed with exit code: %d";

  public readonly command: string;
  public readonly exitCode: number;
  public readonly stdOut: string;
  public readonly stdErr: string;

  /**
   * @param command - the git command line, with secrets masked
   * @param result - the outcome reported by the command runner
   * @param message - overrides the default message
   */
  public constructor(command: string, result: CommandResult, message?: string) {
    super(
      message ??
        GitCommandError.DEFAULT_MESSAGE.replace('%s', command).replace('%d', result.status.toString()) +
          (result.diagnostic ? `: ${result.diagnostic}` : ''),
      undefined,
      {command, exitCode: result.status},
    );
    this.command = command;
    this.exitCode = result.status;
    this.stdOut = result.output;
    this.stdErr = result.diagnostic;
  }

  public override toString(): string {
    return `GitCommandError{message=${this.message}, exitCode=${this.exitCode}, stdOut='${this.stdOut}', stdErr='${this.stdErr}'}`;
  }
}
