// SPDX-License-Identifier: Apache-2.0

import {spawn} from 'node:child_process';
import {inject, injectable} from 'tsyringe-neo';
import {type BotLogger} from './logging/bot-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';

/** Outcome of an external command; a non-zero status is reported, never thrown */
export interface CommandResult {
  readonly status: number;
  readonly output: string;
  readonly diagnostic: string;
}

export interface CommandOptions {
  /** directory the process starts in; the process-wide cwd is never changed */
  readonly workingDirectory: string;
  /** values replaced by `***` whenever the command line is logged */
  readonly secrets?: readonly string[];
  readonly environment?: Readonly<Record<string, string>>;
}

/** exit status reported when the executable could not be started at all */
export const SPAWN_FAILURE_STATUS = 127;

export function maskSecrets(text: string, secrets: readonly string[] = []): string {
  let masked = text;
  for (const secret of secrets) {
    if (secret) {
      masked = masked.split(secret).join('***');
    }
  }
  return masked;
}

@injectable()
export class CommandRunner {
  private readonly logger: BotLogger;

  public constructor(@inject(InjectTokens.BotLogger) logger?: BotLogger) {
    this.logger = patchInject(logger, InjectTokens.BotLogger, this.constructor.name);
  }

  /** Runs an executable with an argument list (no shell) and resolves once it exits */
  public run(executable: string, arguments_: readonly string[], options: CommandOptions): Promise<CommandResult> {
    const display = maskSecrets([executable, ...arguments_].join(' '), options.secrets);
    this.logger.debug(`Executing command: '${display}' in ${options.workingDirectory}`);

    return new Promise<CommandResult>(resolve => {
      const child = spawn(executable, [...arguments_], {
        cwd: options.workingDirectory,
        env: {...process.env, ...options.environment},
        shell: false,
      });

      const output: string[] = [];
      child.stdout.on('data', (d: Buffer) => output.push(d.toString()));

      const errorOutput: string[] = [];
      child.stderr.on('data', (d: Buffer) => errorOutput.push(d.toString()));

      let settled = false;
      child.on('error', error => {
        if (settled) {
          return;
        }
        settled = true;
        this.logger.error(`Error starting: '${display}': ${error.message}`);
        resolve({status: SPAWN_FAILURE_STATUS, output: '', diagnostic: error.message});
      });

      child.on('close', code => {
        if (settled) {
          return;
        }
        settled = true;
        const result: CommandResult = {
          status: code ?? 1,
          output: maskSecrets(output.join('').trim(), options.secrets),
          diagnostic: maskSecrets(errorOutput.join('').trim(), options.secrets),
        };

        if (result.status === 0) {
          this.logger.debug(`Finished executing: '${display}'`, {commandExitCode: result.status});
        } else {
          this.logger.error(`Error executing: '${display}'`, {
            commandExitCode: result.status,
            commandOutput: result.output,
            errOutput: result.diagnostic,
          });
        }
        resolve(result);
      });
    });
  }
}
