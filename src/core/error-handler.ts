// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type BotLogger} from './logging/bot-logger.js';
import {UserBreak} from './errors/user-break.js';

@injectable()
export class ErrorHandler {
  private readonly logger: BotLogger;

  public constructor(@inject(InjectTokens.BotLogger) logger?: BotLogger) {
    this.logger = patchInject(logger, InjectTokens.BotLogger, this.constructor.name);
  }

  /**
   * Render an error for the user
   * @returns true when the error was a break and the process should still exit successfully
   */
  public handle(error: unknown): boolean {
    const error_ = this.extractBreak(error);
    if (error_ instanceof UserBreak) {
      this.handleUserBreak(error_);
      return true;
    }
    this.handleError(error);
    return false;
  }

  private handleUserBreak(userBreak: UserBreak): void {
    this.logger.showUser(userBreak.message);
  }

  private handleError(error: unknown): void {
    this.logger.showUserError(error);
  }

  /**
   * Recursively checks if an error is or is caused by a UserBreak
   * Returns the UserBreak if found, otherwise false
   */
  private extractBreak(error: unknown): UserBreak | false {
    if (error instanceof UserBreak) {
      return error;
    }
    if (error instanceof Error && error.cause !== undefined) {
      return this.extractBreak(error.cause);
    }
    return false;
  }
}
