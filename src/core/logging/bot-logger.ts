// SPDX-License-Identifier: Apache-2.0

/**
 * Logging used throughout the bot: `showUser` and `showUserError` print to the terminal as well as the log.
 */
export interface BotLogger {
  nextTraceId(): void;

  showUser(message: string, ...arguments_: unknown[]): void;

  showUserError(error: unknown): void;

  error(message: string, ...arguments_: unknown[]): void;

  warn(message: string, ...arguments_: unknown[]): void;

  info(message: string, ...arguments_: unknown[]): void;

  debug(message: string, ...arguments_: unknown[]): void;
}
