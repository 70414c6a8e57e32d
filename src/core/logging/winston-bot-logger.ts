// SPDX-License-Identifier: Apache-2.0

import * as winston from 'winston';
import {v4 as uuidv4} from 'uuid';
import * as util from 'node:util';
import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type BotLogger} from './bot-logger.js';

const customFormat = winston.format.combine(
  winston.format.splat(),

  // include timestamp in logs
  winston.format.timestamp(),

  winston.format.ms(),

  // convert levels to upper case
  winston.format(data => {
    data.level = data.level.toUpperCase();
    return data;
  })(),

  // use custom format TIMESTAMP|LEVEL| MESSAGE
  winston.format.printf(data => `${data.timestamp}|${data.level}| ${data.message}`),

  // Ignore log messages if they have { private: true }
  winston.format(data => (data.private ? false : data))(),
);

interface StackEntry {
  message: string;
  stacktrace: string;
}

function describeError(error: unknown): StackEntry {
  if (error instanceof Error) {
    return {message: error.message, stacktrace: error.stack ?? ''};
  }
  return {message: String(error), stacktrace: ''};
}

@injectable()
export class WinstonBotLogger implements BotLogger {
  private readonly winstonLogger: winston.Logger;
  private traceId?: string;
  private readonly developmentMode: boolean;

  /**
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logFilePath - file that receives every log record
   * @param consoleLogging - if true, log records are mirrored to the console
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
    @inject(InjectTokens.LogFilePath) logFilePath?: string,
    @inject(InjectTokens.ConsoleLogging) consoleLogging?: boolean,
  ) {
    logLevel = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    logFilePath = patchInject(logFilePath, InjectTokens.LogFilePath, this.constructor.name);
    consoleLogging = patchInject(consoleLogging, InjectTokens.ConsoleLogging, this.constructor.name);

    this.nextTraceId();

    const transports: winston.transport[] = [new winston.transports.File({filename: logFilePath})];
    if (consoleLogging) {
      transports.push(new winston.transports.Console({format: customFormat}));
    }

    this.winstonLogger = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(customFormat, winston.format.json()),
      transports,
    });
  }


  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  private prepMeta(): {traceId?: string} {
    return {traceId: this.traceId};
  }

  public showUser(message: string, ...arguments_: unknown[]): void {
    console.log(util.format(message, ...arguments_));
    this.info(util.format(message, ...arguments_));
  }

  public showUserError(error: unknown): void {
    const stack: StackEntry[] = [describeError(error)];
    let cause = error instanceof Error ? error.cause : undefined;
    let depth = 0;
    while (cause !== undefined && depth < 10) {
      stack.push(describeError(cause));
      cause = cause instanceof Error ? cause.cause : undefined;
      depth += 1;
    }

    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix = '';
      let indent = '';
      for (const s of stack) {
        console.log(indent + prefix + chalk.yellow(s.message));
        // Remove everything after the first "Caused by: " and add indentation
        const formattedStacktrace = s.stacktrace
          .replace(/Caused by:.*/s, '')
          .replace(/\n\s*/g, '\n' + indent)
          .trim();
        console.log(indent + chalk.gray(formattedStacktrace) + '\n');
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      for (const line of stack[0].message.split('\n')) {
        console.log(chalk.yellow(line));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.error(stack[0].message, {stacktrace: stack[0].stacktrace});
  }

  public error(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.error(message, ...arguments_, this.prepMeta());
  }

  public warn(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.warn(message, ...arguments_, this.prepMeta());
  }

  public info(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.info(message, ...arguments_, this.prepMeta());
  }

  public debug(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.debug(message, ...arguments_, this.prepMeta());
  }
}
