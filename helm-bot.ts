#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install(); // Enable source maps for error stack traces
import * as bot from './src/index.js';
import {type BotLogger} from './src/core/logging/bot-logger.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type ErrorHandler} from './src/core/error-handler.js';

const context: {logger?: BotLogger} = {};
await bot
  .main(process.argv, context)
  .then(() => {
    context.logger?.info('Helm Upgrade Bot completed, via entrypoint');
  })
  .catch((error: unknown) => {
    if (!context.logger) {
      console.error(error);
      process.exitCode = 1;
      return;
    }
    const errorHandler = container.resolve<ErrorHandler>(InjectTokens.ErrorHandler);
    if (!errorHandler.handle(error)) {
      process.exitCode = 1;
    }
  });
