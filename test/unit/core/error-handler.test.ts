// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {ErrorHandler} from '../../../src/core/error-handler.js';
import {HelmBotError} from '../../../src/core/errors/helm-bot-error.js';
import {UserBreak} from '../../../src/core/errors/user-break.js';
import {TestLogger} from '../../helpers/test-logger.js';

describe('ErrorHandler', () => {
  let logger: TestLogger;
  let handler: ErrorHandler;

  beforeEach(() => {
    logger = new TestLogger();
    handler = new ErrorHandler(logger);
  });

  it('should show a user break to the user', () => {
    expect(handler.handle(new UserBreak('Aborted by user'))).to.be.true;
    expect(logger.messages('user')).to.deep.equal(['Aborted by user']);
    expect(logger.userErrors).to.deep.equal([]);
  });

  it('should find a break in the cause chain', () => {
    const error = new HelmBotError('outer', new HelmBotError('middle', new UserBreak('stopped')));

    expect(handler.handle(error)).to.be.true;
    expect(logger.messages('user')).to.deep.equal(['stopped']);
  });

  it('should show any other error as a failure', () => {
    const error = new HelmBotError('Error upgrading helm chart dependencies: boom');

    expect(handler.handle(error)).to.be.false;
    expect(logger.userErrors).to.deep.equal([error]);
  });
});
