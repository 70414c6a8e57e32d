// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {HelmBotError} from '../../../src/core/errors/helm-bot-error.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {MissingArgumentError} from '../../../src/core/errors/missing-argument-error.js';
import {ResourceNotFoundError} from '../../../src/core/errors/resource-not-found-error.js';
import {ForkOperationError} from '../../../src/core/errors/fork-operation-error.js';
import {ManifestFormatError} from '../../../src/core/errors/manifest-format-error.js';
import {PublishError} from '../../../src/core/errors/publish-error.js';
import {SecretRetrievalError} from '../../../src/core/errors/secret-retrieval-error.js';
import {UnsupportedChartSourceError} from '../../../src/core/errors/unsupported-chart-source-error.js';

describe('Errors', () => {
  const message = 'errorMessage';
  const cause = new Error('cause');

  it('should construct correct HelmBotError', () => {
    const error = new HelmBotError(message, cause);
    expect(error).to.be.instanceof(Error);
    expect(error.name).to.equal('HelmBotError');
    expect(error.message).to.equal(message);
    expect(error.cause).to.equal(cause);
    expect(error.meta).to.deep.equal({});
    expect(error.stack).to.contain('Caused by: Error: cause');
  });

  it('should construct correct ResourceNotFoundError', () => {
    const resource = 'resource';
    const error = new ResourceNotFoundError(message, resource);
    expect(error).to.be.instanceof(HelmBotError);
    expect(error.name).to.equal('ResourceNotFoundError');
    expect(error.message).to.equal(message);
    expect(error.cause).to.be.undefined;
    expect(error.meta).to.deep.equal({resource});
  });

  it('should construct correct MissingArgumentError', () => {
    const error = new MissingArgumentError(message);
    expect(error).to.be.instanceof(HelmBotError);
    expect(error.name).to.equal('MissingArgumentError');
    expect(error.meta).to.deep.equal({});
  });

  it('should construct correct IllegalArgumentError', () => {
    const value = 'invalid argument';
    const error = new IllegalArgumentError(message, value);
    expect(error).to.be.instanceof(HelmBotError);
    expect(error.name).to.equal('IllegalArgumentError');
    expect(error.meta).to.deep.equal({value});
  });

  it('should construct correct ForkOperationError', () => {
    const error = new ForkOperationError(message, 'upgrade-bot/chart-deploy', cause);
    expect(error.name).to.equal('ForkOperationError');
    expect(error.cause).to.equal(cause);
    expect(error.meta).to.deep.equal({repository: 'upgrade-bot/chart-deploy'});
  });

  it('should construct correct ManifestFormatError', () => {
    const error = new ManifestFormatError(message, 'dependencies[chartA].version');
    expect(error.name).to.equal('ManifestFormatError');
    expect(error.meta).to.deep.equal({path: 'dependencies[chartA].version'});
  });

  it('should construct correct PublishError', () => {
    const error = new PublishError(message, 422, '{"message":"Validation Failed"}');
    expect(error.name).to.equal('PublishError');
    expect(error.status).to.equal(422);
    expect(error.responseBody).to.equal('{"message":"Validation Failed"}');
    expect(error.meta).to.deep.equal({status: 422, responseBody: '{"message":"Validation Failed"}'});
  });

  it('should construct correct SecretRetrievalError', () => {
    const error = new SecretRetrievalError(message, 'bot-token');
    expect(error.name).to.equal('SecretRetrievalError');
    expect(error.meta).to.deep.equal({secretName: 'bot-token'});
  });

  it('should construct correct UnsupportedChartSourceError', () => {
    const error = new UnsupportedChartSourceError('chartA', 'https://charts.example.org/chartA.tgz');
    expect(error.name).to.equal('UnsupportedChartSourceError');
    expect(error.message).to.equal(
      "Fetching versions from the following URL type is not supported for 'chartA': https://charts.example.org/chartA.tgz",
    );
    expect(error.meta).to.deep.equal({chartName: 'chartA', url: 'https://charts.example.org/chartA.tgz'});
  });
});
