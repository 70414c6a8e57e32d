// SPDX-License-Identifier: Apache-2.0

import {Octokit} from '@octokit/rest';
import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {
  OctokitGitHubClient,
  responseBody,
  responseStatus,
} from '../../../../src/integration/github/impl/octokit-github-client.js';
import {ForkOperationError} from '../../../../src/core/errors/fork-operation-error.js';
import {PublishError} from '../../../../src/core/errors/publish-error.js';
import {TestLogger} from '../../../helpers/test-logger.js';

interface RecordedRequest {
  method: string;
  url: string;
  body?: unknown;
}

interface StubbedResponse {
  status: number;
  body?: unknown;
}

describe('OctokitGitHubClient', () => {
  let requests: RecordedRequest[];
  let responses: StubbedResponse[];
  let logger: TestLogger;
  let client: OctokitGitHubClient;

  async function fetchStub(input: string | URL | Request, init: RequestInit = {}): Promise<Response> {
    requests.push({
      method: init.method ?? 'GET',
      url: typeof input === 'string' ? input : input instanceof URL ? input.href : input.url,
      body: typeof init.body === 'string' ? JSON.parse(init.body) : undefined,
    });
    const next = responses.shift() ?? {status: 200, body: {}};
    const body = next.status === 204 ? null : JSON.stringify(next.body ?? {});
    return new Response(body, {status: next.status, headers: {'content-type': 'application/json'}});
  }

  beforeEach(() => {
    requests = [];
    responses = [];
    logger = new TestLogger();
    client = new OctokitGitHubClient(new Octokit({auth: 'test-secret', request: {fetch: fetchStub}}), logger);
  });

  it('should return the login of the token owner', async () => {
    responses.push({status: 200, body: {login: 'upgrade-bot'}});

    expect(await client.authenticatedLogin()).to.equal('upgrade-bot');
    expect(requests).to.deep.equal([{method: 'GET', url: 'https://api.github.com/user', body: undefined}]);
  });

  it('should report a missing repository as absent', async () => {
    responses.push({status: 404, body: {message: 'Not Found'}});

    expect(await client.repositoryExists('upgrade-bot', 'chart-deploy')).to.be.false;
    expect(requests[0].url).to.equal('https://api.github.com/repos/upgrade-bot/chart-deploy');
  });

  it('should report an existing repository as present', async () => {
    responses.push({status: 200, body: {full_name: 'upgrade-bot/chart-deploy'}});

    expect(await client.repositoryExists('upgrade-bot', 'chart-deploy')).to.be.true;
  });

  it('should raise a ForkOperationError for other failures of the existence check', async () => {
    responses.push({status: 401, body: {message: 'Bad credentials'}});

    await expect(client.repositoryExists('upgrade-bot', 'chart-deploy')).to.be.rejectedWith(
      ForkOperationError,
      'Could not check whether repository exists: upgrade-bot/chart-deploy: {"message":"Bad credentials"}',
    );
  });

  it('should request a fork into the account of the token owner', async () => {
    responses.push(
      {status: 200, body: {login: 'upgrade-bot'}},
      {status: 202, body: {full_name: 'upgrade-bot/chart-deploy'}},
    );

    await client.createFork('upstream-org', 'chart-deploy', 'upgrade-bot');

    expect(requests[0].url).to.equal('https://api.github.com/user');
    expect(requests[1].method).to.equal('POST');
    expect(requests[1].url).to.equal('https://api.github.com/repos/upstream-org/chart-deploy/forks');
    expect(requests[1].body ?? {}).to.deep.equal({});
    expect(logger.messages('info')).to.deep.equal(['Creating fork of: upstream-org/chart-deploy in upgrade-bot']);
  });

  it('should request a fork into an organization', async () => {
    responses.push(
      {status: 200, body: {login: 'upgrade-bot'}},
      {status: 202, body: {full_name: 'charts-org/chart-deploy'}},
    );

    await client.createFork('upstream-org', 'chart-deploy', 'charts-org');

    expect(requests[1].url).to.equal('https://api.github.com/repos/upstream-org/chart-deploy/forks');
    expect(requests[1].body).to.deep.equal({organization: 'charts-org'});
  });

  it('should delete a repository', async () => {
    responses.push({status: 204});

    await client.deleteRepository('upgrade-bot', 'chart-deploy');

    expect(requests[0].method).to.equal('DELETE');
    expect(requests[0].url).to.equal('https://api.github.com/repos/upgrade-bot/chart-deploy');
  });

  it('should raise a ForkOperationError when a repository cannot be deleted', async () => {
    responses.push({status: 403, body: {message: 'Must have admin rights to Repository.'}});

    await expect(client.deleteRepository('upgrade-bot', 'chart-deploy')).to.be.rejectedWith(
      ForkOperationError,
      'Could not delete repository: upgrade-bot/chart-deploy: {"message":"Must have admin rights to Repository."}',
    );
  });

  it('should list branch names', async () => {
    responses.push({status: 200, body: [{name: 'main'}, {name: 'helm_chart_bump'}]});

    expect(await client.listBranches('upgrade-bot', 'chart-deploy')).to.deep.equal(['main', 'helm_chart_bump']);
    expect(requests[0].url).to.equal('https://api.github.com/repos/upgrade-bot/chart-deploy/branches?per_page=100');
  });

  it('should open a pull request from the fork branch', async () => {
    responses.push({
      status: 201,
      body: {number: 7, html_url: 'https://github.com/upstream-org/chart-deploy/pull/7'},
    });

    const summary = await client.createPullRequest('upstream-org', 'chart-deploy', {
      title: 'Bumping helm chart dependency versions: chartA',
      body: 'body',
      baseBranch: 'main',
      headRef: 'upgrade-bot:helm_chart_bump',
    });

    expect(summary).to.deep.equal({number: 7, htmlUrl: 'https://github.com/upstream-org/chart-deploy/pull/7'});
    expect(requests[0]).to.deep.equal({
      method: 'POST',
      url: 'https://api.github.com/repos/upstream-org/chart-deploy/pulls',
      body: {
        title: 'Bumping helm chart dependency versions: chartA',
        body: 'body',
        base: 'main',
        head: 'upgrade-bot:helm_chart_bump',
      },
    });
  });

  it('should raise a PublishError carrying the rejected response', async () => {
    responses.push({status: 422, body: {message: 'Validation Failed'}});

    const error = await client
      .createPullRequest('upstream-org', 'chart-deploy', {
        title: 'title',
        body: 'body',
        baseBranch: 'main',
        headRef: 'upgrade-bot:helm_chart_bump',
        })
      .then(
        () => undefined,
        (reason: unknown) => reason,
      );

    expect(error).to.be.instanceOf(PublishError);
    if (error instanceof PublishError) {
      expect(error.status).to.equal(422);
      expect(error.responseBody).to.equal('{"message":"Validation Failed"}');
      expect(error.message).to.equal(
        'Could not open pull request on: upstream-org/chart-deploy: {"message":"Validation Failed"}',
      );
    }
  });

  it('should add labels to the pull request', async () => {
    responses.push({status: 200, body: [{name: 'dependencies'}]});

    await client.addLabels('upstream-org', 'chart-deploy', 7, ['dependencies']);

    expect(requests[0]).to.deep.equal({
      method: 'POST',
      url: 'https://api.github.com/repos/upstream-org/chart-deploy/issues/7/labels',
      body: {labels: ['dependencies']},
    });
  });

  describe('response helpers', () => {
    it('should read the status of a request error', () => {
      expect(responseStatus({status: 404})).to.equal(404);
      expect(responseStatus(new Error('network down'))).to.be.undefined;
    });

    it('should serialize the response body of a request error', () => {
      expect(responseBody({response: {data: {message: 'Not Found'}}})).to.equal('{"message":"Not Found"}');
      expect(responseBody({response: {data: 'plain'}})).to.equal('plain');
      expect(responseBody(new Error('network down'))).to.equal('network down');
    });
  });
});
