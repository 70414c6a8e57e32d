// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {CommandRunner, maskSecrets, SPAWN_FAILURE_STATUS} from '../../../src/core/command-runner.js';
import {TestLogger} from '../../helpers/test-logger.js';
import {getTemporaryDirectory} from '../../test-utility.js';

describe('CommandRunner', () => {
  let logger: TestLogger;
  let runner: CommandRunner;
  let workingDirectory: string;

  beforeEach(() => {
    logger = new TestLogger();
    runner = new CommandRunner(logger);
    workingDirectory = getTemporaryDirectory('helm-bot-runner-');
  });

  it('should capture the output and mask secrets', async () => {
    const script = "process.stdout.write('hello test-secret')";
    const result = await runner.run(process.execPath, ['-e', script], {workingDirectory, secrets: ['test-secret']});

    expect(result).to.deep.equal({status: 0, output: 'hello ***', diagnostic: ''});
    expect(logger.messages('debug')).to.deep.equal([
      `Executing command: '${process.execPath} -e process.stdout.write('hello ***')' in ${workingDirectory}`,
      `Finished executing: '${process.execPath} -e process.stdout.write('hello ***')'`,
    ]);
  });

  it('should report a non-zero exit status without throwing', async () => {
    const result = await runner.run(process.execPath, ['-e', "process.stderr.write('boom'); process.exit(3)"], {
      workingDirectory,
    });

    expect(result).to.deep.equal({status: 3, output: '', diagnostic: 'boom'});
    expect(logger.messages('error')).to.have.lengthOf(1);
  });

  it('should start the process in the given directory', async () => {
    const result = await runner.run(process.execPath, ['-e', 'process.stdout.write(process.cwd())'], {
      workingDirectory,
    });

    expect(fs.realpathSync(result.output)).to.equal(fs.realpathSync(workingDirectory));
  });

  it('should report an executable that cannot be started', async () => {
    const result = await runner.run('helm-bot-missing-executable', [], {workingDirectory});

    expect(result.status).to.equal(SPAWN_FAILURE_STATUS);
    expect(result.output).to.equal('');
    expect(result.diagnostic).to.contain('ENOENT');
  });

  describe('maskSecrets', () => {
    it('should replace every occurrence of every secret', () => {
      expect(maskSecrets('a test-secret b test-secret c other', ['test-secret', 'other'])).to.equal('a *** b *** c ***');
    });

    it('should ignore empty secrets', () => {
      expect(maskSecrets('unchanged', [''])).to.equal('unchanged');
    });
  });
});
