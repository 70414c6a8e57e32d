// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import {getBotVersion} from '../../version.js';

describe('getBotVersion', () => {
  let packageVersion: string | undefined;

  beforeEach(() => {
    packageVersion = process.env.npm_package_version;
  });

  afterEach(() => {
    if (packageVersion === undefined) {
      delete process.env.npm_package_version;
    } else {
      process.env.npm_package_version = packageVersion;
    }
  });

  it('should prefer the version npm reports', () => {
    process.env.npm_package_version = '9.9.9';
    expect(getBotVersion()).to.equal('9.9.9');
  });

  it('should read the version from package.json', () => {
    delete process.env.npm_package_version;
    expect(getBotVersion()).to.equal('0.1.0');
  });
});
