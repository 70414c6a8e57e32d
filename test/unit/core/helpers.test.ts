// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {sleep, splitFlagInput} from '../../../src/core/helpers.js';

describe('Helpers', () => {
  describe('splitFlagInput', () => {
    it('should split and trim comma separated values', () => {
      expect(splitFlagInput('dependencies, helm ,bot')).to.deep.equal(['dependencies', 'helm', 'bot']);
    });

    it('should drop empty items', () => {
      expect(splitFlagInput(',dependencies,,')).to.deep.equal(['dependencies']);
      expect(splitFlagInput('')).to.deep.equal([]);
    });

    it('should accept another separator', () => {
      expect(splitFlagInput('a b  c', ' ')).to.deep.equal(['a', 'b', 'c']);
    });
  });

  it('should resolve after sleeping', async () => {
    const start = Date.now();
    await sleep(5);
    expect(Date.now() - start).to.be.at.least(4);
  });
});
