// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {
  advance,
  assertPhase,
  initialRepositoryState,
  RepositoryPhase,
} from '../../../../src/core/repository/repository-state.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('RepositoryState', () => {
  it('should start without a fork or clone', () => {
    expect(initialRepositoryState()).to.deep.equal({
      phase: RepositoryPhase.NO_FORK,
      forkExists: false,
      forkCreatedByRun: false,
      branchExists: false,
      localClonePresent: false,
    });
  });

  it('should return a new frozen state when advancing', () => {
    const initial = initialRepositoryState();
    const forked = advance(initial, {phase: RepositoryPhase.FORKED, forkExists: true});

    expect(forked).not.to.equal(initial);
    expect(forked.phase).to.equal(RepositoryPhase.FORKED);
    expect(forked.forkExists).to.be.true;
    expect(initial.phase).to.equal(RepositoryPhase.NO_FORK);
    expect(Object.isFrozen(forked)).to.be.true;
  });

  it('should accept an operation from its expected phase', () => {
    expect(() => assertPhase(initialRepositoryState(), RepositoryPhase.NO_FORK, 'fork')).not.to.throw();
  });

  it('should reject an operation from any other phase', () => {
    const cloned = advance(initialRepositoryState(), {phase: RepositoryPhase.CLONED});

    expect(() => assertPhase(cloned, RepositoryPhase.COMMITS_PUSHED, 'publish')).to.throw(
      IllegalArgumentError,
      'Cannot publish while the repository is in phase Cloned, expected CommitsPushed',
    );
  });
});
