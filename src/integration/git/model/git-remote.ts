// SPDX-License-Identifier: Apache-2.0

import {GITHUB_HOST} from '../../../core/constants.js';

/**
 * A repository on the hosting service, optionally addressed with a token so that it can be pushed to.
 */
export class GitRemote {
  private constructor(
    public readonly owner: string,
    public readonly name: string,
    private readonly token?: string,
  ) {}

  public static of(owner: string, name: string): GitRemote {
    return new GitRemote(owner, name);
  }

  public static authenticated(owner: string, name: string, token: string): GitRemote {
    return new GitRemote(owner, name, token);
  }

  public url(): string {
    const credentials = this.token ? `x-access-token:${this.token}@` : '';
    return `https://${credentials}${GITHUB_HOST}/${this.owner}/${this.name}.git`;
  }

  /** values that must not appear in logs */
  public secrets(): string[] {
    return this.token ? [this.token] : [];
  }

  public toString(): string {
    return `${this.owner}/${this.name}`;
  }
}
