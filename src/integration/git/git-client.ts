// SPDX-License-Identifier: Apache-2.0

import {type GitRemote} from './model/git-remote.js';

/**
 * The git operations used by the bot. Every operation takes the directory it runs in; implementations never
 * change the process working directory. Any failure rejects with a GitCommandError.
 */
export interface GitClient {
  /**
   * Clones the remote into `destination`, relative to `workingDirectory`.
   */
  clone(workingDirectory: string, remote: GitRemote, destination: string): Promise<void>;

  setConfig(repositoryDirectory: string, key: string, value: string): Promise<void>;

  localBranchExists(repositoryDirectory: string, branch: string): Promise<boolean>;

  deleteLocalBranch(repositoryDirectory: string, branch: string): Promise<void>;

  deleteRemoteBranch(repositoryDirectory: string, remote: GitRemote, branch: string): Promise<void>;

  pull(repositoryDirectory: string, remote: GitRemote, branch: string): Promise<void>;

  checkoutNewBranch(repositoryDirectory: string, branch: string): Promise<void>;

  add(repositoryDirectory: string, file: string): Promise<void>;

  commit(repositoryDirectory: string, message: string): Promise<void>;

  push(repositoryDirectory: string, remote: GitRemote, branch: string): Promise<void>;
}
