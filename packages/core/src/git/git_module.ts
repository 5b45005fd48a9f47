/**
 * IGitModule - Version-control collaborator
 *
 * Business-agnostic abstraction over the operations repository bootstrap
 * needs: initialization, config, signed empty commits, commit introspection,
 * signature verification, branches, staging, remotes and pushing.
 *
 * Implementations:
 * - LocalGitModule: git CLI through an injected execCommand
 * - MemoryGitModule: in-memory object store for tests
 *
 * @module git
 */

import type {
  CommitDetails,
  CommitOptions,
  CreateEmptySignedCommitOptions,
  GitConfigScope,
  SignatureVerification,
  VerifyCommitSignatureOptions,
} from './types';

export interface IGitModule {
  /** Absolute path of the repository working tree */
  getRepoRoot(): Promise<string>;

  /**
   * Initializes a repository at the module's root.
   * @throws GitCommandError if the directory is already a repository
   */
  init(initialBranch?: string): Promise<void>;

  /** Whether HEAD resolves to a commit */
  hasCommits(): Promise<boolean>;

  /** `git --version` as "major.minor.patch" */
  getVersion(): Promise<string>;

  /** Reads a config value; null when unset */
  getConfig(key: string, scope?: GitConfigScope): Promise<string | null>;

  setConfig(key: string, value: string, scope?: GitConfigScope): Promise<void>;

  /** Identifier of the canonical empty tree for this repository's hash algorithm */
  getEmptyTreeHash(): Promise<string>;

  /**
   * Creates a commit with zero parents and the empty tree, signed with the
   * given key, and points the current branch at it.
   * @returns hash of the new commit
   * @throws CommitSigningError if signing is rejected
   * @throws GitCommandError for any other failure
   */
  createEmptySignedCommit(options: CreateEmptySignedCommitOptions): Promise<string>;

  /**
   * Commits reachable from `ref` that have no parents, newest first.
   * Empty when `ref` does not resolve.
   */
  getRootCommits(ref?: string): Promise<string[]>;

  /**
   * @throws CommitNotFoundError if the commit does not exist
   */
  getCommitDetails(commitHash: string): Promise<CommitDetails>;

  /**
   * Checks a commit's signature against trusted signers.
   * @throws SignatureVerificationUnavailableError if verification cannot run
   */
  verifyCommitSignature(
    commitHash: string,
    options?: VerifyCommitSignatureOptions
  ): Promise<SignatureVerification>;

  /**
   * Name of the checked-out branch, including an unborn one.
   * @throws GitCommandError when HEAD is detached
   */
  getCurrentBranch(): Promise<string>;

  branchExists(branchName: string): Promise<boolean>;

  /**
   * Creates a branch from the current HEAD and checks it out.
   * @throws BranchAlreadyExistsError if the branch exists
   */
  createBranch(branchName: string): Promise<void>;

  /**
   * @throws BranchNotFoundError if the branch does not exist
   */
  checkoutBranch(branchName: string): Promise<void>;

  /** Stages paths relative to the repository root */
  add(paths: string[]): Promise<void>;

  /**
   * Commits the staged changes on the current branch.
   * @returns hash of the new commit
   * @throws CommitSigningError if signing is rejected
   */
  commit(message: string, options?: CommitOptions): Promise<string>;

  /** URL of a remote; null when the remote does not exist */
  getRemoteUrl(remoteName: string): Promise<string | null>;

  addRemote(remoteName: string, url: string): Promise<void>;

  setRemoteUrl(remoteName: string, url: string): Promise<void>;

  /**
   * Pushes `source` (commit or ref) to `remoteBranch` on the remote
   * and optionally records it as upstream.
   */
  push(remoteName: string, source: string, remoteBranch: string, setUpstream?: boolean): Promise<void>;
}
