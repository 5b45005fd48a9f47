/**
 * GitModule - Low-level Git Operations
 * 
 * This module provides a business-agnostic abstraction layer for Git operations.
 * 
 * @module git
 */

export type { IGitModule } from './git_module';

export type {
  GitModuleDependencies,
  ExecOptions,
  ExecResult,
  ExecCommandFn,
  GitConfigScope,
  CommitIdentity,
  CommitDetails,
  CreateEmptySignedCommitOptions,
  SignatureVerification,
  VerifyCommitSignatureOptions,
  CommitOptions,
} from './types';

export {
  GitError,
  GitCommandError,
  RepositoryAlreadyExistsError,
  CommitSigningError,
  CommitNotFoundError,
  SignatureVerificationUnavailableError,
  RemoteNotFoundError,
  BranchNotFoundError,
  BranchAlreadyExistsError,
} from './errors';

export {
  EMPTY_TREE_SHA1,
  EMPTY_TREE_SHA256,
  formatIdentity,
  parseIdentity,
  parseCommitObject,
  serializeCommitObject,
  hashCommitObject,
} from './commit_object';
export type { CommitObjectFields } from './commit_object';

export { LocalGitModule } from './local';
