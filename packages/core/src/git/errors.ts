/**
 * Custom Error Classes for GitModule
 * 
 * These errors provide typed exceptions for better error handling
 * and diagnostics in the Git module operations.
 */

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly stdout?: string | undefined;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', command?: string | undefined, stdout?: string) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.stdout = stdout;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Error thrown by init when the directory is already a repository root.
 */
export class RepositoryAlreadyExistsError extends GitCommandError {
  constructor(repoRoot: string) {
    super('Directory is already a Git repository', `Git repository exists at ${repoRoot}`, 'git init');
    this.name = 'RepositoryAlreadyExistsError';
    Object.setPrototypeOf(this, RepositoryAlreadyExistsError.prototype);
  }
}

/**
 * Error thrown when a commit cannot be signed
 */
export class CommitSigningError extends GitCommandError {
  constructor(stderr: string, command?: string) {
    super('Failed to sign commit', stderr, command);
    this.name = 'CommitSigningError';
    Object.setPrototypeOf(this, CommitSigningError.prototype);
  }
}

/**
 * Error thrown when a commit or revision does not exist
 */
export class CommitNotFoundError extends GitError {
  public readonly ref: string;

  constructor(ref: string) {
    super(`Commit not found: ${ref}`);
    this.name = 'CommitNotFoundError';
    this.ref = ref;
    Object.setPrototypeOf(this, CommitNotFoundError.prototype);
  }
}

/**
 * Error thrown when signature verification cannot run at all
 * (ssh-keygen missing, no allowed signers file configured)
 */
export class SignatureVerificationUnavailableError extends GitError {
  public readonly stderr: string;

  constructor(stderr: string) {
    super(`Signature verification unavailable: ${stderr.trim()}`);
    this.name = 'SignatureVerificationUnavailableError';
    this.stderr = stderr;
    Object.setPrototypeOf(this, SignatureVerificationUnavailableError.prototype);
  }
}

/**
 * Error thrown when a remote does not exist
 */
export class RemoteNotFoundError extends GitError {
  public readonly remoteName: string;

  constructor(remoteName: string) {
    super(`Remote not found: ${remoteName}`);
    this.name = 'RemoteNotFoundError';
    this.remoteName = remoteName;
    Object.setPrototypeOf(this, RemoteNotFoundError.prototype);
  }
}

/**
 * Error thrown when a branch does not exist
 */
export class BranchNotFoundError extends GitError {
  public readonly branchName: string;

  constructor(branchName: string) {
    super(`Branch not found: ${branchName}`);
    this.name = 'BranchNotFoundError';
    this.branchName = branchName;
    Object.setPrototypeOf(this, BranchNotFoundError.prototype);
  }
}

/**
 * Error thrown when creating a branch that already exists
 */
export class BranchAlreadyExistsError extends GitError {
  public readonly branchName: string;

  constructor(branchName: string) {
    super(`Branch already exists: ${branchName}`);
    this.name = 'BranchAlreadyExistsError';
    this.branchName = branchName;
    Object.setPrototypeOf(this, BranchAlreadyExistsError.prototype);
  }
}
