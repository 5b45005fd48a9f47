/**
 * Type Definitions for GitModule
 *
 * These types define the contracts for Git operations,
 * dependencies, and data structures used throughout the module.
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds */
  timeout?: number;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

/**
 * Function used to run external commands (git, ssh-keygen)
 */
export type ExecCommandFn = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by LocalGitModule
 *
 * This module uses dependency injection to allow testing with mocks
 * and support different execution environments.
 */
export type GitModuleDependencies = {
  /** Path to the Git repository root (optional, auto-detected if not provided) */
  repoRoot?: string;
  /** Function to execute shell commands (required) */
  execCommand: ExecCommandFn;
};

/**
 * Scope of a git config read or write
 */
export type GitConfigScope = 'local' | 'global';

/**
 * Author or committer of a commit
 */
export type CommitIdentity = {
  name: string;
  email: string;
  /** Seconds since the Unix epoch */
  timestamp: number;
  /** Offset as written in the commit object, e.g. "+0000" */
  timezone: string;
};

/**
 * Parsed commit object
 */
export type CommitDetails = {
  hash: string;
  treeId: string;
  parents: string[];
  author: CommitIdentity;
  committer: CommitIdentity;
  message: string;
  /** Armored signature from the gpgsig (or gpgsig-sha256) header, or null when unsigned */
  signature: string | null;
};

/**
 * Input for creating a parentless, empty, signed commit
 */
export type CreateEmptySignedCommitOptions = {
  message: string;
  author: CommitIdentity;
  committer: CommitIdentity;
  /** Private key path (local) or key identifier (memory) used to sign */
  signingKey: string;
};

/**
 * Outcome of checking a commit signature against trusted signers
 */
export type SignatureVerification = {
  status: 'valid' | 'invalid' | 'unsigned';
  /** Principal reported by the verifier when the signature is trusted */
  signer?: string;
  /** Raw verifier output, for diagnostics */
  output: string;
};

/**
 * Options for signature verification
 */
export type VerifyCommitSignatureOptions = {
  /** allowed_signers file overriding gpg.ssh.allowedSignersFile */
  allowedSignersFile?: string;
};

/**
 * Options for committing the staged changes
 */
export type CommitOptions = {
  /** Sign with the configured user.signingkey */
  sign?: boolean;
  /** Append a Signed-off-by trailer */
  signoff?: boolean;
};
