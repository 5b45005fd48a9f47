/**
 * LocalGitModule - git CLI implementation of IGitModule
 *
 * Every operation runs the `git` binary through the injected execCommand,
 * so tests can substitute a recorder and the CLI can substitute spawn.
 * Errors are transformed into typed exceptions for better handling.
 *
 * @module git/local
 */

import * as fs from 'fs';
import * as path from 'path';
import type { IGitModule } from '../git_module';
import type {
  CommitDetails,
  CommitIdentity,
  CommitOptions,
  CreateEmptySignedCommitOptions,
  ExecCommandFn,
  ExecOptions,
  ExecResult,
  GitConfigScope,
  GitModuleDependencies,
  SignatureVerification,
  VerifyCommitSignatureOptions,
} from '../types';
import {
  GitCommandError,
  RepositoryAlreadyExistsError,
  CommitSigningError,
  CommitNotFoundError,
  SignatureVerificationUnavailableError,
  BranchNotFoundError,
  BranchAlreadyExistsError,
} from '../errors';
import { parseCommitObject } from '../commit_object';
import { createLogger } from '../../logger';

const logger = createLogger('[LocalGitModule] ');

const SIGNING_FAILURE_PATTERN = /couldn't load|signing failed|failed to sign|gpg failed|no private key|ssh-keygen/i;
const VERIFY_UNAVAILABLE_PATTERN = /cannot run|needs to be configured|unable to open allowed keys file|command not found/i;
const GOOD_SIGNATURE_PATTERN = /Good "git" signature for (\S+)/;

function toGitDate(identity: CommitIdentity): string {
  return `@${identity.timestamp} ${identity.timezone}`;
}

/**
 * LocalGitModule class providing Git operations over the git CLI
 */
export class LocalGitModule implements IGitModule {
  private repoRoot: string;
  private readonly execCommand: ExecCommandFn;

  /**
   * @param dependencies - Required dependencies (execCommand) and optional config (repoRoot)
   */
  constructor(dependencies: GitModuleDependencies) {
    this.execCommand = dependencies.execCommand;
    this.repoRoot = dependencies.repoRoot ?? '';
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Ensures that repoRoot is set, auto-detecting it if necessary
   * 
   * @throws GitCommandError if not in a Git repository
   */
  private async ensureRepoRoot(): Promise<string> {
    if (!this.repoRoot) {
      const result = await this.execCommand('git', ['rev-parse', '--show-toplevel']);
      if (result.exitCode !== 0) {
        throw new GitCommandError('Not in a Git repository', result.stderr);
      }
      this.repoRoot = result.stdout.trim();
    }
    return this.repoRoot;
  }

  /**
   * Executes a Git command inside the repository
   */
  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const cwd = options?.cwd || await this.ensureRepoRoot();
    return this.execCommand('git', args, { ...options, cwd });
  }

  /**
   * Working directory for commands that may run before the repository exists
   */
  private workingDir(): string {
    return this.repoRoot || process.cwd();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INITIALIZATION
  // ═══════════════════════════════════════════════════════════════════════

  async getRepoRoot(): Promise<string> {
    return this.ensureRepoRoot();
  }

  /**
   * Initializes a new Git repository at repoRoot (or the current directory)
   * 
   * @throws RepositoryAlreadyExistsError if the directory is already the top of a Git repository
   * 
   * @example
   * await gitModule.init('main');
   */
  async init(initialBranch: string = 'main'): Promise<void> {
    const cwd = this.workingDir();

    const checkResult = await this.execCommand('git', ['rev-parse', '--show-toplevel'], { cwd });
    if (checkResult.exitCode === 0 && path.resolve(checkResult.stdout.trim()) === path.resolve(cwd)) {
      throw new RepositoryAlreadyExistsError(checkResult.stdout.trim());
    }

    const result = await this.execCommand('git', ['init', `--initial-branch=${initialBranch}`], { cwd });
    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to initialize Git repository', result.stderr, 'git init');
    }

    this.repoRoot = path.resolve(cwd);
    logger.debug(`Initialized repository at ${this.repoRoot} on ${initialBranch}`);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READ OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async hasCommits(): Promise<boolean> {
    const result = await this.execGit(['rev-parse', '--verify', '--quiet', 'HEAD^{commit}']);
    return result.exitCode === 0;
  }

  /**
   * @throws GitCommandError if git is not installed
   */
  async getVersion(): Promise<string> {
    const result = await this.execCommand('git', ['--version'], { cwd: this.workingDir() });
    const match = /(\d+\.\d+(?:\.\d+)?)/.exec(result.stdout);
    if (result.exitCode !== 0 || !match?.[1]) {
      throw new GitCommandError('Git is not available', result.stderr, 'git --version');
    }
    return match[1];
  }

  /**
   * Reads a config value
   * 
   * @returns the value, or null when the key is unset
   */
  async getConfig(key: string, scope?: GitConfigScope): Promise<string | null> {
    const args = ['config', ...(scope ? [`--${scope}`] : []), '--get', key];
    const result = await this.execCommand('git', args, { cwd: this.workingDir() });

    if (result.exitCode === 1) {
      return null;
    }
    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to read config ${key}`, result.stderr, `git ${args.join(' ')}`);
    }
    const value = result.stdout.trim();
    return value === '' ? null : value;
  }

  async setConfig(key: string, value: string, scope: GitConfigScope = 'local'): Promise<void> {
    const args = ['config', `--${scope}`, key, value];
    const result = await this.execCommand('git', args, { cwd: this.workingDir() });

    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to set config ${key}`, result.stderr, `git config --${scope} ${key}`);
    }
  }

  async getEmptyTreeHash(): Promise<string> {
    const result = await this.execGit(['hash-object', '-t', 'tree', '/dev/null']);
    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to compute empty tree hash', result.stderr, 'git hash-object');
    }
    return result.stdout.trim();
  }

  /**
   * Returns root commits reachable from ref (newest first)
   */
  async getRootCommits(ref: string = 'HEAD'): Promise<string[]> {
    const exists = await this.execGit(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
    if (exists.exitCode !== 0) {
      return [];
    }

    const result = await this.execGit(['rev-list', '--max-parents=0', ref]);
    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to list root commits of ${ref}`, result.stderr, 'git rev-list');
    }
    return result.stdout.split('\n').map((line) => line.trim()).filter(Boolean);
  }

  /**
   * Reads and parses a commit object
   * 
   * @throws CommitNotFoundError if the commit does not exist
   */
  async getCommitDetails(commitHash: string): Promise<CommitDetails> {
    const result = await this.execGit(['cat-file', 'commit', commitHash]);
    if (result.exitCode !== 0) {
      throw new CommitNotFoundError(commitHash);
    }
    return parseCommitObject(commitHash, result.stdout);
  }

  /**
   * Verifies a commit's SSH signature with `git verify-commit`
   * 
   * A non-zero exit with no output means the commit carries no signature.
   * 
   * @throws SignatureVerificationUnavailableError if ssh-keygen or the allowed signers file is missing
   */
  async verifyCommitSignature(
    commitHash: string,
    options: VerifyCommitSignatureOptions = {}
  ): Promise<SignatureVerification> {
    const args: string[] = [];
    if (options.allowedSignersFile) {
      try {
        await fs.promises.access(options.allowedSignersFile);
      } catch {
        throw new SignatureVerificationUnavailableError(
          `allowed signers file not found: ${options.allowedSignersFile}`
        );
      }
      args.push('-c', `gpg.ssh.allowedSignersFile=${options.allowedSignersFile}`);
    }
    args.push('verify-commit', commitHash);

    const result = await this.execGit(args);
    const output = `${result.stdout}${result.stderr}`.trim();

    if (result.exitCode === 0) {
      const signer = GOOD_SIGNATURE_PATTERN.exec(output)?.[1];
      return signer ? { status: 'valid', signer, output } : { status: 'valid', output };
    }
    if (VERIFY_UNAVAILABLE_PATTERN.test(output)) {
      throw new SignatureVerificationUnavailableError(output);
    }
    if (/not found|not a valid object name|bogus commit/i.test(output)) {
      throw new CommitNotFoundError(commitHash);
    }
    if (output === '') {
      return { status: 'unsigned', output };
    }
    return { status: 'invalid', output };
  }

  async getRemoteUrl(remoteName: string): Promise<string | null> {
    const result = await this.execGit(['remote', 'get-url', remoteName]);
    if (result.exitCode !== 0) {
      return null;
    }
    return result.stdout.trim() || null;
  }

  /**
   * Uses symbolic-ref so an unborn branch is reported too
   * 
   * @throws GitCommandError when HEAD is detached
   */
  async getCurrentBranch(): Promise<string> {
    const result = await this.execGit(['symbolic-ref', '--short', 'HEAD']);
    if (result.exitCode !== 0) {
      throw new GitCommandError('HEAD is not on a branch', result.stderr, 'git symbolic-ref --short HEAD');
    }
    return result.stdout.trim();
  }

  async branchExists(branchName: string): Promise<boolean> {
    const result = await this.execGit(['show-ref', '--verify', '--quiet', `refs/heads/${branchName}`]);
    return result.exitCode === 0;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WRITE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Creates an empty, parentless, SSH-signed commit and moves HEAD to it
   * 
   * Uses `git commit-tree` on the empty tree so that nothing in the index
   * can leak into the commit. HEAD only moves once the stored commit is
   * known to carry a signature.
   * 
   * @throws CommitSigningError if the key cannot be loaded or signing fails
   * @throws GitCommandError for any other failure
   */
  async createEmptySignedCommit(options: CreateEmptySignedCommitOptions): Promise<string> {
    const emptyTree = await this.getEmptyTreeHash();
    const env: Record<string, string> = {
      GIT_AUTHOR_NAME: options.author.name,
      GIT_AUTHOR_EMAIL: options.author.email,
      GIT_AUTHOR_DATE: toGitDate(options.author),
      GIT_COMMITTER_NAME: options.committer.name,
      GIT_COMMITTER_EMAIL: options.committer.email,
      GIT_COMMITTER_DATE: toGitDate(options.committer),
    };

    const result = await this.execGit(
      [
        '-c', 'gpg.format=ssh',
        '-c', `user.signingkey=${options.signingKey}`,
        'commit-tree', '-S', emptyTree,
        '-m', options.message,
      ],
      { env }
    );

    if (result.exitCode !== 0) {
      if (SIGNING_FAILURE_PATTERN.test(result.stderr)) {
        throw new CommitSigningError(result.stderr, 'git commit-tree -S');
      }
      throw new GitCommandError('Failed to create commit', result.stderr, 'git commit-tree');
    }

    const commitHash = result.stdout.trim();
    const created = await this.getCommitDetails(commitHash);
    if (created.signature === null) {
      throw new CommitSigningError(`commit ${commitHash} has no signature header`, 'git commit-tree -S');
    }

    const update = await this.execGit(['update-ref', 'HEAD', commitHash]);
    if (update.exitCode !== 0) {
      throw new GitCommandError(`Failed to move HEAD to ${commitHash}`, update.stderr, 'git update-ref');
    }

    logger.debug(`Created signed empty commit ${commitHash}`);
    return commitHash;
  }

  async createBranch(branchName: string): Promise<void> {
    if (await this.branchExists(branchName)) {
      throw new BranchAlreadyExistsError(branchName);
    }

    const result = await this.execGit(['checkout', '-b', branchName]);
    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to create branch ${branchName}`, result.stderr, `git checkout -b ${branchName}`);
    }
  }

  async checkoutBranch(branchName: string): Promise<void> {
    if (!(await this.branchExists(branchName))) {
      throw new BranchNotFoundError(branchName);
    }

    const result = await this.execGit(['checkout', branchName]);
    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to checkout branch ${branchName}`, result.stderr, `git checkout ${branchName}`);
    }
  }

  async add(paths: string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }

    const result = await this.execGit(['add', '--', ...paths]);
    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to stage files', result.stderr, 'git add');
    }
  }

  /**
   * Commits the index on the current branch
   * 
   * The message is passed as a single argument so paragraphs and lists
   * keep their layout.
   * 
   * @throws CommitSigningError if the configured key cannot sign
   */
  async commit(message: string, options: CommitOptions = {}): Promise<string> {
    const args = [
      'commit',
      ...(options.sign ? ['-S'] : []),
      ...(options.signoff ? ['-s'] : []),
      '-m', message,
    ];
    const result = await this.execGit(args);

    if (result.exitCode !== 0) {
      if (options.sign && SIGNING_FAILURE_PATTERN.test(result.stderr)) {
        throw new CommitSigningError(result.stderr, 'git commit -S');
      }
      throw new GitCommandError('Failed to commit', result.stderr, 'git commit', result.stdout);
    }

    const head = await this.execGit(['rev-parse', 'HEAD']);
    if (head.exitCode !== 0) {
      throw new GitCommandError('Failed to resolve HEAD after commit', head.stderr, 'git rev-parse HEAD');
    }

    const commitHash = head.stdout.trim();
    logger.debug(`Committed ${commitHash}`);
    return commitHash;
  }

  async addRemote(remoteName: string, url: string): Promise<void> {
    const result = await this.execGit(['remote', 'add', remoteName, url]);
    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to add remote ${remoteName}`, result.stderr, 'git remote add');
    }
  }

  async setRemoteUrl(remoteName: string, url: string): Promise<void> {
    const result = await this.execGit(['remote', 'set-url', remoteName, url]);
    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to set URL of remote ${remoteName}`, result.stderr, 'git remote set-url');
    }
  }

  async push(remoteName: string, source: string, remoteBranch: string, setUpstream: boolean = false): Promise<void> {
    const args = ['push', ...(setUpstream ? ['-u'] : []), remoteName, `${source}:refs/heads/${remoteBranch}`];
    const result = await this.execGit(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to push ${source} to ${remoteName}/${remoteBranch}`, result.stderr, `git ${args.join(' ')}`);
    }
  }
}
