/**
 * MemoryGitModule - In-memory Git implementation for tests
 *
 * Keeps commit objects, refs, config and remotes in memory. Commits are
 * stored in the raw commit format and hashed the way git hashes them, and
 * signatures are real Ed25519 signatures produced by a MemoryCommitSigner,
 * so verification behaves like `git verify-commit` against an allowed
 * signers list.
 *
 * Test Helpers:
 * - addCommit(fields): Store an arbitrary commit and move HEAD to it
 * - tamperCommitMessage(hash, message): Rewrite a message but keep the hash
 * - setAllowedSigners(entries): Configure the default allowed signers
 * - setAllowedSignersFile(path, entries): Register a named allowed signers file
 * - setSignatureVerificationAvailable(false): Simulate a missing ssh-keygen
 * - setPushError(stderr): Make push fail
 * - getCommittedPaths(hash): Paths staged into a commit made through commit()
 *
 * @module git/memory
 */

import { createHash } from 'crypto';
import type { IGitModule } from '../git_module';
import type {
  CommitDetails,
  CommitOptions,
  CreateEmptySignedCommitOptions,
  GitConfigScope,
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
import {
  EMPTY_TREE_SHA1,
  hashCommitObject,
  serializeCommitObject,
} from '../commit_object';
import type { CommitObjectFields } from '../commit_object';
import type { MemoryCommitSigner } from '../../signing_key/memory/memory_signing_key_provider';

/**
 * One line of an allowed signers list.
 */
export type MemoryAllowedSigner = {
  principal: string;
  publicKey: string;
};

export type MemoryPush = {
  remoteName: string;
  source: string;
  remoteBranch: string;
  setUpstream: boolean;
  commitHash: string;
};

export type MemoryGitModuleOptions = {
  repoRoot?: string;
  /** Signs and verifies commits; without one every signing attempt fails */
  signer?: MemoryCommitSigner;
  /** Whether the repository already exists (default: true) */
  initialized?: boolean;
  /** Reported by getVersion (default: "2.39.5") */
  version?: string;
};

interface MemoryGitState {
  repoRoot: string;
  initialized: boolean;
  version: string;
  headBranch: string;
  objects: Map<string, CommitObjectFields>;
  refs: Map<string, string>;
  config: Map<string, string>;
  remotes: Map<string, string>;
  pushes: MemoryPush[];
  pushError: string | null;
  allowedSigners: MemoryAllowedSigner[] | null;
  allowedSignersFiles: Map<string, MemoryAllowedSigner[]>;
  verificationAvailable: boolean;
  staged: Set<string>;
  committedPaths: Map<string, string[]>;
}

/**
 * MemoryGitModule - In-memory Git mock for unit tests
 */
export class MemoryGitModule implements IGitModule {
  private state: MemoryGitState;
  private readonly signer: MemoryCommitSigner | undefined;

  constructor(options: MemoryGitModuleOptions = {}) {
    this.signer = options.signer;
    this.state = {
      repoRoot: options.repoRoot ?? '/test/repo',
      initialized: options.initialized ?? true,
      version: options.version ?? '2.39.5',
      headBranch: 'main',
      objects: new Map(),
      refs: new Map(),
      config: new Map(),
      remotes: new Map(),
      pushes: [],
      pushError: null,
      allowedSigners: null,
      allowedSignersFiles: new Map(),
      verificationAvailable: true,
      staged: new Set(),
      committedPaths: new Map(),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Stores a commit as-is and points the current branch at it.
   * Missing fields default to an unsigned, parentless commit on the empty tree.
   */
  addCommit(fields: Partial<CommitObjectFields> = {}): string {
    const identity = { name: 'Test User', email: 'test@example.com', timestamp: 1700000000, timezone: '+0000' };
    const commit: CommitObjectFields = {
      treeId: fields.treeId ?? EMPTY_TREE_SHA1,
      parents: fields.parents ?? [],
      author: fields.author ?? identity,
      committer: fields.committer ?? fields.author ?? identity,
      message: fields.message ?? 'Test commit\n',
      signature: fields.signature ?? null,
    };
    const hash = this.storeCommit(commit);
    this.setHead(hash);
    return hash;
  }

  /**
   * Replaces the message of a stored commit without rehashing it,
   * leaving the signature stale.
   */
  tamperCommitMessage(commitHash: string, message: string): void {
    const commit = this.state.objects.get(commitHash);
    if (!commit) {
      throw new CommitNotFoundError(commitHash);
    }
    this.state.objects.set(commitHash, { ...commit, message });
  }

  setHead(commitHash: string): void {
    this.state.refs.set(`refs/heads/${this.state.headBranch}`, commitHash);
  }

  setBranch(name: string, commitHash: string): void {
    this.state.refs.set(`refs/heads/${name}`, commitHash);
  }

  /** Default allowed signers; null behaves like an unset gpg.ssh.allowedSignersFile */
  setAllowedSigners(entries: MemoryAllowedSigner[] | null): void {
    this.state.allowedSigners = entries;
  }

  setAllowedSignersFile(filePath: string, entries: MemoryAllowedSigner[]): void {
    this.state.allowedSignersFiles.set(filePath, entries);
  }

  setSignatureVerificationAvailable(available: boolean): void {
    this.state.verificationAvailable = available;
  }

  setPushError(stderr: string | null): void {
    this.state.pushError = stderr;
  }

  getPushes(): MemoryPush[] {
    return [...this.state.pushes];
  }

  getCommittedPaths(commitHash: string): string[] {
    return [...(this.state.committedPaths.get(commitHash) ?? [])];
  }

  isInitialized(): boolean {
    return this.state.initialized;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private ensureInitialized(): void {
    if (!this.state.initialized) {
      throw new GitCommandError('Not in a Git repository', 'fatal: not a git repository');
    }
  }

  private storeCommit(commit: CommitObjectFields): string {
    const hash = hashCommitObject(serializeCommitObject(commit));
    this.state.objects.set(hash, commit);
    return hash;
  }

  private resolveRef(ref: string): string | null {
    if (ref === 'HEAD') {
      return this.state.refs.get(`refs/heads/${this.state.headBranch}`) ?? null;
    }
    if (this.state.objects.has(ref)) {
      return ref;
    }
    return this.state.refs.get(ref) ?? this.state.refs.get(`refs/heads/${ref}`) ?? null;
  }

  private signaturePayload(commit: CommitObjectFields): string {
    return serializeCommitObject({ ...commit, signature: null });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INITIALIZATION
  // ═══════════════════════════════════════════════════════════════════════

  async getRepoRoot(): Promise<string> {
    this.ensureInitialized();
    return this.state.repoRoot;
  }

  async init(initialBranch: string = 'main'): Promise<void> {
    if (this.state.initialized) {
      throw new RepositoryAlreadyExistsError(this.state.repoRoot);
    }
    this.state.initialized = true;
    this.state.headBranch = initialBranch;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READ OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async hasCommits(): Promise<boolean> {
    this.ensureInitialized();
    return this.resolveRef('HEAD') !== null;
  }

  async getVersion(): Promise<string> {
    return this.state.version;
  }

  async getConfig(key: string, scope?: GitConfigScope): Promise<string | null> {
    if (scope) {
      return this.state.config.get(`${scope}:${key}`) ?? null;
    }
    return this.state.config.get(`local:${key}`) ?? this.state.config.get(`global:${key}`) ?? null;
  }

  async setConfig(key: string, value: string, scope: GitConfigScope = 'local'): Promise<void> {
    if (scope === 'local') {
      this.ensureInitialized();
    }
    this.state.config.set(`${scope}:${key}`, value);
  }

  async getEmptyTreeHash(): Promise<string> {
    this.ensureInitialized();
    return EMPTY_TREE_SHA1;
  }

  /**
   * Root commits reachable from ref, most recently committed first
   */
  async getRootCommits(ref: string = 'HEAD'): Promise<string[]> {
    this.ensureInitialized();
    const tip = this.resolveRef(ref);
    if (!tip) {
      return [];
    }

    const seen = new Set<string>();
    const roots: string[] = [];
    const queue = [tip];
    while (queue.length > 0) {
      const hash = queue.shift();
      if (hash === undefined || seen.has(hash)) continue;
      seen.add(hash);
      const commit = this.state.objects.get(hash);
      if (!commit) continue;
      if (commit.parents.length === 0) {
        roots.push(hash);
      }
      queue.push(...commit.parents);
    }

    const timestampOf = (hash: string): number => this.state.objects.get(hash)?.committer.timestamp ?? 0;
    return roots.sort((a, b) => timestampOf(b) - timestampOf(a));
  }

  async getCommitDetails(commitHash: string): Promise<CommitDetails> {
    this.ensureInitialized();
    const hash = this.resolveRef(commitHash);
    const commit = hash ? this.state.objects.get(hash) : undefined;
    if (!hash || !commit) {
      throw new CommitNotFoundError(commitHash);
    }
    return { hash, ...commit, parents: [...commit.parents] };
  }

  async verifyCommitSignature(
    commitHash: string,
    options: VerifyCommitSignatureOptions = {}
  ): Promise<SignatureVerification> {
    const details = await this.getCommitDetails(commitHash);

    if (!this.state.verificationAvailable) {
      throw new SignatureVerificationUnavailableError('error: cannot run ssh-keygen: No such file or directory');
    }

    let allowed: MemoryAllowedSigner[] | null = this.state.allowedSigners;
    if (options.allowedSignersFile) {
      allowed = this.state.allowedSignersFiles.get(options.allowedSignersFile) ?? null;
      if (!allowed) {
        throw new SignatureVerificationUnavailableError(
          `allowed signers file not found: ${options.allowedSignersFile}`
        );
      }
    }

    if (!details.signature) {
      return { status: 'unsigned', output: '' };
    }
    if (!allowed) {
      throw new SignatureVerificationUnavailableError(
        'error: gpg.ssh.allowedSignersFile needs to be configured and exist for ssh signature verification'
      );
    }
    if (!this.signer) {
      return { status: 'invalid', output: 'Signature verification failed: no verifier available' };
    }

    const payload = this.signaturePayload(details);
    for (const entry of allowed) {
      if (this.signer.verify(payload, details.signature, entry.publicKey)) {
        return {
          status: 'valid',
          signer: entry.principal,
          output: `Good "git" signature for ${entry.principal}`,
        };
      }
    }

    return { status: 'invalid', output: 'Signature verification failed: no allowed signer matched' };
  }

  async getRemoteUrl(remoteName: string): Promise<string | null> {
    this.ensureInitialized();
    return this.state.remotes.get(remoteName) ?? null;
  }

  async getCurrentBranch(): Promise<string> {
    this.ensureInitialized();
    return this.state.headBranch;
  }

  async branchExists(branchName: string): Promise<boolean> {
    this.ensureInitialized();
    return this.state.refs.has(`refs/heads/${branchName}`);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WRITE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async createEmptySignedCommit(options: CreateEmptySignedCommitOptions): Promise<string> {
    this.ensureInitialized();
    if (!this.signer) {
      throw new CommitSigningError('error: no signer configured', 'git commit-tree -S');
    }

    const unsigned: CommitObjectFields = {
      treeId: EMPTY_TREE_SHA1,
      parents: [],
      author: options.author,
      committer: options.committer,
      message: options.message.endsWith('\n') ? options.message : `${options.message}\n`,
      signature: null,
    };

    let signature: string;
    try {
      signature = this.signer.sign(options.signingKey, this.signaturePayload(unsigned));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CommitSigningError(`error: Couldn't load public key ${options.signingKey}: ${reason}`, 'git commit-tree -S');
    }

    const hash = this.storeCommit({ ...unsigned, signature });
    this.setHead(hash);
    return hash;
  }

  async createBranch(branchName: string): Promise<void> {
    this.ensureInitialized();
    if (this.state.refs.has(`refs/heads/${branchName}`)) {
      throw new BranchAlreadyExistsError(branchName);
    }
    const head = this.resolveRef('HEAD');
    if (!head) {
      throw new GitCommandError(`Failed to create branch ${branchName}`, `fatal: not a valid object name: '${this.state.headBranch}'`);
    }
    this.state.refs.set(`refs/heads/${branchName}`, head);
    this.state.headBranch = branchName;
  }

  async checkoutBranch(branchName: string): Promise<void> {
    this.ensureInitialized();
    if (!this.state.refs.has(`refs/heads/${branchName}`)) {
      throw new BranchNotFoundError(branchName);
    }
    this.state.headBranch = branchName;
  }

  async add(paths: string[]): Promise<void> {
    this.ensureInitialized();
    for (const stagedPath of paths) {
      this.state.staged.add(stagedPath);
    }
  }

  /**
   * Commits the staged paths on top of HEAD. The tree id is derived from
   * the paths committed so far, since file contents are not modelled.
   */
  async commit(message: string, options: CommitOptions = {}): Promise<string> {
    this.ensureInitialized();
    if (this.state.staged.size === 0) {
      throw new GitCommandError('Failed to commit', '', 'git commit', 'nothing to commit, working tree clean');
    }

    const parent = this.resolveRef('HEAD');
    const name = (await this.getConfig('user.name')) ?? 'Test User';
    const email = (await this.getConfig('user.email')) ?? 'test@example.com';
    const identity = { name, email, timestamp: Math.floor(Date.now() / 1000), timezone: '+0000' };

    const paths = [...this.state.staged].sort();
    const previousPaths = parent ? this.state.committedPaths.get(parent) ?? [] : [];
    const treePaths = [...new Set([...previousPaths, ...paths])].sort();

    let text = message.endsWith('\n') ? message : `${message}\n`;
    if (options.signoff) {
      text = `${text}\nSigned-off-by: ${name} <${email}>\n`;
    }

    const unsigned: CommitObjectFields = {
      treeId: createHash('sha1').update(treePaths.join('\n')).digest('hex'),
      parents: parent ? [parent] : [],
      author: identity,
      committer: identity,
      message: text,
      signature: null,
    };

    let signature: string | null = null;
    if (options.sign) {
      const signingKey = await this.getConfig('user.signingkey');
      if (!this.signer || !signingKey) {
        throw new CommitSigningError('error: user.signingkey needs to be set for ssh signing', 'git commit -S');
      }
      try {
        signature = this.signer.sign(signingKey, this.signaturePayload(unsigned));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new CommitSigningError(`error: Couldn't load public key ${signingKey}: ${reason}`, 'git commit -S');
      }
    }

    const hash = this.storeCommit({ ...unsigned, signature });
    this.state.committedPaths.set(hash, treePaths);
    this.state.staged.clear();
    this.setHead(hash);
    return hash;
  }

  async addRemote(remoteName: string, url: string): Promise<void> {
    this.ensureInitialized();
    if (this.state.remotes.has(remoteName)) {
      throw new GitCommandError(`Failed to add remote ${remoteName}`, `error: remote ${remoteName} already exists.`, 'git remote add');
    }
    this.state.remotes.set(remoteName, url);
  }

  async setRemoteUrl(remoteName: string, url: string): Promise<void> {
    this.ensureInitialized();
    if (!this.state.remotes.has(remoteName)) {
      throw new GitCommandError(`Failed to set URL of remote ${remoteName}`, `error: No such remote '${remoteName}'`, 'git remote set-url');
    }
    this.state.remotes.set(remoteName, url);
  }

  async push(remoteName: string, source: string, remoteBranch: string, setUpstream: boolean = false): Promise<void> {
    this.ensureInitialized();
    if (!this.state.remotes.has(remoteName)) {
      throw new GitCommandError(`Failed to push ${source} to ${remoteName}/${remoteBranch}`, `fatal: '${remoteName}' does not appear to be a git repository`);
    }
    if (this.state.pushError !== null) {
      throw new GitCommandError(`Failed to push ${source} to ${remoteName}/${remoteBranch}`, this.state.pushError);
    }
    const commitHash = this.resolveRef(source);
    if (!commitHash) {
      throw new GitCommandError(`Failed to push ${source} to ${remoteName}/${remoteBranch}`, `error: src refspec ${source} does not match any`);
    }
    this.state.pushes.push({ remoteName, source, remoteBranch, setUpstream, commitHash });
  }
}
