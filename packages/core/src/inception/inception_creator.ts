import type { IGitModule, CommitIdentity } from '../git';
import { CommitSigningError, GitError } from '../git';
import type { SigningKey } from '../signing_key';
import { SigningKeyError, computeFingerprint } from '../signing_key';
import { RepositoryError, SigningError, UsageError } from '../errors';
import { createLogger } from '../logger';
import { buildInceptionMessage } from './inception_message';
import type {
  AuthorIdentity,
  CreateInceptionCommitOptions,
  IInceptionCommitCreator,
  InceptionCommit,
  InceptionDependencies,
} from './inception.types';

const logger = createLogger('[InceptionCreator] ');

/**
 * Creates the inception commit of an empty repository.
 *
 * The commit has no parents and the empty tree, carries a sign-off by the
 * author, and is committed under the signing key's fingerprint so the
 * committer line itself names the key that vouches for the repository.
 *
 * @example
 * ```typescript
 * const creator = new InceptionCommitCreator({ git });
 * const key = await keyProvider.resolveSigningKey();
 * const commit = await creator.createInceptionCommit(key, { name: 'Alice', email: 'alice@example.com' });
 * ```
 */
export class InceptionCommitCreator implements IInceptionCommitCreator {
  private readonly git: IGitModule;

  constructor(dependencies: InceptionDependencies) {
    this.git = dependencies.git;
  }

  /**
   * @throws UsageError if the author identity or date is unusable
   * @throws RepositoryError if the repository already has commits or git fails
   * @throws SigningError if the key cannot be fingerprinted or signing is rejected
   */
  async createInceptionCommit(
    signingKey: SigningKey,
    author: AuthorIdentity,
    options: CreateInceptionCommitOptions = {}
  ): Promise<InceptionCommit> {
    const name = author.name.trim();
    const email = author.email.trim();
    if (!name || !email) {
      throw new UsageError('Author name and email are required');
    }

    const date = options.date ?? new Date();
    if (Number.isNaN(date.getTime())) {
      throw new UsageError('Commit date is not a valid date');
    }

    if (await this.runGit('check for existing commits', () => this.git.hasCommits())) {
      throw new RepositoryError('Repository already has commits; an inception commit must be the first commit');
    }

    let fingerprint: string;
    try {
      fingerprint = computeFingerprint(signingKey.publicKey);
    } catch (error) {
      throw new SigningError(`Signing key ${signingKey.id} has no usable public key`, error);
    }

    const authorIdentity: CommitIdentity = {
      name,
      email,
      timestamp: Math.floor(date.getTime() / 1000),
      timezone: '+0000',
    };
    const committerIdentity: CommitIdentity = { ...authorIdentity, name: fingerprint };

    const commitId = await this.runGit('create inception commit', () =>
      this.git.createEmptySignedCommit({
        message: buildInceptionMessage({ name, email }),
        author: authorIdentity,
        committer: committerIdentity,
        signingKey: signingKey.privateKeyPath,
      })
    );

    const details = await this.runGit('read back inception commit', () => this.git.getCommitDetails(commitId));
    if (details.signature === null) {
      throw new SigningError(`Commit ${commitId} was created without a signature`);
    }

    logger.info(`Created inception commit ${commitId} signed by ${fingerprint}`);
    return {
      commitId: details.hash,
      treeId: details.treeId,
      message: details.message,
      author: details.author,
      committer: details.committer,
      signature: details.signature,
      parents: details.parents,
    };
  }

  /**
   * Runs a git operation, mapping signing failures to SigningError and any
   * other git failure to RepositoryError.
   */
  private async runGit<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof CommitSigningError || error instanceof SigningKeyError) {
        throw new SigningError(`Failed to ${action}: ${error.message}`, error);
      }
      if (error instanceof GitError) {
        throw new RepositoryError(`Failed to ${action}: ${error.message}`, error);
      }
      throw error;
    }
  }
}
