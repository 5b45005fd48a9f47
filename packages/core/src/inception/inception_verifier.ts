import type { IGitModule, CommitDetails, SignatureVerification } from '../git';
import { GitError } from '../git';
import { NotFoundError, ToolingError } from '../errors';
import { createLogger } from '../logger';
import {
  COMMITTER_NAME_PREFIX,
  INCEPTION_SUMMARY,
  hasSignOff,
  toRepositoryDid,
} from './inception_message';
import type {
  IInceptionCommitVerifier,
  InceptionCheck,
  InceptionDependencies,
  VerificationResult,
  VerifyInceptionCommitOptions,
} from './inception.types';

const logger = createLogger('[InceptionVerifier] ');

/**
 * Re-derives the properties of a repository's inception commit.
 *
 * Read-only: nothing in the repository is changed, so repeated runs return
 * equal results.
 */
export class InceptionCommitVerifier implements IInceptionCommitVerifier {
  private readonly git: IGitModule;

  constructor(dependencies: InceptionDependencies) {
    this.git = dependencies.git;
  }

  /**
   * @throws NotFoundError if there is no parentless root commit
   * @throws ToolingError if a check cannot be executed
   */
  async verifyInceptionCommit(options: VerifyInceptionCommitOptions = {}): Promise<VerificationResult> {
    const ref = options.ref ?? 'HEAD';
    const commit = await this.resolveRootCommit(ref);
    const emptyTree = await this.runCheck('compute the empty tree id', () => this.git.getEmptyTreeHash());
    const signature = await this.runCheck('verify the commit signature', () =>
      this.git.verifyCommitSignature(
        commit.hash,
        options.allowedSignersFile ? { allowedSignersFile: options.allowedSignersFile } : {}
      )
    );

    const checks: InceptionCheck[] = [
      {
        name: 'empty-tree',
        passed: commit.treeId === emptyTree,
        severity: 'error',
        message: commit.treeId === emptyTree
          ? 'Commit has the empty tree'
          : `Commit tree ${commit.treeId} is not the empty tree ${emptyTree}`,
      },
      {
        name: 'message',
        passed: commit.message.includes(INCEPTION_SUMMARY),
        severity: 'error',
        message: commit.message.includes(INCEPTION_SUMMARY)
          ? 'Message declares the root of trust'
          : `Message does not contain "${INCEPTION_SUMMARY}"`,
      },
      this.signatureCheck(signature),
      {
        name: 'committer-format',
        passed: commit.committer.name.startsWith(COMMITTER_NAME_PREFIX),
        severity: 'warning',
        message: commit.committer.name.startsWith(COMMITTER_NAME_PREFIX)
          ? `Committer is key ${commit.committer.name}`
          : `Committer "${commit.committer.name}" is not a ${COMMITTER_NAME_PREFIX} key fingerprint`,
      },
      {
        name: 'sign-off',
        passed: hasSignOff(commit.message),
        severity: 'error',
        message: hasSignOff(commit.message) ? 'Message is signed off' : 'Message has no Signed-off-by line',
      },
    ];

    const passed = checks.every((check) => check.passed || check.severity === 'warning');
    for (const check of checks.filter((c) => !c.passed)) {
      logger.warn(`${check.name}: ${check.message}`);
    }

    return { passed, commitId: commit.hash, did: toRepositoryDid(commit.hash), checks };
  }

  private async resolveRootCommit(ref: string): Promise<CommitDetails> {
    const roots = await this.runCheck(`list root commits of ${ref}`, () => this.git.getRootCommits(ref));
    const rootId = roots[roots.length - 1];
    if (rootId === undefined) {
      throw new NotFoundError(`No root commit reachable from ${ref}`);
    }
    if (roots.length > 1) {
      logger.warn(`${ref} has ${roots.length} root commits; verifying the oldest, ${rootId}`);
    }

    const commit = await this.runCheck(`read commit ${rootId}`, () => this.git.getCommitDetails(rootId));
    if (commit.parents.length > 0) {
      throw new NotFoundError(`Commit ${rootId} has parents and is not a root commit`);
    }
    return commit;
  }

  private signatureCheck(verification: SignatureVerification): InceptionCheck {
    const base = { name: 'signature', severity: 'error' } as const;
    switch (verification.status) {
      case 'valid':
        return {
          ...base,
          passed: true,
          message: verification.signer ? `Good signature from ${verification.signer}` : 'Good signature',
        };
      case 'unsigned':
        return { ...base, passed: false, message: 'Commit is not signed' };
      case 'invalid':
        return {
          ...base,
          passed: false,
          message: `Signature rejected: ${verification.output.split('\n')[0] ?? ''}`.trim(),
        };
    }
  }

  private async runCheck<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof GitError) {
        throw new ToolingError(`Could not ${action}: ${error.message}`, error);
      }
      throw error;
    }
  }
}
