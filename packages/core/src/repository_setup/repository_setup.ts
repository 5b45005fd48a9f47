/**
 * LocalRepositorySetup - creates a local repository rooted in an inception commit
 *
 * @module repository_setup
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { RepositoryAlreadyExistsError, GitError } from '../git';
import { SigningKeyError } from '../signing_key';
import type { SigningKey } from '../signing_key';
import {
  InceptionCommitCreator,
  InceptionCommitVerifier,
  ALLOWED_COMMIT_SIGNERS_PATH,
  toRepositoryDid,
} from '../inception';
import type { VerificationResult } from '../inception';
import { BootstrapError, RepositoryError, SigningError, UsageError } from '../errors';
import { createLogger } from '../logger';
import type {
  LocalRepositorySetupDependencies,
  LocalRepositorySetupOptions,
  LocalRepositorySetupResult,
  RepositoryTarget,
} from './repository_setup.types';

const logger = createLogger('[RepositorySetup] ');

/**
 * Maps a command-line repository argument to a directory.
 *
 * ".", the cwd itself or the cwd's basename mean the cwd; absolute paths are
 * used as given; anything else is created under the cwd.
 */
export function resolveRepositoryTarget(target: string, cwd: string = process.cwd()): RepositoryTarget {
  const trimmed = target.trim();
  if (!trimmed) {
    throw new UsageError('Repository name or path is required');
  }

  const currentDir = path.resolve(cwd);
  if (trimmed === '.' || path.resolve(currentDir, trimmed) === currentDir || trimmed === path.basename(currentDir)) {
    return { repoDir: currentDir, repoName: path.basename(currentDir) };
  }
  const repoDir = path.isAbsolute(trimmed) ? path.normalize(trimmed) : path.join(currentDir, trimmed);
  return { repoDir, repoName: path.basename(repoDir) };
}

export class LocalRepositorySetup {
  private readonly deps: LocalRepositorySetupDependencies;

  constructor(dependencies: LocalRepositorySetupDependencies) {
    this.deps = dependencies;
  }

  /**
   * Validates the environment, configures signing, initializes the
   * repository and creates and verifies its inception commit.
   *
   * A failed verification is reported, not thrown.
   *
   * @throws UsageError if prerequisites are missing or no author identity is known
   * @throws SigningError if the signing key cannot be resolved or used
   * @throws RepositoryError if the directory already has history or git fails
   */
  async setup(options: LocalRepositorySetupOptions): Promise<LocalRepositorySetupResult> {
    const { repoDir, repoName } = resolveRepositoryTarget(options.target, options.cwd);
    const warnings: string[] = [];

    const validation = await this.deps.signingConfig.validatePrerequisites(
      options.signingKeyId ? { signingKeyId: options.signingKeyId } : {}
    );
    if (!validation.isValid && !options.skipValidation) {
      throw new UsageError(`Prerequisites not met: ${validation.warnings.join('; ')}`);
    }

    const author = options.author ?? validation.identity;
    if (!author) {
      throw new UsageError('Author identity unknown: set user.name and user.email or pass an author');
    }
    const signingKey = validation.signingKey ?? await this.resolveSigningKey(options.signingKeyId);

    if (options.configureSigning ?? true) {
      const configured = await this.deps.signingConfig.configureGitSigning({ signingKey, identity: author });
      warnings.push(...configured.warnings);
    }

    await fs.mkdir(repoDir, { recursive: true });
    const git = this.deps.createGitModule(repoDir);
    try {
      await git.init(options.initialBranch ?? 'main');
      logger.info(`Initialized ${repoDir}`);
    } catch (error) {
      if (!(error instanceof RepositoryAlreadyExistsError)) {
        throw error instanceof GitError ? new RepositoryError(`Failed to initialize ${repoDir}: ${error.message}`, error) : error;
      }
      logger.info(`${repoDir} is already a Git repository`);
    }

    const inception = await new InceptionCommitCreator({ git }).createInceptionCommit(
      signingKey,
      author,
      options.date ? { date: options.date } : {}
    );

    await fs.mkdir(path.join(repoDir, path.dirname(ALLOWED_COMMIT_SIGNERS_PATH)), { recursive: true });

    let verification: VerificationResult | null = null;
    try {
      verification = await new InceptionCommitVerifier({ git }).verifyInceptionCommit();
      if (!verification.passed) {
        warnings.push('Inception commit verification failed');
      }
    } catch (error) {
      if (!(error instanceof BootstrapError)) throw error;
      warnings.push(`Inception commit could not be verified: ${error.message}`);
    }

    return {
      repoDir,
      repoName,
      inception,
      verification,
      did: toRepositoryDid(inception.commitId),
      warnings,
      nextSteps: [
        `Create the GitHub repository and push the inception commit: rootsign remote ${repoName}`,
        `Add bootstrap documents: rootsign templates ${repoName}`,
      ],
    };
  }

  private async resolveSigningKey(signingKeyId: string | undefined): Promise<SigningKey> {
    try {
      return await this.deps.keyProvider.resolveSigningKey(signingKeyId);
    } catch (error) {
      if (error instanceof SigningKeyError) {
        throw new SigningError(error.message, error);
      }
      throw error;
    }
  }
}
