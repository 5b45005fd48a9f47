/**
 * GitHubRemoteSetup - publishes a local inception commit to a protected GitHub branch
 *
 * Creating the repository and pushing are fatal; branch protection and
 * required signatures need admin rights and plan features, so their failures
 * are returned as warnings.
 *
 * @module github/github_remote_setup
 */

import { GitError } from '../git';
import { NotFoundError, RepositoryError, UsageError } from '../errors';
import { createLogger } from '../logger';
import type {
  BranchProtectionSummary,
  GitHubRemoteSetupDependencies,
  GitHubRemoteSetupOptions,
  GitHubRemoteSetupResult,
} from './github.types';

const logger = createLogger('[GitHubRemote] ');

const REPO_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

export const DEFAULT_GITHUB_HOST = 'github.com';

export function toGitHubCloneUrl(owner: string, repo: string, host: string = DEFAULT_GITHUB_HOST): string {
  return `https://${host}/${owner}/${repo}.git`;
}

/**
 * Web host that serves clones for a REST API base URL.
 * api.github.com maps to github.com; GitHub Enterprise serves both from one
 * host (`https://ghe.example.com/api/v3`).
 *
 * @throws UsageError if the URL has no host
 */
export function webHostFromApiBaseUrl(apiBaseUrl: string): string {
  let host: string;
  try {
    host = new URL(apiBaseUrl).host;
  } catch (error) {
    throw new UsageError(`Invalid GitHub API base URL: ${apiBaseUrl}`, error);
  }
  if (!host) {
    throw new UsageError(`Invalid GitHub API base URL: ${apiBaseUrl}`);
  }
  return host === 'api.github.com' ? DEFAULT_GITHUB_HOST : host;
}

export class GitHubRemoteSetup {
  private readonly deps: GitHubRemoteSetupDependencies;

  constructor(dependencies: GitHubRemoteSetupDependencies) {
    this.deps = dependencies;
  }

  /**
   * @throws UsageError for an invalid repository name
   * @throws NotFoundError if the local repository has no inception commit
   * @throws RepositoryError if the remote has unrelated history or git fails
   * @throws GitHubApiError if the login lookup or repository creation fails
   */
  async setup(options: GitHubRemoteSetupOptions): Promise<GitHubRemoteSetupResult> {
    const repo = options.repoName.trim();
    if (!REPO_NAME_PATTERN.test(repo)) {
      throw new UsageError(`Invalid GitHub repository name: "${options.repoName}"`);
    }
    const branch = options.branch ?? 'main';
    const remoteName = options.remoteName ?? 'origin';
    const visibility = options.visibility ?? 'private';
    const reviewCount = options.requiredApprovingReviewCount ?? 1;
    const warnings: string[] = [];

    const inceptionCommitId = await this.getInceptionCommitId();
    const owner = await this.deps.remote.getAuthenticatedLogin();
    logger.info(`Authenticated as ${owner}`);

    let created = false;
    let remoteHasInception = false;
    if (await this.deps.remote.repositoryExists(owner, repo)) {
      remoteHasInception = await this.deps.remote.commitExists(owner, repo, inceptionCommitId);
      if (!remoteHasInception) {
        throw new RepositoryError(
          `GitHub repository ${owner}/${repo} exists with history that does not contain inception commit ${inceptionCommitId}`
        );
      }
      logger.info(`${owner}/${repo} already contains the inception commit`);
    } else {
      await this.deps.remote.createRepository(repo, visibility);
      created = true;
      logger.info(`Created ${visibility} repository ${owner}/${repo}`);
    }

    const url = toGitHubCloneUrl(owner, repo, this.deps.webHost);
    await this.ensureRemote(remoteName, url);

    let pushed = false;
    if (!remoteHasInception) {
      try {
        await this.deps.git.push(remoteName, inceptionCommitId, branch, true);
      } catch (error) {
        if (error instanceof GitError) {
          throw new RepositoryError(`Failed to push inception commit to ${owner}/${repo}: ${error.message}`, error);
        }
        throw error;
      }
      pushed = true;
      logger.info(`Pushed ${inceptionCommitId} to ${remoteName}/${branch}`);
    }

    const protection = await this.protectBranch(owner, repo, branch, reviewCount, warnings);

    return { owner, repo, url, created, pushed, inceptionCommitId, protection, warnings };
  }

  private async getInceptionCommitId(): Promise<string> {
    let roots: string[];
    try {
      roots = await this.deps.git.getRootCommits('HEAD');
    } catch (error) {
      if (error instanceof GitError) {
        throw new NotFoundError(`No local commits to publish: ${error.message}`, error);
      }
      throw error;
    }
    const oldest = roots[roots.length - 1];
    if (oldest === undefined) {
      throw new NotFoundError('No local commits to publish');
    }
    return oldest;
  }

  private async ensureRemote(remoteName: string, url: string): Promise<void> {
    try {
      const current = await this.deps.git.getRemoteUrl(remoteName);
      if (current === null) {
        await this.deps.git.addRemote(remoteName, url);
      } else if (current !== url) {
        logger.warn(`Resetting ${remoteName} from ${current} to ${url}`);
        await this.deps.git.setRemoteUrl(remoteName, url);
      }
    } catch (error) {
      if (error instanceof GitError) {
        throw new RepositoryError(`Failed to configure remote ${remoteName}: ${error.message}`, error);
      }
      throw error;
    }
  }

  private async protectBranch(
    owner: string,
    repo: string,
    branch: string,
    reviewCount: number,
    warnings: string[]
  ): Promise<BranchProtectionSummary | null> {
    const attempt = async (label: string, action: () => Promise<void>): Promise<void> => {
      try {
        await action();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`${label}: ${message}`);
        warnings.push(`${label}: ${message}`);
      }
    };

    await attempt('Branch protection not applied', () =>
      this.deps.remote.configureBranchProtection(owner, repo, branch, reviewCount)
    );
    await attempt('Required signatures not enabled', () =>
      this.deps.remote.enableRequiredSignatures(owner, repo, branch)
    );

    try {
      return await this.deps.remote.getBranchProtection(owner, repo, branch);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warnings.push(`Branch protection could not be read: ${message}`);
      return null;
    }
  }
}
