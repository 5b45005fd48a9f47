/**
 * GitHubRemoteModule - repository and branch protection calls via Octokit
 *
 * @module github/github_remote_module
 */

import { Octokit } from '@octokit/rest';
import type { RepositoryVisibility } from '../config_manager';
import { GitHubApiError } from './github.types';
import type {
  BranchProtectionSummary,
  GitHubRemoteModuleOptions,
  GitHubRestClient,
  IGitHubRemoteModule,
} from './github.types';
import { isOctokitRequestError, mapOctokitError } from './github_errors';

export class GitHubRemoteModule implements IGitHubRemoteModule {
  private readonly client: GitHubRestClient;

  constructor(options: GitHubRemoteModuleOptions) {
    this.client = options.client;
  }

  async getAuthenticatedLogin(): Promise<string> {
    try {
      const { data } = await this.client.rest.users.getAuthenticated();
      if (!data.login) {
        throw new GitHubApiError('Authenticated user has no login', 'INVALID_RESPONSE');
      }
      return data.login;
    } catch (error: unknown) {
      throw mapOctokitError(error, 'GET /user');
    }
  }

  async repositoryExists(owner: string, repo: string): Promise<boolean> {
    try {
      await this.client.rest.repos.get({ owner, repo });
      return true;
    } catch (error: unknown) {
      if (isOctokitRequestError(error) && error.status === 404) {
        return false;
      }
      throw mapOctokitError(error, `GET /repos/${owner}/${repo}`);
    }
  }

  /**
   * Creates an empty repository owned by the authenticated user.
   */
  async createRepository(name: string, visibility: RepositoryVisibility): Promise<void> {
    try {
      await this.client.rest.repos.createForAuthenticatedUser({
        name,
        private: visibility === 'private',
        auto_init: false,
      });
    } catch (error: unknown) {
      throw mapOctokitError(error, `POST /user/repos (${name})`);
    }
  }

  /**
   * GitHub answers 404 for an unknown sha and 409 or 422 for an empty repository.
   */
  async commitExists(owner: string, repo: string, sha: string): Promise<boolean> {
    try {
      await this.client.rest.repos.getCommit({ owner, repo, ref: sha });
      return true;
    } catch (error: unknown) {
      if (isOctokitRequestError(error) && (error.status === 404 || error.status === 409 || error.status === 422)) {
        return false;
      }
      throw mapOctokitError(error, `GET /repos/${owner}/${repo}/commits/${sha}`);
    }
  }

  async configureBranchProtection(owner: string, repo: string, branch: string, reviewCount: number): Promise<void> {
    try {
      await this.client.rest.repos.updateBranchProtection({
        owner,
        repo,
        branch,
        required_status_checks: null,
        enforce_admins: false,
        required_pull_request_reviews: { required_approving_review_count: reviewCount },
        restrictions: null,
      });
    } catch (error: unknown) {
      throw mapOctokitError(error, `PUT /repos/${owner}/${repo}/branches/${branch}/protection`);
    }
  }

  async enableRequiredSignatures(owner: string, repo: string, branch: string): Promise<void> {
    try {
      await this.client.rest.repos.createCommitSignatureProtection({ owner, repo, branch });
    } catch (error: unknown) {
      throw mapOctokitError(error, `POST /repos/${owner}/${repo}/branches/${branch}/protection/required_signatures`);
    }
  }

  async getBranchProtection(owner: string, repo: string, branch: string): Promise<BranchProtectionSummary> {
    try {
      const { data } = await this.client.rest.repos.getBranchProtection({ owner, repo, branch });
      return {
        requiredApprovingReviewCount: data.required_pull_request_reviews?.required_approving_review_count ?? null,
        requiredSignatures: data.required_signatures?.enabled ?? false,
      };
    } catch (error: unknown) {
      throw mapOctokitError(error, `GET /repos/${owner}/${repo}/branches/${branch}/protection`);
    }
  }
}

/**
 * Builds a GitHubRemoteModule over an authenticated Octokit client.
 */
export function createGitHubRemoteModule(options: { token: string; baseUrl?: string }): GitHubRemoteModule {
  const client = new Octokit({
    auth: options.token,
    ...(options.baseUrl !== undefined && { baseUrl: options.baseUrl }),
  });
  return new GitHubRemoteModule({ client });
}
