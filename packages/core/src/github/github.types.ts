/**
 * Shared types for the @rootsign/core/github export path.
 */

import type { IGitModule } from '../git';
import type { RepositoryVisibility } from '../config_manager';

/**
 * Error codes for GitHub API errors.
 * Semantic codes that abstract HTTP status codes.
 */
export type GitHubApiErrorCode =
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'INVALID_RESPONSE';

/**
 * Typed error for GitHub API operations.
 */
export class GitHubApiError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: GitHubApiErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'GitHubApiError';
    Object.setPrototypeOf(this, GitHubApiError.prototype);
  }
}

type RepoParams = { owner: string; repo: string };
type BranchParams = RepoParams & { branch: string };

/**
 * The part of the Octokit REST client the remote setup calls.
 * An `Octokit` instance from @octokit/rest satisfies it.
 */
export interface GitHubRestClient {
  rest: {
    users: {
      getAuthenticated(): Promise<{ data: { login: string } }>;
    };
    repos: {
      get(params: RepoParams): Promise<{ data: { html_url: string; private: boolean } }>;
      createForAuthenticatedUser(params: {
        name: string;
        private: boolean;
        auto_init: boolean;
      }): Promise<{ data: { html_url: string } }>;
      getCommit(params: RepoParams & { ref: string }): Promise<{ data: { sha: string } }>;
      updateBranchProtection(params: BranchParams & {
        required_status_checks: null;
        enforce_admins: boolean;
        required_pull_request_reviews: { required_approving_review_count: number };
        restrictions: null;
      }): Promise<unknown>;
      createCommitSignatureProtection(params: BranchParams): Promise<unknown>;
      getBranchProtection(params: BranchParams): Promise<{
        data: {
          required_pull_request_reviews?: { required_approving_review_count?: number };
          required_signatures?: { enabled: boolean };
        };
      }>;
    };
  };
}

/**
 * Protection state read back from GitHub after setup.
 */
export type BranchProtectionSummary = {
  requiredApprovingReviewCount: number | null;
  requiredSignatures: boolean;
};

export type GitHubRemoteModuleOptions = {
  client: GitHubRestClient;
};

export type GitHubRemoteSetupOptions = {
  repoName: string;
  visibility?: RepositoryVisibility;
  /** Remote branch that receives the inception commit (default: main) */
  branch?: string;
  requiredApprovingReviewCount?: number;
  remoteName?: string;
};

export type GitHubRemoteSetupResult = {
  owner: string;
  repo: string;
  /** Clone URL written to the remote */
  url: string;
  /** False when the repository already existed */
  created: boolean;
  /** False when the remote already had the inception commit */
  pushed: boolean;
  inceptionCommitId: string;
  /** null when protection could not be read back */
  protection: BranchProtectionSummary | null;
  warnings: string[];
};

export type GitHubRemoteSetupDependencies = {
  git: IGitModule;
  remote: IGitHubRemoteModule;
  /** Host in the clone URL written to the remote (default: github.com) */
  webHost?: string;
};

export interface IGitHubRemoteModule {
  getAuthenticatedLogin(): Promise<string>;
  repositoryExists(owner: string, repo: string): Promise<boolean>;
  createRepository(name: string, visibility: RepositoryVisibility): Promise<void>;
  commitExists(owner: string, repo: string, sha: string): Promise<boolean>;
  configureBranchProtection(owner: string, repo: string, branch: string, reviewCount: number): Promise<void>;
  enableRequiredSignatures(owner: string, repo: string, branch: string): Promise<void>;
  getBranchProtection(owner: string, repo: string, branch: string): Promise<BranchProtectionSummary>;
}
