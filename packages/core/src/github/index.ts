/**
 * GitHub remote creation and branch protection
 *
 * @module github
 */

export { GitHubRemoteModule, createGitHubRemoteModule } from './github_remote_module';
export { GitHubRemoteSetup, toGitHubCloneUrl, webHostFromApiBaseUrl, DEFAULT_GITHUB_HOST } from './github_remote_setup';
export { GitHubApiError } from './github.types';
export { isOctokitRequestError, mapOctokitError } from './github_errors';
export type {
  GitHubApiErrorCode,
  GitHubRestClient,
  BranchProtectionSummary,
  GitHubRemoteModuleOptions,
  GitHubRemoteSetupOptions,
  GitHubRemoteSetupResult,
  GitHubRemoteSetupDependencies,
  IGitHubRemoteModule,
} from './github.types';
