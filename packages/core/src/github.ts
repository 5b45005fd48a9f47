/**
 * GitHub API implementations (Octokit)
 *
 * @example
 * ```typescript
 * import { createGitHubRemoteModule, GitHubRemoteSetup } from '@rootsign/core/github';
 *
 * const remote = createGitHubRemoteModule({ token });
 * const result = await new GitHubRemoteSetup({ git, remote }).setup({ repoName: 'widget' });
 * ```
 */

export {
  GitHubRemoteModule,
  GitHubRemoteSetup,
  createGitHubRemoteModule,
  GitHubApiError,
  toGitHubCloneUrl,
  webHostFromApiBaseUrl,
  DEFAULT_GITHUB_HOST,
  isOctokitRequestError,
  mapOctokitError,
} from './github/index';
export type {
  GitHubApiErrorCode,
  GitHubRestClient,
  BranchProtectionSummary,
  GitHubRemoteSetupOptions,
  GitHubRemoteSetupResult,
  IGitHubRemoteModule,
} from './github/index';
