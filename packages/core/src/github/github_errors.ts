import { GitHubApiError } from './github.types';

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 * Avoids a runtime import of @octokit/request-error.
 */
export function isOctokitRequestError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}

/**
 * Maps Octokit RequestError (and unknown errors) to GitHubApiError.
 */
export function mapOctokitError(error: unknown, context: string): GitHubApiError {
  if (error instanceof GitHubApiError) {
    return error;
  }
  if (isOctokitRequestError(error)) {
    const status = error.status;

    if (status === 401 || status === 403) {
      return new GitHubApiError(`Permission denied: ${context}`, 'PERMISSION_DENIED', status);
    }
    if (status === 404) {
      return new GitHubApiError(`Not found: ${context}`, 'NOT_FOUND', status);
    }
    if (status === 409 || status === 422) {
      return new GitHubApiError(`Conflict: ${context}: ${error.message}`, 'CONFLICT', status);
    }
    if (status >= 500) {
      return new GitHubApiError(`Server error (${status}): ${context}`, 'SERVER_ERROR', status);
    }
    return new GitHubApiError(`GitHub API error (${status}): ${context}`, 'SERVER_ERROR', status);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new GitHubApiError(`Network error: ${context}: ${message}`, 'NETWORK_ERROR');
}
