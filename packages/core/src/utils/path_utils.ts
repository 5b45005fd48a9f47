import * as os from 'os';
import * as path from 'path';

/**
 * Expands a leading "~" to the home directory.
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

/**
 * True for a missing-file error from fs. Checks the shape rather than
 * `instanceof Error`: errors raised by fs are not always from this realm.
 */
export function isFileNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
