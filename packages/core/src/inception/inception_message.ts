/**
 * Inception commit message and identifiers.
 */

export const INCEPTION_SUMMARY = 'Initialize repository and establish a SHA-1 root of trust';

/** Where later signers are authorized, relative to the repository root */
export const ALLOWED_COMMIT_SIGNERS_PATH = '.repo/config/verification/allowed_commit_signers';

export const INCEPTION_BODY =
  "This key also certifies future commits' integrity and origin. Other keys can be authorized " +
  `to add additional commits via the creation of a ./${ALLOWED_COMMIT_SIGNERS_PATH} file. ` +
  "This file must initially be signed by this repo's inception key, granting these keys the " +
  'authority to add future commits to this repo, including the potential to remove the authority ' +
  'of this inception key for future commits. Once established, any changes to ' +
  `./${ALLOWED_COMMIT_SIGNERS_PATH} must be authorized by one of the previously approved signers.`;

export const SIGN_OFF_PREFIX = 'Signed-off-by:';

export const COMMITTER_NAME_PREFIX = 'SHA256:';

export const DID_PREFIX = 'did:repo:';

export function buildInceptionMessage(author: { name: string; email: string }): string {
  return `${INCEPTION_SUMMARY}\n\n${INCEPTION_BODY}\n\n${SIGN_OFF_PREFIX} ${author.name} <${author.email}>`;
}

export function hasSignOff(message: string): boolean {
  return message.split('\n').some((line) => line.startsWith(SIGN_OFF_PREFIX));
}

export function toRepositoryDid(commitId: string): string {
  return `${DID_PREFIX}${commitId}`;
}
