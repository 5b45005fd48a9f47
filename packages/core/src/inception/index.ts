/**
 * Inception commit: the signed, empty first commit that roots a repository's trust
 *
 * @module inception
 */

export { InceptionCommitCreator } from './inception_creator';
export { InceptionCommitVerifier } from './inception_verifier';
export {
  INCEPTION_SUMMARY,
  INCEPTION_BODY,
  ALLOWED_COMMIT_SIGNERS_PATH,
  SIGN_OFF_PREFIX,
  COMMITTER_NAME_PREFIX,
  DID_PREFIX,
  buildInceptionMessage,
  hasSignOff,
  toRepositoryDid,
} from './inception_message';
export type {
  AuthorIdentity,
  InceptionCommit,
  CreateInceptionCommitOptions,
  InceptionCheckName,
  InceptionCheck,
  VerificationResult,
  VerifyInceptionCommitOptions,
  InceptionDependencies,
  IInceptionCommitCreator,
  IInceptionCommitVerifier,
} from './inception.types';
