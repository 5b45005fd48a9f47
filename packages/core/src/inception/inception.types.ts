import type { CommitIdentity, IGitModule } from '../git';
import type { SigningKey } from '../signing_key';

export type AuthorIdentity = {
  name: string;
  email: string;
};

/**
 * The empty, parentless, signed commit that anchors a repository.
 */
export type InceptionCommit = {
  commitId: string;
  treeId: string;
  message: string;
  author: CommitIdentity;
  committer: CommitIdentity;
  signature: string;
  parents: string[];
};

export type CreateInceptionCommitOptions = {
  /** Author and committer date (default: now) */
  date?: Date;
};

export type InceptionCheckName =
  | 'empty-tree'
  | 'message'
  | 'signature'
  | 'committer-format'
  | 'sign-off';

export type InceptionCheck = {
  name: InceptionCheckName;
  passed: boolean;
  /** Failed "warning" checks never affect the verdict */
  severity: 'error' | 'warning';
  message: string;
};

export type VerificationResult = {
  /** True iff every error-severity check passed */
  passed: boolean;
  commitId: string;
  did: string;
  checks: InceptionCheck[];
};

export type VerifyInceptionCommitOptions = {
  /** Ref whose history is searched for the root commit (default: HEAD) */
  ref?: string;
  /** allowed_signers file overriding gpg.ssh.allowedSignersFile */
  allowedSignersFile?: string;
};

export type InceptionDependencies = {
  git: IGitModule;
};

export interface IInceptionCommitCreator {
  createInceptionCommit(
    signingKey: SigningKey,
    author: AuthorIdentity,
    options?: CreateInceptionCommitOptions
  ): Promise<InceptionCommit>;
}

export interface IInceptionCommitVerifier {
  verifyInceptionCommit(options?: VerifyInceptionCommitOptions): Promise<VerificationResult>;
}
