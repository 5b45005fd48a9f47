import type { IGitModule } from '../git';
import type { ISigningKeyProvider } from '../signing_key';
import type { SigningConfig } from '../signing_config';
import type { AuthorIdentity, InceptionCommit, VerificationResult } from '../inception';

export type RepositoryTarget = {
  repoDir: string;
  repoName: string;
};

export type LocalRepositorySetupOptions = {
  /** ".", a name under cwd, or an absolute path */
  target: string;
  /** Directory relative targets resolve against (default: process.cwd()) */
  cwd?: string;
  /** Inception author; defaults to git's user.name and user.email */
  author?: AuthorIdentity;
  /** Explicit signing key instead of discovery */
  signingKeyId?: string;
  initialBranch?: string;
  /** Write global SSH signing settings first (default: true) */
  configureSigning?: boolean;
  /** Proceed even when prerequisites fail */
  skipValidation?: boolean;
  /** Inception commit date (default: now) */
  date?: Date;
};

export type LocalRepositorySetupResult = RepositoryTarget & {
  inception: InceptionCommit;
  /** Null when verification could not run; see warnings */
  verification: VerificationResult | null;
  did: string;
  warnings: string[];
  nextSteps: string[];
};

export type LocalRepositorySetupDependencies = {
  keyProvider: ISigningKeyProvider;
  signingConfig: SigningConfig;
  /** Creates the git module for the new repository's directory */
  createGitModule: (repoDir: string) => IGitModule;
};
