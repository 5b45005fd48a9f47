import type { GitConfigScope, IGitModule } from '../git';
import type { ISigningKeyProvider, SigningKey } from '../signing_key';
import type { IAllowedSignersStore } from '../allowed_signers';
import type { AuthorIdentity } from '../inception';

export type EnvironmentValidation = {
  /** Whether every hard prerequisite is met */
  isValid: boolean;
  /** List of validation warnings, blocking and informational */
  warnings: string[];
  /** Actionable suggestions for user */
  suggestions: string[];
  /** Installed git version, null when git is missing */
  gitVersion: string | null;
  /** Configured author identity, when complete */
  identity: AuthorIdentity | null;
  /** Key that would sign the inception commit */
  signingKey: SigningKey | null;
};

export type ValidatePrerequisitesOptions = {
  /** Explicit signing key instead of discovery */
  signingKeyId?: string;
};

export type ConfigureGitSigningOptions = {
  signingKey: SigningKey;
  identity: AuthorIdentity;
  /** Config scope written to (default: global) */
  scope?: GitConfigScope;
};

export type SigningConfigurationResult = {
  /** Settings written, in order */
  settings: Array<{ key: string; value: string }>;
  /** Whether the allowed signers list gained an entry */
  allowedSignerAdded: boolean;
  /** Settings that did not read back as written */
  warnings: string[];
};

export type SigningConfigDependencies = {
  git: IGitModule;
  keyProvider: ISigningKeyProvider;
  allowedSigners: IAllowedSignersStore;
};
