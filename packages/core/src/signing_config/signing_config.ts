/**
 * SigningConfig - git prerequisites and SSH commit-signing configuration
 *
 * @module signing_config
 */

import { GitError } from '../git';
import type { IGitModule } from '../git';
import { SigningKeyError } from '../signing_key';
import type { ISigningKeyProvider, SigningKey } from '../signing_key';
import type { IAllowedSignersStore } from '../allowed_signers';
import { SigningError } from '../errors';
import { createLogger } from '../logger';
import type {
  ConfigureGitSigningOptions,
  EnvironmentValidation,
  SigningConfigDependencies,
  SigningConfigurationResult,
  ValidatePrerequisitesOptions,
} from './signing_config.types';

const logger = createLogger('[SigningConfig] ');

/** Oldest git that signs commits with SSH keys */
export const MIN_GIT_VERSION = '2.34.0';

/**
 * Compares dotted version strings numerically.
 * @returns negative, zero or positive like a sort comparator
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map(Number);
  const right = b.split('.').map(Number);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export class SigningConfig {
  private readonly git: IGitModule;
  private readonly keyProvider: ISigningKeyProvider;
  private readonly allowedSigners: IAllowedSignersStore;

  constructor(dependencies: SigningConfigDependencies) {
    this.git = dependencies.git;
    this.keyProvider = dependencies.keyProvider;
    this.allowedSigners = dependencies.allowedSigners;
  }

  /**
   * Checks git, identity and signing key. Missing signing settings are
   * reported as warnings only, since configureGitSigning can fill them in.
   */
  async validatePrerequisites(options: ValidatePrerequisitesOptions = {}): Promise<EnvironmentValidation> {
    const warnings: string[] = [];
    const suggestions: string[] = [];
    let isValid = true;

    let gitVersion: string | null = null;
    try {
      gitVersion = await this.git.getVersion();
    } catch (error) {
      if (!(error instanceof GitError)) throw error;
      isValid = false;
      warnings.push('Git is not installed or not on PATH');
      suggestions.push('Install git 2.34.0 or newer');
    }

    if (gitVersion !== null && compareVersions(gitVersion, MIN_GIT_VERSION) < 0) {
      isValid = false;
      warnings.push(`Git ${gitVersion} is too old for SSH commit signing (need ${MIN_GIT_VERSION})`);
      suggestions.push(`Upgrade git to ${MIN_GIT_VERSION} or newer`);
    }

    const name = await this.readConfig('user.name');
    const email = await this.readConfig('user.email');
    if (!name) {
      isValid = false;
      warnings.push('user.name is not configured');
      suggestions.push('git config --global user.name "Your Name"');
    }
    if (!email) {
      isValid = false;
      warnings.push('user.email is not configured');
      suggestions.push('git config --global user.email "you@example.com"');
    }

    let signingKey: SigningKey | null = null;
    try {
      signingKey = await this.keyProvider.resolveSigningKey(options.signingKeyId);
    } catch (error) {
      if (!(error instanceof SigningKeyError)) throw error;
      isValid = false;
      warnings.push(error.message);
      suggestions.push(`ssh-keygen -t ed25519 -C "${email ?? 'you@example.com'}"`);
    }

    if (gitVersion !== null) {
      if ((await this.readConfig('gpg.format')) !== 'ssh') {
        warnings.push('gpg.format is not set to ssh');
      }
      if (!(await this.readConfig('gpg.ssh.allowedSignersFile'))) {
        warnings.push('gpg.ssh.allowedSignersFile is not configured');
      }
      if ((await this.readConfig('commit.gpgsign')) !== 'true') {
        warnings.push('commit.gpgsign is not enabled');
      }
    }

    return {
      isValid,
      warnings,
      suggestions,
      gitVersion,
      identity: name && email ? { name, email } : null,
      signingKey,
    };
  }

  /**
   * Points git at the SSH key, turns on signing and authorizes the key in
   * the allowed signers list, then reads every setting back.
   *
   * @throws SigningError if a setting cannot be written
   */
  async configureGitSigning(options: ConfigureGitSigningOptions): Promise<SigningConfigurationResult> {
    const scope = options.scope ?? 'global';
    const settings = [
      { key: 'gpg.format', value: 'ssh' },
      { key: 'user.signingkey', value: options.signingKey.privateKeyPath },
      { key: 'commit.gpgsign', value: 'true' },
      { key: 'gpg.ssh.allowedSignersFile', value: this.allowedSigners.getPath() },
    ];

    try {
      for (const { key, value } of settings) {
        await this.git.setConfig(key, value, scope);
      }
    } catch (error) {
      if (error instanceof GitError) {
        throw new SigningError(`Failed to configure git signing: ${error.message}`, error);
      }
      throw error;
    }

    const allowedSignerAdded = await this.allowedSigners.addSigner(options.identity.email, options.signingKey.publicKey);

    const warnings: string[] = [];
    for (const { key, value } of settings) {
      const actual = await this.git.getConfig(key, scope);
      if (actual !== value) {
        warnings.push(`${key} reads back as ${actual ?? '(unset)'}, expected ${value}`);
      }
    }

    logger.info(`Configured SSH signing with ${options.signingKey.fingerprint} (${scope})`);
    return { settings, allowedSignerAdded, warnings };
  }

  private async readConfig(key: string): Promise<string | null> {
    try {
      return await this.git.getConfig(key);
    } catch (error) {
      if (error instanceof GitError) {
        logger.debug(`Could not read ${key}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
