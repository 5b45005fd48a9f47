/**
 * FsSigningKeyProvider - Filesystem-based SigningKeyProvider implementation
 *
 * Finds the SSH key git signs with, the same way an operator would:
 * an explicit path, then `user.signingkey`, then ~/.ssh/id_ed25519, then any
 * other Ed25519 private key in ~/.ssh.
 *
 * @module signing_key/fs/fs_signing_key_provider
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { ExecCommandFn } from '../../git/types';
import type { ISigningKeyProvider, SigningKey } from '../signing_key';
import { SigningKeyError } from '../signing_key';
import { computeFingerprint, isEd25519KeyType, parseSshPublicKey } from '../ssh_public_key';
import { createLogger } from '../../logger';
import { expandHome } from '../../utils/path_utils';

const logger = createLogger('[FsSigningKeyProvider] ');

/**
 * Options for FsSigningKeyProvider.
 */
export interface FsSigningKeyProviderOptions {
  /** Directory searched for keys (default: ~/.ssh) */
  sshDir?: string;
  /** Reads the configured signing key (usually git config user.signingkey) */
  getConfiguredKey?: () => Promise<string | null>;
  /** Runs ssh-keygen when generating keys */
  execCommand?: ExecCommandFn;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * @example
 * ```typescript
 * const provider = new FsSigningKeyProvider({
 *   getConfiguredKey: () => git.getConfig('user.signingkey'),
 *   execCommand,
 * });
 * const key = await provider.resolveSigningKey();
 * ```
 */
export class FsSigningKeyProvider implements ISigningKeyProvider {
  private readonly sshDir: string;
  private readonly getConfiguredKey: (() => Promise<string | null>) | undefined;
  private readonly execCommand: ExecCommandFn | undefined;

  constructor(options: FsSigningKeyProviderOptions = {}) {
    this.sshDir = expandHome(options.sshDir ?? '~/.ssh');
    this.getConfiguredKey = options.getConfiguredKey;
    this.execCommand = options.execCommand;
  }

  /**
   * Resolves a key by path, or discovers one when no path is given.
   */
  async resolveSigningKey(identifier?: string): Promise<SigningKey> {
    const privateKeyPath = identifier
      ? await this.requireExplicitKey(identifier)
      : await this.discoverPrivateKey();

    const publicKeyPath = await this.findPublicKeyPath(privateKeyPath);
    if (!publicKeyPath) {
      throw new SigningKeyError(
        `Could not find public key for ${privateKeyPath}`,
        'PUBLIC_KEY_NOT_FOUND',
        privateKeyPath
      );
    }

    let publicKey: string;
    try {
      const content = await fs.readFile(publicKeyPath, 'utf-8');
      publicKey = content.split('\n').map((line) => line.trim()).find(Boolean) ?? '';
    } catch (error) {
      throw new SigningKeyError(
        `Failed to read public key ${publicKeyPath}: ${error instanceof Error ? error.message : String(error)}`,
        'KEY_READ_ERROR',
        privateKeyPath
      );
    }

    const { keyType } = parseSshPublicKey(publicKey);
    if (!isEd25519KeyType(keyType)) {
      logger.warn(`Signing key ${privateKeyPath} is ${keyType}; Ed25519 keys are recommended`);
    }

    return {
      id: privateKeyPath,
      privateKeyPath,
      publicKey,
      fingerprint: computeFingerprint(publicKey),
      keyType,
    };
  }

  /**
   * Generates an Ed25519 key with ssh-keygen (no passphrase).
   */
  async generateSigningKey(email: string, identifier?: string): Promise<SigningKey> {
    if (!this.execCommand) {
      throw new SigningKeyError('Key generation requires execCommand', 'KEY_GENERATION_ERROR');
    }

    const keyPath = expandHome(identifier ?? path.join(this.sshDir, 'id_ed25519'));
    if (await isFile(keyPath)) {
      throw new SigningKeyError(`Key already exists: ${keyPath}`, 'KEY_GENERATION_ERROR', keyPath);
    }

    await fs.mkdir(path.dirname(keyPath), { recursive: true });
    const result = await this.execCommand('ssh-keygen', ['-q', '-t', 'ed25519', '-C', email, '-f', keyPath, '-N', '']);
    if (result.exitCode !== 0) {
      throw new SigningKeyError(
        `ssh-keygen failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`,
        'KEY_GENERATION_ERROR',
        keyPath
      );
    }

    logger.info(`Generated Ed25519 signing key at ${keyPath}`);
    return this.resolveSigningKey(keyPath);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private async requireExplicitKey(identifier: string): Promise<string> {
    const keyPath = expandHome(identifier);
    if (!(await isFile(keyPath))) {
      throw new SigningKeyError(`Signing key not found: ${keyPath}`, 'KEY_NOT_FOUND', keyPath);
    }
    return keyPath;
  }

  private async discoverPrivateKey(): Promise<string> {
    const configured = this.getConfiguredKey ? await this.getConfiguredKey() : null;
    if (configured) {
      const configuredPath = expandHome(configured);
      if (await isFile(configuredPath)) {
        logger.debug(`Using configured signing key ${configuredPath}`);
        return configuredPath;
      }
    }

    const standard = path.join(this.sshDir, 'id_ed25519');
    if (await isFile(standard)) {
      return standard;
    }

    let entries: string[] = [];
    try {
      entries = (await fs.readdir(this.sshDir)).sort();
    } catch {
      entries = [];
    }
    for (const entry of entries) {
      if (entry.includes('ed25519') && !entry.endsWith('.pub')) {
        const candidate = path.join(this.sshDir, entry);
        if (await isFile(candidate)) {
          return candidate;
        }
      }
    }

    throw new SigningKeyError(
      'No SSH signing key found. Configure one with `git config --global user.signingkey <path>` ' +
      'or generate one with `ssh-keygen -t ed25519 -C "your.email@example.com"`',
      'KEY_NOT_FOUND'
    );
  }

  /**
   * Locates the public half: the path itself if it is a .pub, `<path>.pub`,
   * the path with its extension swapped for .pub, then `<basename>*.pub`.
   */
  private async findPublicKeyPath(privateKeyPath: string): Promise<string | null> {
    if (privateKeyPath.endsWith('.pub')) {
      return privateKeyPath;
    }

    const appended = `${privateKeyPath}.pub`;
    if (await isFile(appended)) {
      return appended;
    }

    const parsed = path.parse(privateKeyPath);
    if (parsed.ext) {
      const swapped = path.join(parsed.dir, `${parsed.name}.pub`);
      if (await isFile(swapped)) {
        return swapped;
      }
    }

    try {
      const siblings = (await fs.readdir(parsed.dir)).sort();
      const match = siblings.find((name) => name.startsWith(parsed.base) && name.endsWith('.pub'));
      return match ? path.join(parsed.dir, match) : null;
    } catch {
      return null;
    }
  }
}
