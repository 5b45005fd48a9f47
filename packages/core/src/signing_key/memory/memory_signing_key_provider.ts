/**
 * MemorySigningKeyProvider - In-memory signing keys for tests
 *
 * Generates real Ed25519 key pairs with Node crypto and signs payloads with
 * them, so the in-memory git module can produce and check genuine signatures
 * without ssh-keygen.
 *
 * @module signing_key/memory
 */

import { generateKeyPairSync, sign, verify } from 'crypto';
import type { ISigningKeyProvider, SigningKey } from '../signing_key';
import { SigningKeyError } from '../signing_key';
import {
  computeFingerprint,
  decodeEd25519PublicKey,
  encodeEd25519PublicKey,
  parseSshPublicKey,
} from '../ssh_public_key';

const SIGNATURE_HEADER = '-----BEGIN MEMORY SIGNATURE-----';
const SIGNATURE_FOOTER = '-----END MEMORY SIGNATURE-----';

/**
 * SPKI DER prefix of an Ed25519 public key (RFC 8410); the raw 32 bytes follow.
 */
const ED25519_SPKI_PREFIX = Buffer.from([
  0x30, 0x2a, 0x30, 0x05, 0x06, 0x03, 0x2b, 0x65,
  0x70, 0x03, 0x21, 0x00,
]);

type StoredKey = {
  key: SigningKey;
  /** PKCS8 PEM; null marks a key whose private half is unusable */
  privateKeyPem: string | null;
};

/**
 * Signs and verifies commit payloads; implemented by MemorySigningKeyProvider.
 */
export interface MemoryCommitSigner {
  /** @throws SigningKeyError if the key is unknown or unusable */
  sign(keyId: string, payload: string): string;
  verify(payload: string, signature: string, publicKeyLine: string): boolean;
}

export class MemorySigningKeyProvider implements ISigningKeyProvider, MemoryCommitSigner {
  private readonly keys = new Map<string, StoredKey>();
  private defaultKeyId: string | null = null;

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Registers a public key whose private half is unavailable, so signing fails.
   */
  addPublicKeyOnly(id: string, publicKeyLine: string): SigningKey {
    const { keyType } = parseSshPublicKey(publicKeyLine);
    const key: SigningKey = {
      id,
      privateKeyPath: id,
      publicKey: publicKeyLine.trim(),
      fingerprint: computeFingerprint(publicKeyLine),
      keyType,
    };
    this.keys.set(id, { key, privateKeyPem: null });
    return key;
  }

  clear(): void {
    this.keys.clear();
    this.defaultKeyId = null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // ISigningKeyProvider
  // ═══════════════════════════════════════════════════════════════════════

  async resolveSigningKey(identifier?: string): Promise<SigningKey> {
    const id = identifier ?? this.defaultKeyId;
    const stored = id ? this.keys.get(id) : undefined;
    if (!stored) {
      throw new SigningKeyError(`No signing key found${id ? `: ${id}` : ''}`, 'KEY_NOT_FOUND', id ?? undefined);
    }
    return stored.key;
  }

  async generateSigningKey(email: string, identifier?: string): Promise<SigningKey> {
    return this.generateSigningKeySync(email, identifier);
  }

  /**
   * Synchronous variant, handy for building fixtures.
   */
  generateSigningKeySync(email: string, identifier: string = `memory:${email}`): SigningKey {
    if (this.keys.has(identifier)) {
      throw new SigningKeyError(`Key already exists: ${identifier}`, 'KEY_GENERATION_ERROR', identifier);
    }

    const { publicKey, privateKey } = generateKeyPairSync('ed25519', {
      publicKeyEncoding: { type: 'spki', format: 'der' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    });

    // Raw Ed25519 public key is the last 32 bytes of the SPKI DER encoding
    const publicKeyLine = encodeEd25519PublicKey(publicKey.subarray(-32), email);
    const key: SigningKey = {
      id: identifier,
      privateKeyPath: identifier,
      publicKey: publicKeyLine,
      fingerprint: computeFingerprint(publicKeyLine),
      keyType: 'ssh-ed25519',
    };

    this.keys.set(identifier, { key, privateKeyPem: privateKey });
    this.defaultKeyId ??= identifier;
    return key;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // MemoryCommitSigner
  // ═══════════════════════════════════════════════════════════════════════

  sign(keyId: string, payload: string): string {
    const stored = this.keys.get(keyId);
    if (!stored) {
      throw new SigningKeyError(`No signing key found: ${keyId}`, 'KEY_NOT_FOUND', keyId);
    }
    if (!stored.privateKeyPem) {
      throw new SigningKeyError(`Private key unavailable: ${keyId}`, 'SIGNING_REJECTED', keyId);
    }

    const signature = sign(null, Buffer.from(payload, 'utf-8'), stored.privateKeyPem);
    return [SIGNATURE_HEADER, signature.toString('base64'), SIGNATURE_FOOTER].join('\n');
  }

  verify(payload: string, signature: string, publicKeyLine: string): boolean {
    const { keyType } = parseSshPublicKey(publicKeyLine);
    if (keyType !== 'ssh-ed25519') {
      return false;
    }

    const lines = signature.trim().split('\n');
    if (lines[0] !== SIGNATURE_HEADER || lines[lines.length - 1] !== SIGNATURE_FOOTER) {
      return false;
    }

    const spki = Buffer.concat([ED25519_SPKI_PREFIX, decodeEd25519PublicKey(publicKeyLine)]);
    return verify(
      null,
      Buffer.from(payload, 'utf-8'),
      { key: spki, format: 'der', type: 'spki' },
      Buffer.from(lines.slice(1, -1).join(''), 'base64')
    );
  }
}
