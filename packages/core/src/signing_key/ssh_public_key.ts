/**
 * OpenSSH public key helpers.
 *
 * A public key line is `<type> <base64 blob> [comment]`. The blob is the SSH
 * wire encoding: a sequence of uint32-length-prefixed strings, the first of
 * which repeats the key type.
 */

import { createHash } from 'crypto';
import { SigningKeyError } from './signing_key';

export type SshPublicKey = {
  keyType: string;
  /** Base64 of the wire-format blob, as written in the key line */
  base64: string;
  blob: Buffer;
  comment?: string;
};

const ED25519 = 'ssh-ed25519';

function readSshString(blob: Buffer, offset: number): { value: Buffer; next: number } | null {
  if (offset + 4 > blob.length) return null;
  const length = blob.readUInt32BE(offset);
  const start = offset + 4;
  if (start + length > blob.length) return null;
  return { value: blob.subarray(start, start + length), next: start + length };
}

function writeSshString(value: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(value.length, 0);
  return Buffer.concat([length, value]);
}

/**
 * Parses an OpenSSH public key line.
 *
 * @throws SigningKeyError (INVALID_KEY_FORMAT) if the line is not a public key
 * or the blob's embedded type disagrees with the declared one
 */
export function parseSshPublicKey(line: string): SshPublicKey {
  const [keyType, base64, ...rest] = line.trim().split(/\s+/);
  if (!keyType || !base64 || !/^[A-Za-z0-9+/]+={0,2}$/.test(base64)) {
    throw new SigningKeyError('Not an OpenSSH public key line', 'INVALID_KEY_FORMAT');
  }

  const blob = Buffer.from(base64, 'base64');
  const embeddedType = readSshString(blob, 0);
  if (!embeddedType || embeddedType.value.toString('utf-8') !== keyType) {
    throw new SigningKeyError(`Public key blob does not match type ${keyType}`, 'INVALID_KEY_FORMAT');
  }

  const comment = rest.join(' ');
  return comment ? { keyType, base64, blob, comment } : { keyType, base64, blob };
}

/**
 * SHA-256 fingerprint in the format printed by `ssh-keygen -E sha256 -lf`.
 */
export function computeFingerprint(publicKeyLine: string): string {
  const { blob } = parseSshPublicKey(publicKeyLine);
  const digest = createHash('sha256').update(blob).digest('base64');
  return `SHA256:${digest.replace(/=+$/, '')}`;
}

/**
 * Encodes a raw 32-byte Ed25519 public key as an OpenSSH public key line.
 */
export function encodeEd25519PublicKey(rawPublicKey: Buffer, comment?: string): string {
  if (rawPublicKey.length !== 32) {
    throw new SigningKeyError('Ed25519 public keys are 32 bytes', 'INVALID_KEY_FORMAT');
  }
  const blob = Buffer.concat([writeSshString(Buffer.from(ED25519, 'utf-8')), writeSshString(rawPublicKey)]);
  const line = `${ED25519} ${blob.toString('base64')}`;
  return comment ? `${line} ${comment}` : line;
}

/**
 * Extracts the raw 32-byte key from an ssh-ed25519 public key line.
 */
export function decodeEd25519PublicKey(publicKeyLine: string): Buffer {
  const { keyType, blob } = parseSshPublicKey(publicKeyLine);
  if (keyType !== ED25519) {
    throw new SigningKeyError(`Expected ${ED25519} key, got ${keyType}`, 'INVALID_KEY_FORMAT');
  }
  const typeField = readSshString(blob, 0);
  const keyField = typeField ? readSshString(blob, typeField.next) : null;
  if (!keyField || keyField.value.length !== 32) {
    throw new SigningKeyError('Malformed ssh-ed25519 key blob', 'INVALID_KEY_FORMAT');
  }
  return Buffer.from(keyField.value);
}

export function isEd25519KeyType(keyType: string): boolean {
  return keyType === ED25519 || keyType === 'sk-ssh-ed25519@openssh.com';
}
