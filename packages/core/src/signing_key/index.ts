/**
 * Signing keys: discovery, generation and SSH fingerprints
 *
 * @module signing_key
 */

export { SigningKeyError } from './signing_key';
export type { ISigningKeyProvider, SigningKey, SigningKeyErrorCode } from './signing_key';

export {
  parseSshPublicKey,
  computeFingerprint,
  encodeEd25519PublicKey,
  decodeEd25519PublicKey,
  isEd25519KeyType,
} from './ssh_public_key';
export type { SshPublicKey } from './ssh_public_key';
