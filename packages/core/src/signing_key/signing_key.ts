/**
 * SigningKeyProvider Interface
 *
 * Abstracts discovery and creation of the asymmetric key pair that signs the
 * inception commit. Backends: filesystem (~/.ssh keys used by git) and memory
 * (Node crypto keys for tests).
 *
 * @module signing_key
 */

/**
 * Error codes for SigningKeyProvider operations.
 */
export type SigningKeyErrorCode =
  | 'KEY_NOT_FOUND'
  | 'PUBLIC_KEY_NOT_FOUND'
  | 'KEY_READ_ERROR'
  | 'INVALID_KEY_FORMAT'
  | 'KEY_GENERATION_ERROR'
  | 'SIGNING_REJECTED';

/**
 * Error thrown when key operations fail.
 */
export class SigningKeyError extends Error {
  constructor(
    message: string,
    public readonly code: SigningKeyErrorCode,
    public readonly keyId?: string
  ) {
    super(message);
    this.name = 'SigningKeyError';
    Object.setPrototypeOf(this, SigningKeyError.prototype);
  }
}

/**
 * A usable signing key pair.
 */
export type SigningKey = {
  /** Identifier the key was resolved by (path for fs, name for memory) */
  id: string;
  /** Value handed to the signer: private key path for git, id for memory */
  privateKeyPath: string;
  /** OpenSSH public key line: "<type> <base64> [comment]" */
  publicKey: string;
  /** "SHA256:<unpadded base64>" of the public key blob */
  fingerprint: string;
  /** e.g. "ssh-ed25519" */
  keyType: string;
};

/**
 * Interface for locating and creating signing keys.
 *
 * @example
 * ```typescript
 * const provider = new FsSigningKeyProvider({ git });
 * const key = await provider.resolveSigningKey();
 * console.log(key.fingerprint); // SHA256:V8Vh...
 * ```
 */
export interface ISigningKeyProvider {
  /**
   * Resolves a signing key.
   * @param identifier - explicit key path or name; discovery is used when omitted
   * @throws SigningKeyError if no usable key is found
   */
  resolveSigningKey(identifier?: string): Promise<SigningKey>;

  /**
   * Creates a new Ed25519 key pair.
   * @param email - comment recorded on the public key
   * @param identifier - where to create it; provider default when omitted
   * @throws SigningKeyError with KEY_GENERATION_ERROR if the key exists or cannot be created
   */
  generateSigningKey(email: string, identifier?: string): Promise<SigningKey>;
}
