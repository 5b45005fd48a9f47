/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for testing and for callers that build commits without a git binary.
 */

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// Signing keys with real Ed25519 key pairs
export { MemorySigningKeyProvider } from './signing_key/memory';
export type { MemoryCommitSigner } from './signing_key/memory';

// allowed_signers
export { MemoryAllowedSignersStore } from './allowed_signers/memory';

// GitModule
export { MemoryGitModule } from './git/memory';
export type { MemoryAllowedSigner, MemoryGitModuleOptions, MemoryPush } from './git/memory';
