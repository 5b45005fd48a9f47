export { MemorySigningKeyProvider } from './memory_signing_key_provider';
export type { MemoryCommitSigner } from './memory_signing_key_provider';
