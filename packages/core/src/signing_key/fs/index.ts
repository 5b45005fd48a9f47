export { FsSigningKeyProvider } from './fs_signing_key_provider';
export type { FsSigningKeyProviderOptions } from './fs_signing_key_provider';
