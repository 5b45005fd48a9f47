/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access
 * or the git and ssh-keygen executables.
 * Use @rootsign/core/memory for in-memory alternatives.
 */

// ConfigStore + ConfigManager factory
export { FsConfigStore, createConfigManager, DEFAULT_CONFIG_PATH } from './config_store/fs';

// Signing keys under ~/.ssh
export { FsSigningKeyProvider } from './signing_key/fs';
export type { FsSigningKeyProviderOptions } from './signing_key/fs';

// allowed_signers file
export { FsAllowedSignersStore } from './allowed_signers/fs';

// LocalGitModule (CLI-based, uses execCommand for git operations)
export { LocalGitModule, LocalGitModule as GitModule } from './git/local';
export type { IGitModule, GitModuleDependencies } from './git';

// Bootstrap documents
export { TemplateInstaller, TemplateSetup } from './template_installer';
