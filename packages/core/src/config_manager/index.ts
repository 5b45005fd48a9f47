/**
 * ConfigManager - bootstrap configuration with defaults and env overrides
 *
 * For stores, use:
 * - @rootsign/core/fs for FsConfigStore
 * - @rootsign/core/memory for MemoryConfigStore
 */

export { ConfigManager, ConfigValidationError, DEFAULT_CONFIG, validateConfigFile } from './config_manager';
export type {
  BootstrapConfig,
  BootstrapConfigFile,
  RepositoryVisibility,
  IConfigManager,
} from './config_manager.types';
