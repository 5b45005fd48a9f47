/**
 * ConfigStore - Configuration persistence abstraction
 *
 * IMPORTANT: This module only exports the interface.
 * For implementations, use:
 * - @rootsign/core/fs for FsConfigStore
 * - @rootsign/core/memory for MemoryConfigStore
 */

export type { ConfigStore } from './config_store';
