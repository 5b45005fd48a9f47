/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 */

import { promises as fs } from 'fs';
import type { ConfigStore } from '../config_store';
import { ConfigManager, ConfigValidationError } from '../../config_manager/config_manager';
import { expandHome, isFileNotFound } from '../../utils/path_utils';

export const DEFAULT_CONFIG_PATH = '~/.config/rootsign/config.json';

/**
 * Filesystem-based ConfigStore implementation.
 *
 * A missing file is not an error: loadConfig returns null and defaults apply.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore();
 * const config = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = expandHome(configPath);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * @throws ConfigValidationError if the file is not valid JSON
   */
  async loadConfig(): Promise<unknown | null> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return null;
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError(`Invalid JSON in ${this.configPath}`, [reason]);
    }
  }
}

/**
 * Creates a ConfigManager reading the given (or default) config file.
 */
export function createConfigManager(configPath?: string, env?: NodeJS.ProcessEnv): ConfigManager {
  return new ConfigManager(new FsConfigStore(configPath), env);
}
