/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ initialBranch: 'trunk' });
 * const manager = new ConfigManager(configStore, {});
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: unknown | null = null;

  async loadConfig(): Promise<unknown | null> {
    return this.config;
  }

  /**
   * Sets raw content, valid or not, for tests.
   */
  setConfig(config: unknown | null): void {
    this.config = config;
  }
}
