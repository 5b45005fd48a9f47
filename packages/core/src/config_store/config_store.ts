/**
 * ConfigStore Interface
 *
 * Abstraction for config.json persistence. Implementations:
 * - FsConfigStore: ~/.config/rootsign/config.json
 * - MemoryConfigStore: In-memory for tests
 */

export interface ConfigStore {
  /**
   * Loads the stored configuration without validating it
   *
   * @returns parsed JSON, or null if nothing is stored
   */
  loadConfig(): Promise<unknown | null>;
}
