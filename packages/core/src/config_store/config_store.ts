/**
 * ConfigStore Interface
 *
 * Abstraction for config.json persistence (filesystem, memory for tests).
 */

import type { K7Config } from '../config_manager';

/**
 * Implementations:
 * - FsConfigStore: Filesystem-based (.k7/config.json)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /**
   * @returns K7Config or null if not found/invalid
   */
  loadConfig(): Promise<K7Config | null>;

  saveConfig(config: K7Config): Promise<void>;
}
