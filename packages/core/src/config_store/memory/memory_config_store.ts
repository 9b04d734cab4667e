/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { K7Config } from '../../config_manager';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ roleMetadataKey: 'roles' });
 * const manager = new ConfigManager(configStore, {});
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: K7Config | null = null;

  async loadConfig(): Promise<K7Config | null> {
    return this.config;
  }

  async saveConfig(config: K7Config): Promise<void> {
    this.config = config;
  }

  // ==================== Test Helper Methods ====================

  setConfig(config: K7Config | null): void {
    this.config = config;
  }

  getConfig(): K7Config | null {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
