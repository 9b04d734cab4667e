/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Handles persistence of `.k7/config.json` and locates the project root.
 */

import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import type { K7Config, K7Environment } from '../../config_manager';
import { ConfigManager } from '../../config_manager';
import { isJsonObject } from '../../record_types';

export const K7_DIR = '.k7';
export const CONFIG_FILE = 'config.json';

/** Environment read when locating the project root. */
export type ProjectEnvironment = K7Environment & {
  K7_HOME?: string | undefined;
};

/**
 * Filesystem-based ConfigStore implementation.
 *
 * Fail-safe: a missing or unreadable file loads as null. Fields of the wrong
 * type are ignored so their defaults apply.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/project');
 * const config = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(projectRootPath: string) {
    this.configPath = path.join(projectRootPath, K7_DIR, CONFIG_FILE);
  }

  async loadConfig(): Promise<K7Config | null> {
    try {
      const content = await fs.readFile(this.configPath, 'utf-8');
      return toK7Config(JSON.parse(content));
    } catch {
      return null;
    }
  }

  async saveConfig(config: K7Config): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }

  // ==================== Static Utility Methods ====================

  /**
   * Searches upwards from `startPath` for a directory containing `.k7`.
   *
   * @returns Absolute path of that directory, or null if none is found
   */
  static findK7Root(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);
    while (true) {
      if (existsSync(path.join(currentPath, K7_DIR))) {
        return currentPath;
      }
      const parent = path.dirname(currentPath);
      if (parent === currentPath) {
        return null;
      }
      currentPath = parent;
    }
  }

  /**
   * Project root: `K7_HOME` when set, else the nearest directory holding
   * `.k7`, else `cwd`.
   */
  static resolveProjectRoot(env: ProjectEnvironment = process.env, cwd: string = process.cwd()): string {
    if (env.K7_HOME) {
      return path.resolve(env.K7_HOME);
    }
    return FsConfigStore.findK7Root(cwd) ?? cwd;
  }
}

function toK7Config(value: unknown): K7Config | null {
  if (!isJsonObject(value)) return null;
  const config: K7Config = {};

  const password = value['encryptionPassword'];
  if (typeof password === 'string') config.encryptionPassword = password;
  const roleKey = value['roleMetadataKey'];
  if (typeof roleKey === 'string') config.roleMetadataKey = roleKey;
  const maxBytes = value['maxArchiveBytes'];
  if (typeof maxBytes === 'number') config.maxArchiveBytes = maxBytes;
  const retention = value['logRetentionSeconds'];
  if (typeof retention === 'number') config.logRetentionSeconds = retention;
  const accountsDir = value['accountsDir'];
  if (typeof accountsDir === 'string') config.accountsDir = accountsDir;

  return config;
}

/**
 * Create a ConfigManager backed by `.k7/config.json` of the given project.
 *
 * @param projectRoot - Optional project root path (resolved if not provided)
 */
export function createConfigManager(projectRoot?: string, env: ProjectEnvironment = process.env): ConfigManager {
  const resolvedRoot = projectRoot || FsConfigStore.resolveProjectRoot(env);
  return new ConfigManager(new FsConfigStore(resolvedRoot), env);
}
