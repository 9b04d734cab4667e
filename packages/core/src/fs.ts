/**
 * Filesystem-dependent implementations
 *
 * Use @k7/core/memory for in-memory alternatives.
 */

// AccountStore
export { FsAccountStore } from './account_store/fs';

// ConfigStore + ConfigManager factory
export {
  FsConfigStore,
  // Factory with explicit projectRoot (for DI containers)
  createConfigManager,
  K7_DIR,
  CONFIG_FILE,
} from './config_store/fs';
export type { ProjectEnvironment } from './config_store/fs';

// RunLogStore
export { FsRunLogStore, RUN_LOG_FILE } from './run_log_store/fs';
