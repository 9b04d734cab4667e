/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and dry analysis of an archive.
 */

// AccountStore
export { MemoryAccountStore } from './account_store/memory';
export type { FailureRule, MemoryAccountStoreOptions } from './account_store/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// RunLogStore
export { MemoryRunLogStore } from './run_log_store/memory';
