export { MemoryAccountStore } from './memory_account_store';
export type { FailureRule, MemoryAccountStoreOptions } from './memory_account_store';
