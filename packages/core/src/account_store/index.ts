// Interface and types. Implementations are exported via subpaths:
// - @k7/core/fs -> FsAccountStore
// - @k7/core/memory -> MemoryAccountStore
export type { AccountStore } from './account_store';
export { AccountStoreError } from './errors';
export type { AccountStoreErrorCode } from './errors';
export { DEFAULT_ROLE_METADATA_KEY } from './account_store.types';
export type {
  AccountId,
  AccountProfile,
  StoredAccount,
  AccountInput,
  AccountPatch,
  AccountStoreOperation,
  AccountStoreCall,
  AccountStoreOptions,
} from './account_store.types';
