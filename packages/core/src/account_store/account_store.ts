import type { JsonValue } from '../record_types';
import type { AccountId, AccountInput, AccountPatch, StoredAccount } from './account_store.types';

/**
 * AccountStore - persistence of the accounts an archive is reconciled against
 *
 * Keys are unique. Every operation throws AccountStoreError on failure;
 * `findByKey` returns null when nothing matches.
 *
 * Implementations:
 * - FsAccountStore: one JSON file per account
 * - MemoryAccountStore: in-memory, with a call journal and failure injection for tests
 */
export interface AccountStore {
  findByKey(key: string): Promise<StoredAccount | null>;

  /** @returns the id allocated to the new account */
  create(input: AccountInput): Promise<AccountId>;

  update(id: AccountId, patch: AccountPatch): Promise<void>;

  /** Writes a single metadata key, leaving the others as they are. */
  setMetadata(id: AccountId, key: string, value: JsonValue): Promise<void>;

  /** Empties the account's role set. */
  clearRoles(id: AccountId): Promise<void>;

  /** All accounts, ascending id. */
  list(): Promise<StoredAccount[]>;
}
