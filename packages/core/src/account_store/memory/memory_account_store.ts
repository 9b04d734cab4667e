import type { AccountStore } from '../account_store';
import type {
  AccountId,
  AccountInput,
  AccountPatch,
  AccountStoreCall,
  AccountStoreOperation,
  AccountStoreOptions,
  StoredAccount,
} from '../account_store.types';
import { DEFAULT_ROLE_METADATA_KEY } from '../account_store.types';
import { AccountStoreError } from '../errors';
import { applyPatch, buildStoredAccount } from '../account_builders';
import type { JsonValue } from '../../record_types';
import { setOwnProperty } from '../../record_types';

/**
 * Which calls an injected failure applies to. Omitted fields match anything.
 */
export type FailureRule = {
  operation: Exclude<AccountStoreOperation, 'list'>;
  key?: string;
  id?: AccountId;
  metaKey?: string;
  message?: string;
};

export type MemoryAccountStoreOptions = AccountStoreOptions & {
  /** Initial accounts; ids are kept and new ids continue after the highest */
  initial?: StoredAccount[];
};

/**
 * MemoryAccountStore - In-memory implementation of AccountStore
 *
 * Ids are allocated from 1. Values are cloned on the way in and out.
 * Every call is recorded in a journal, and failures can be injected per
 * operation, for assertions in reconciler and transfer tests.
 *
 * @example
 * ```typescript
 * const store = new MemoryAccountStore();
 * store.failOn({ operation: 'create', key: 'bob' });
 * // ... run an import
 * expect(store.journal().filter((call) => call.operation === 'create')).toHaveLength(2);
 * ```
 */
export class MemoryAccountStore implements AccountStore {
  private readonly accounts = new Map<AccountId, StoredAccount>();
  private readonly calls: AccountStoreCall[] = [];
  private failures: FailureRule[] = [];
  private nextId = 1;
  private readonly roleMetadataKey: string;

  constructor(options: MemoryAccountStoreOptions = {}) {
    this.roleMetadataKey = options.roleMetadataKey ?? DEFAULT_ROLE_METADATA_KEY;
    for (const account of options.initial ?? []) {
      this.accounts.set(account.id, structuredClone(account));
      this.nextId = Math.max(this.nextId, account.id + 1);
    }
  }

  async findByKey(key: string): Promise<StoredAccount | null> {
    this.calls.push({ operation: 'findByKey', key });
    this.throwIfInjected({ operation: 'findByKey', key });
    for (const account of this.accounts.values()) {
      if (account.key === key) {
        return structuredClone(account);
      }
    }
    return null;
  }

  async create(input: AccountInput): Promise<AccountId> {
    this.calls.push({ operation: 'create', key: input.key });
    this.throwIfInjected({ operation: 'create', key: input.key });
    for (const account of this.accounts.values()) {
      if (account.key === input.key) {
        throw new AccountStoreError(`An account with key "${input.key}" already exists`, 'DUPLICATE_KEY');
      }
    }
    const id = this.nextId++;
    this.accounts.set(id, buildStoredAccount(id, structuredClone(input)));
    return id;
  }

  async update(id: AccountId, patch: AccountPatch): Promise<void> {
    this.calls.push({ operation: 'update', id });
    this.throwIfInjected({ operation: 'update', id });
    this.accounts.set(id, applyPatch(this.require(id), structuredClone(patch)));
  }

  async setMetadata(id: AccountId, key: string, value: JsonValue): Promise<void> {
    this.calls.push({ operation: 'setMetadata', id, metaKey: key, value: structuredClone(value) });
    this.throwIfInjected({ operation: 'setMetadata', id, metaKey: key });
    const account = this.require(id);
    setOwnProperty(account.metadata, key, structuredClone(value));
  }

  async clearRoles(id: AccountId): Promise<void> {
    this.calls.push({ operation: 'clearRoles', id });
    this.throwIfInjected({ operation: 'clearRoles', id });
    const account = this.require(id);
    setOwnProperty(account.metadata, this.roleMetadataKey, {});
  }

  async list(): Promise<StoredAccount[]> {
    this.calls.push({ operation: 'list' });
    return [...this.accounts.values()]
      .sort((a, b) => a.id - b.id)
      .map((account) => structuredClone(account));
  }

  // ==================== Test Helper Methods ====================

  /** Makes every matching call throw AccountStoreError until cleared. */
  failOn(rule: FailureRule): void {
    this.failures.push(rule);
  }

  clearFailures(): void {
    this.failures = [];
  }

  /** Calls received so far, in order. */
  journal(): AccountStoreCall[] {
    return structuredClone(this.calls);
  }

  clearJournal(): void {
    this.calls.length = 0;
  }

  /** Synchronous snapshot of all accounts, ascending id. */
  snapshot(): StoredAccount[] {
    return [...this.accounts.values()]
      .sort((a, b) => a.id - b.id)
      .map((account) => structuredClone(account));
  }

  size(): number {
    return this.accounts.size;
  }

  private require(id: AccountId): StoredAccount {
    const account = this.accounts.get(id);
    if (!account) {
      throw new AccountStoreError(`Account ${id} does not exist`, 'NOT_FOUND');
    }
    return account;
  }

  private throwIfInjected(call: Omit<FailureRule, 'message'>): void {
    const rule = this.failures.find((candidate) =>
      candidate.operation === call.operation
      && (candidate.key === undefined || candidate.key === call.key)
      && (candidate.id === undefined || candidate.id === call.id)
      && (candidate.metaKey === undefined || candidate.metaKey === call.metaKey)
    );
    if (rule) {
      throw new AccountStoreError(
        rule.message ?? `Injected ${call.operation} failure`,
        call.operation === 'findByKey' ? 'READ_FAILED' : 'WRITE_FAILED'
      );
    }
  }
}
