/**
 * FsAccountStore - Filesystem implementation of AccountStore
 *
 * One JSON file per account, `<id>.json`, in the accounts directory
 * (`.k7/accounts` by default). Ids are allocated as the highest existing
 * id plus one. Not safe for concurrent writers.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { AccountStore } from '../account_store';
import type {
  AccountId,
  AccountInput,
  AccountPatch,
  AccountStoreOptions,
  StoredAccount,
} from '../account_store.types';
import { DEFAULT_ROLE_METADATA_KEY } from '../account_store.types';
import { AccountStoreError } from '../errors';
import { applyPatch, buildStoredAccount } from '../account_builders';
import { isJsonObject, setOwnProperty } from '../../record_types';
import type { JsonValue } from '../../record_types';

const ACCOUNT_FILE = /^(\d+)\.json$/;

const PROFILE_FIELDS = [
  'email',
  'url',
  'niceKey',
  'displayName',
  'firstName',
  'lastName',
  'description',
  'registeredAt',
] as const;

export class FsAccountStore implements AccountStore {
  private readonly accountsDir: string;
  private readonly roleMetadataKey: string;

  constructor(accountsDir: string, options: AccountStoreOptions = {}) {
    this.accountsDir = accountsDir;
    this.roleMetadataKey = options.roleMetadataKey ?? DEFAULT_ROLE_METADATA_KEY;
  }

  async findByKey(key: string): Promise<StoredAccount | null> {
    const accounts = await this.list();
    return accounts.find((account) => account.key === key) ?? null;
  }

  async create(input: AccountInput): Promise<AccountId> {
    const accounts = await this.list();
    if (accounts.some((account) => account.key === input.key)) {
      throw new AccountStoreError(`An account with key "${input.key}" already exists`, 'DUPLICATE_KEY');
    }
    const id = accounts.reduce((max, account) => Math.max(max, account.id), 0) + 1;
    await this.write(buildStoredAccount(id, input));
    return id;
  }

  async update(id: AccountId, patch: AccountPatch): Promise<void> {
    const account = await this.read(id);
    await this.write(applyPatch(account, patch));
  }

  async setMetadata(id: AccountId, key: string, value: JsonValue): Promise<void> {
    const account = await this.read(id);
    setOwnProperty(account.metadata, key, value);
    await this.write(account);
  }

  async clearRoles(id: AccountId): Promise<void> {
    const account = await this.read(id);
    setOwnProperty(account.metadata, this.roleMetadataKey, {});
    await this.write(account);
  }

  async list(): Promise<StoredAccount[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.accountsDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new AccountStoreError(`Cannot read accounts directory ${this.accountsDir}`, 'READ_FAILED', { cause: error });
    }

    const ids = names
      .map((name) => ACCOUNT_FILE.exec(name)?.[1])
      .filter((id): id is string => id !== undefined)
      .map(Number)
      .sort((a, b) => a - b);

    const accounts: StoredAccount[] = [];
    for (const id of ids) {
      accounts.push(await this.read(id));
    }
    return accounts;
  }

  private filePath(id: AccountId): string {
    return path.join(this.accountsDir, `${id}.json`);
  }

  private async read(id: AccountId): Promise<StoredAccount> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath(id), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new AccountStoreError(`Account ${id} does not exist`, 'NOT_FOUND', { cause: error });
      }
      throw new AccountStoreError(`Cannot read account ${id}`, 'READ_FAILED', { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new AccountStoreError(`Account file ${id}.json is not valid JSON`, 'READ_FAILED', { cause: error });
    }
    const account = toStoredAccount(id, parsed);
    if (!account) {
      throw new AccountStoreError(`Account file ${id}.json has an unexpected shape`, 'READ_FAILED');
    }
    return account;
  }

  private async write(account: StoredAccount): Promise<void> {
    try {
      await fs.mkdir(this.accountsDir, { recursive: true });
      await fs.writeFile(this.filePath(account.id), JSON.stringify(account, null, 2), 'utf-8');
    } catch (error) {
      throw new AccountStoreError(`Cannot write account ${account.id}`, 'WRITE_FAILED', { cause: error });
    }
  }
}

function toStoredAccount(id: AccountId, value: unknown): StoredAccount | null {
  if (!isJsonObject(value)) return null;
  const key = value['key'];
  if (typeof key !== 'string') return null;

  const text = (name: string): string => {
    const field = value[name];
    return typeof field === 'string' ? field : '';
  };
  const metadata = value['metadata'];

  const account: StoredAccount = {
    id,
    key,
    credentialHash: text('credentialHash'),
    email: '',
    url: '',
    niceKey: '',
    displayName: '',
    firstName: '',
    lastName: '',
    description: '',
    registeredAt: '',
    metadata: isJsonObject(metadata) ? metadata : {},
  };
  for (const name of PROFILE_FIELDS) {
    account[name] = text(name);
  }
  return account;
}

function isNotFound(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}
