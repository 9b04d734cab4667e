import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FsAccountStore } from './fs_account_store';
import type { AccountInput } from '../account_store.types';

function input(key: string): AccountInput {
  return {
    key,
    credentialHash: `$hash$${key}`,
    email: `${key}@example.test`,
    url: 'https://example.test',
    niceKey: key,
    displayName: key,
    firstName: '',
    lastName: '',
    description: 'line one\nline two',
    registeredAt: '2024-01-01 00:00:00',
  };
}

describe('FsAccountStore', () => {
  let root: string;
  let accountsDir: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'k7-accounts-'));
    accountsDir = path.join(root, '.k7', 'accounts');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should list nothing when the directory does not exist', async () => {
    expect(await new FsAccountStore(accountsDir).list()).toEqual([]);
  });

  it('should write one <id>.json file per account', async () => {
    const store = new FsAccountStore(accountsDir);
    const id = await store.create(input('alice'));

    const raw = JSON.parse(await fs.readFile(path.join(accountsDir, '1.json'), 'utf-8'));
    expect(id).toBe(1);
    expect(raw).toEqual({
      id: 1,
      key: 'alice',
      credentialHash: '$hash$alice',
      email: 'alice@example.test',
      url: 'https://example.test',
      niceKey: 'alice',
      displayName: 'alice',
      firstName: '',
      lastName: '',
      description: 'line one\nline two',
      registeredAt: '2024-01-01 00:00:00',
      metadata: {},
    });
  });

  it('should allocate the next id after the highest file and list in id order', async () => {
    await fs.mkdir(accountsDir, { recursive: true });
    await fs.writeFile(path.join(accountsDir, '10.json'), JSON.stringify({ key: 'zed' }), 'utf-8');
    await fs.writeFile(path.join(accountsDir, '2.json'), JSON.stringify({ key: 'yan' }), 'utf-8');
    await fs.writeFile(path.join(accountsDir, 'notes.txt'), 'ignored', 'utf-8');
    const store = new FsAccountStore(accountsDir);

    expect(await store.create(input('alice'))).toBe(11);
    expect((await store.list()).map((account) => [account.id, account.key])).toEqual([
      [2, 'yan'],
      [10, 'zed'],
      [11, 'alice'],
    ]);
  });

  it('should find, update and annotate an account', async () => {
    const store = new FsAccountStore(accountsDir, { roleMetadataKey: 'roles' });
    const id = await store.create(input('alice'));

    await store.update(id, { email: 'new@example.test' });
    await store.setMetadata(id, 'roles', { admin: true });
    await store.setMetadata(id, 'nickname', 'al');
    await store.clearRoles(id);

    expect(await store.findByKey('alice')).toMatchObject({
      id: 1,
      email: 'new@example.test',
      credentialHash: '$hash$alice',
      metadata: { roles: {}, nickname: 'al' },
    });
    expect(await store.findByKey('bob')).toBeNull();
  });

  it('should reject a duplicate key', async () => {
    const store = new FsAccountStore(accountsDir);
    await store.create(input('alice'));

    await expect(store.create(input('alice'))).rejects.toMatchObject({ code: 'DUPLICATE_KEY' });
  });

  it('should throw NOT_FOUND when updating a missing account', async () => {
    await expect(new FsAccountStore(accountsDir).update(5, {})).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('should throw READ_FAILED for a corrupt account file', async () => {
    await fs.mkdir(accountsDir, { recursive: true });
    await fs.writeFile(path.join(accountsDir, '1.json'), '{ nope', 'utf-8');

    await expect(new FsAccountStore(accountsDir).list()).rejects.toMatchObject({ code: 'READ_FAILED' });
  });
});
