import { Reconciler, formatRef } from './reconciler';
import { MemoryAccountStore } from '../account_store/memory';
import { OperationLog } from '../operation_log';
import { MemoryRunLogStore } from '../run_log_store/memory';
import type { ArchiveRecord, JsonObject, RecordAttributes } from '../record_types';

function record(
  key: string | undefined,
  options: { credentialHash?: string; metadata?: JsonObject; attributes?: Partial<RecordAttributes> } = {}
): ArchiveRecord {
  const built: ArchiveRecord = {
    attributes: { extra: {}, ...options.attributes },
    metadata: options.metadata ?? {},
  };
  if (key !== undefined) built.key = key;
  if (options.credentialHash !== undefined) built.credentialHash = options.credentialHash;
  return built;
}

describe('Reconciler', () => {
  const now = new Date('2024-06-01T12:00:00.000Z');
  let store: MemoryAccountStore;
  let log: OperationLog;
  let reconciler: Reconciler;

  beforeEach(() => {
    store = new MemoryAccountStore();
    log = new OperationLog({ store: new MemoryRunLogStore(), clock: () => now });
    reconciler = new Reconciler({ store, log, clock: () => now });
  });

  const mutatingCalls = () =>
    store.journal().filter((call) => call.operation !== 'findByKey' && call.operation !== 'list');

  describe('scenarios', () => {
    it('should create a new record against an empty store', async () => {
      const result = await reconciler.apply([record('alice', { credentialHash: 'h' })], { dryRun: false });

      expect(result.summary).toEqual({ created: 1, updated: 0, skipped: 0 });
      expect(result.decisions).toEqual([
        {
          outcome: 'created',
          index: 0,
          key: 'alice',
          ref: { kind: 'real', id: 1 },
          metadataKeys: [],
          metadataErrors: [],
        },
      ]);
    });

    it('should skip a record without credential hash on a real import', async () => {
      const result = await reconciler.apply([record('bob')], { dryRun: false });

      expect(result.summary).toEqual({ created: 0, updated: 0, skipped: 1 });
      expect(result.decisions).toEqual([{ outcome: 'skipped', index: 0, key: 'bob', reason: 'MISSING_CREDENTIAL' }]);
      expect(log.entries()).toEqual([
        {
          timestamp: '2024-06-01T12:00:00.000Z',
          severity: 'WARNING',
          message: 'Entry #1 (bob): skipped, no credential hash in archive.',
        },
      ]);
      expect(mutatingCalls()).toEqual([]);
    });

    it('should accept an empty credential hash that is present in the archive', async () => {
      const result = await reconciler.apply([record('erin', { credentialHash: '' })], { dryRun: false });

      expect(result.summary).toEqual({ created: 1, updated: 0, skipped: 0 });
      expect(store.snapshot()[0]).toMatchObject({ key: 'erin', credentialHash: '' });
    });
  });

  describe('request building', () => {
    it('should apply defaults and sanitizing on create', async () => {
      await reconciler.apply(
        [
          record('  Alice.Smith ', {
            credentialHash: '$hash$',
            attributes: {
              email: ' alice@example.test ',
              url: 'javascript:alert(1)',
              firstName: '<b>Alice</b>',
              description: 'Line one\nLine <i>two</i>',
            },
          }),
        ],
        { dryRun: false }
      );

      expect(store.snapshot()).toEqual([
        {
          id: 1,
          key: 'alice.smith',
          credentialHash: '$hash$',
          email: 'alice@example.test',
          url: '',
          niceKey: 'alice-smith',
          displayName: 'alice.smith',
          firstName: 'Alice',
          lastName: '',
          description: 'Line one\nLine two',
          registeredAt: '2024-06-01 12:00:00',
          metadata: {},
        },
      ]);
    });

    it('should keep an archived registration date', async () => {
      await reconciler.apply(
        [record('alice', { credentialHash: 'h', attributes: { registeredAt: '2020-02-02 02:02:02' } })],
        { dryRun: false }
      );

      expect(store.snapshot()[0]?.registeredAt).toBe('2020-02-02 02:02:02');
    });

    it('should update an existing account in place', async () => {
      await store.create({
        key: 'alice',
        credentialHash: 'old',
        email: 'old@example.test',
        url: '',
        niceKey: 'alice',
        displayName: 'Old Name',
        firstName: '',
        lastName: '',
        description: '',
        registeredAt: '2019-01-01 00:00:00',
      });

      const result = await reconciler.apply(
        [record('ALICE', { credentialHash: 'new', attributes: { displayName: 'Alice' } })],
        { dryRun: false }
      );

      expect(result.summary).toEqual({ created: 0, updated: 1, skipped: 0 });
      expect(store.snapshot()[0]).toMatchObject({
        id: 1,
        credentialHash: 'new',
        displayName: 'Alice',
        email: '',
        registeredAt: '2019-01-01 00:00:00',
      });
    });
  });

  describe('skip accounting', () => {
    it('should skip records without a usable key and never write for them', async () => {
      const result = await reconciler.apply(
        [record(undefined, { credentialHash: 'h' }), record('<b></b>!!', { credentialHash: 'h' })],
        { dryRun: false }
      );

      expect(result.summary).toEqual({ created: 0, updated: 0, skipped: 2 });
      expect(result.decisions.map((decision) => decision.outcome === 'skipped' && decision.reason)).toEqual([
        'MISSING_KEY',
        'MISSING_KEY',
      ]);
      expect(store.journal()).toEqual([]);
      expect(log.entries().map((entry) => entry.message)).toEqual([
        'Entry #1: skipped, missing or invalid key.',
        'Entry #2: skipped, missing or invalid key.',
      ]);
    });

    it('should turn store errors into STORE_ERROR skips and continue', async () => {
      store.failOn({ operation: 'create', key: 'bob', message: 'disk full' });

      const result = await reconciler.apply(
        [
          record('alice', { credentialHash: 'h' }),
          record('bob', { credentialHash: 'h' }),
          record('carol', { credentialHash: 'h' }),
        ],
        { dryRun: false }
      );

      expect(result.summary).toEqual({ created: 2, updated: 0, skipped: 1 });
      expect(result.decisions[1]).toEqual({
        outcome: 'skipped',
        index: 1,
        key: 'bob',
        reason: 'STORE_ERROR',
        detail: 'disk full',
      });
      expect(log.entries().filter((entry) => entry.severity === 'ERROR').map((entry) => entry.message)).toEqual([
        'Entry #2 (bob): error creating account: disk full',
      ]);
      expect(store.snapshot().map((account) => account.key)).toEqual(['alice', 'carol']);
    });

    it('should treat a failing lookup as a store error', async () => {
      store.failOn({ operation: 'findByKey', key: 'alice', message: 'connection lost' });

      const result = await reconciler.apply([record('alice', { credentialHash: 'h' })], { dryRun: false });

      expect(result.decisions[0]).toMatchObject({ outcome: 'skipped', reason: 'STORE_ERROR', detail: 'connection lost' });
    });
  });

  describe('metadata', () => {
    it('should replace roles and merge other metadata keys', async () => {
      const id = await store.create({
        key: 'alice',
        email: '',
        url: '',
        niceKey: 'alice',
        displayName: 'alice',
        firstName: '',
        lastName: '',
        description: '',
        registeredAt: '2019-01-01 00:00:00',
      });
      await store.setMetadata(id, 'capabilities', { administrator: true });
      await store.setMetadata(id, 'nickname', 'al');
      store.clearJournal();

      const result = await reconciler.apply(
        [record('alice', { credentialHash: 'h', metadata: { capabilities: { editor: true } } })],
        { dryRun: false }
      );

      expect(store.snapshot()[0]?.metadata).toEqual({ capabilities: { editor: true }, nickname: 'al' });
      expect(mutatingCalls().map((call) => call.operation)).toEqual(['update', 'clearRoles', 'setMetadata']);
      expect(result.decisions[0]).toMatchObject({ metadataKeys: ['capabilities'], metadataErrors: [] });
    });

    it('should not clear roles when the record carries no role key', async () => {
      await reconciler.apply([record('alice', { credentialHash: 'h', metadata: { nickname: 'al' } })], {
        dryRun: false,
      });

      expect(mutatingCalls().map((call) => call.operation)).toEqual(['create', 'setMetadata']);
    });

    it('should honour a custom role key', async () => {
      const custom = new Reconciler({ store, log, clock: () => now, roleMetadataKey: 'roles' });

      await custom.apply([record('alice', { credentialHash: 'h', metadata: { roles: ['editor'] } })], {
        dryRun: false,
      });

      expect(mutatingCalls().map((call) => call.operation)).toEqual(['create', 'clearRoles', 'setMetadata']);
    });

    it('should record metadata failures without changing the outcome', async () => {
      store.failOn({ operation: 'setMetadata', metaKey: 'nickname', message: 'too long' });

      const result = await reconciler.apply(
        [record('alice', { credentialHash: 'h', metadata: { nickname: 'al', locale: 'fr' } })],
        { dryRun: false }
      );

      expect(result.summary).toEqual({ created: 1, updated: 0, skipped: 0 });
      expect(result.decisions[0]).toMatchObject({
        outcome: 'created',
        metadataKeys: ['locale'],
        metadataErrors: [{ key: 'nickname', detail: 'too long' }],
      });
      expect(log.entries().some((entry) =>
        entry.severity === 'ERROR' && entry.message === 'Entry #1 (alice): error setting metadata "nickname": too long'
      )).toBe(true);
    });

    it('should store a __proto__ metadata key as an own entry', async () => {
      const metadata: JsonObject = JSON.parse('{"__proto__":{"level":3},"nick":"a"}');

      const result = await reconciler.apply([record('alice', { credentialHash: 'h', metadata })], { dryRun: false });

      expect(result.decisions[0]).toMatchObject({ metadataKeys: ['__proto__', 'nick'], metadataErrors: [] });
      const stored = store.snapshot()[0]?.metadata ?? {};
      expect(Object.keys(stored)).toEqual(['__proto__', 'nick']);
      expect(JSON.stringify(stored)).toBe('{"__proto__":{"level":3},"nick":"a"}');
    });
  });

  describe('dry run', () => {
    it('should decide everything without writing to the store', async () => {
      await store.create({
        key: 'alice',
        credentialHash: 'h',
        email: '',
        url: '',
        niceKey: 'alice',
        displayName: 'alice',
        firstName: '',
        lastName: '',
        description: '',
        registeredAt: '2019-01-01 00:00:00',
      });
      const before = store.snapshot();
      store.clearJournal();

      const result = await reconciler.apply(
        [
          record('alice', { credentialHash: 'h', metadata: { capabilities: { editor: true } } }),
          record('bob', { metadata: { nickname: 'b' } }),
          record('carol', { credentialHash: 'h' }),
        ],
        { dryRun: true }
      );

      expect(result.summary).toEqual({ created: 2, updated: 1, skipped: 0 });
      expect(result.decisions.map((decision) => decision.outcome !== 'skipped' && decision.ref)).toEqual([
        { kind: 'real', id: 1 },
        { kind: 'pending', sequence: 1 },
        { kind: 'pending', sequence: 2 },
      ]);
      expect(result.decisions[0]).toMatchObject({ metadataKeys: ['capabilities'] });
      expect(mutatingCalls()).toEqual([]);
      expect(store.snapshot()).toEqual(before);
      expect(log.entries().map((entry) => entry.message)).toEqual([
        'Entry #1 (alice): [dry run] would update ID 1.',
        'Entry #1 (alice): [dry run] would clear roles of ID 1.',
        'Entry #1 (alice): [dry run] would set metadata "capabilities".',
        'Entry #2 (bob): [dry run] would create a new account as pending #1.',
        'Entry #2 (bob): [dry run] would set metadata "nickname".',
        'Entry #3 (carol): [dry run] would create a new account as pending #2.',
      ]);
    });

    it('should report a repeated new key as an update of the pending account', async () => {
      const archive = [record('dave', { credentialHash: 'h1' }), record('Dave', { credentialHash: 'h2' })];

      const dry = await reconciler.apply(archive, { dryRun: true });

      expect(dry.summary).toEqual({ created: 1, updated: 1, skipped: 0 });
      expect(dry.decisions.map((decision) => decision.outcome !== 'skipped' && decision.ref)).toEqual([
        { kind: 'pending', sequence: 1 },
        { kind: 'pending', sequence: 1 },
      ]);
      expect(log.entries().map((entry) => entry.message)).toEqual([
        'Entry #1 (dave): [dry run] would create a new account as pending #1.',
        'Entry #2 (dave): [dry run] would update pending #1.',
      ]);

      const real = await reconciler.apply(archive, { dryRun: false });
      expect(real.summary).toEqual(dry.summary);
    });

    it('should still skip records without a key', async () => {
      const result = await reconciler.apply([record('')], { dryRun: true });

      expect(result.summary).toEqual({ created: 0, updated: 0, skipped: 1 });
    });
  });

  describe('idempotent re-import', () => {
    it('should only update on the second pass and leave the store unchanged', async () => {
      const archive = [
        record('alice', { credentialHash: 'h1', metadata: { capabilities: { editor: true }, nickname: 'al' } }),
        record('bob', { credentialHash: 'h2', attributes: { email: 'bob@example.test' } }),
        record(undefined, { credentialHash: 'h3' }),
      ];

      const first = await reconciler.apply(archive, { dryRun: false });
      const afterFirst = store.snapshot();
      const second = await reconciler.apply(archive, { dryRun: false });

      expect(first.summary).toEqual({ created: 2, updated: 0, skipped: 1 });
      expect(second.summary).toEqual({ created: 0, updated: 2, skipped: 1 });
      expect(store.snapshot()).toEqual(afterFirst);
    });
  });

  describe('formatRef', () => {
    it('should render real and pending references', () => {
      expect(formatRef({ kind: 'real', id: 12 })).toBe('ID 12');
      expect(formatRef({ kind: 'pending', sequence: 1 })).toBe('pending #1');
    });
  });
});
