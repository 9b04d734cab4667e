import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FsRunLogStore } from './fs_run_log_store';
import type { PersistedRunLog } from '../../operation_log';

describe('FsRunLogStore', () => {
  let root: string;

  const log: PersistedRunLog = {
    savedAt: '2024-01-01T00:00:00.000Z',
    expiresAt: '2024-01-01T01:00:00.000Z',
    entries: [
      { timestamp: '2024-01-01T00:00:00.000Z', severity: 'INFO_IMPORTANT', message: 'Import started.' },
      { timestamp: '2024-01-01T00:00:01.000Z', severity: 'SUCCESS', message: 'Done.' },
    ],
  };

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'k7-runlog-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should return null when no log file exists', async () => {
    expect(await new FsRunLogStore(root).load()).toBeNull();
  });

  it('should write .k7/last-run.json and read it back', async () => {
    const store = new FsRunLogStore(root);
    await store.save(log);

    const raw = await fs.readFile(path.join(root, '.k7', 'last-run.json'), 'utf-8');
    expect(JSON.parse(raw)).toEqual(log);
    expect(await store.load()).toEqual(log);
  });

  it('should return null for invalid JSON', async () => {
    await fs.mkdir(path.join(root, '.k7'));
    await fs.writeFile(path.join(root, '.k7', 'last-run.json'), '{ invalid json }', 'utf-8');

    expect(await new FsRunLogStore(root).load()).toBeNull();
  });

  it('should drop entries with an unknown severity', async () => {
    await fs.mkdir(path.join(root, '.k7'));
    const stored = {
      ...log,
      entries: [...log.entries, { timestamp: '2024-01-01T00:00:02.000Z', severity: 'LOUD', message: 'x' }],
    };
    await fs.writeFile(path.join(root, '.k7', 'last-run.json'), JSON.stringify(stored), 'utf-8');

    expect(await new FsRunLogStore(root).load()).toEqual(log);
  });

  it('should remove the file on clear and tolerate a second clear', async () => {
    const store = new FsRunLogStore(root);
    await store.save(log);
    await store.clear();
    await store.clear();

    expect(await store.load()).toBeNull();
  });
});
