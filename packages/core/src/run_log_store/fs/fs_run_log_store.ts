/**
 * FsRunLogStore - Filesystem implementation of RunLogStore
 *
 * Stores the last run's log in `.k7/last-run.json`.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { RunLogStore } from '../run_log_store';
import type { LogEntry, PersistedRunLog } from '../../operation_log/operation_log.types';
import { LOG_SEVERITIES } from '../../operation_log/operation_log.types';
import { isJsonObject } from '../../record_types';

export const RUN_LOG_FILE = 'last-run.json';

export class FsRunLogStore implements RunLogStore {
  private readonly logPath: string;

  constructor(projectRootPath: string) {
    this.logPath = path.join(projectRootPath, '.k7', RUN_LOG_FILE);
  }

  /**
   * Returns null for a missing file or one that does not hold a run log.
   */
  async load(): Promise<PersistedRunLog | null> {
    let content: string;
    try {
      content = await fs.readFile(this.logPath, 'utf-8');
    } catch {
      return null;
    }
    try {
      return toPersistedRunLog(JSON.parse(content));
    } catch {
      return null;
    }
  }

  async save(log: PersistedRunLog): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    await fs.writeFile(this.logPath, JSON.stringify(log, null, 2), 'utf-8');
  }

  async clear(): Promise<void> {
    await fs.rm(this.logPath, { force: true });
  }
}

function toPersistedRunLog(value: unknown): PersistedRunLog | null {
  if (!isJsonObject(value)) return null;
  const savedAt = value['savedAt'];
  const expiresAt = value['expiresAt'];
  const entries = value['entries'];
  if (typeof savedAt !== 'string' || typeof expiresAt !== 'string' || !Array.isArray(entries)) {
    return null;
  }

  const parsed: LogEntry[] = [];
  for (const entry of entries) {
    if (!isJsonObject(entry)) continue;
    const timestamp = entry['timestamp'];
    const severity = LOG_SEVERITIES.find((known) => known === entry['severity']);
    const message = entry['message'];
    if (typeof timestamp === 'string' && severity && typeof message === 'string') {
      parsed.push({ timestamp, severity, message });
    }
  }
  return { savedAt, expiresAt, entries: parsed };
}
