import type { PersistedRunLog } from '../operation_log/operation_log.types';

/**
 * Persistence for the log of the last export/import run.
 *
 * Holds a single log: `save` replaces the previous one.
 *
 * Implementations:
 * - FsRunLogStore: `.k7/last-run.json`
 * - MemoryRunLogStore: in-memory for tests
 */
export interface RunLogStore {
  /** Persisted log, or null if none exists or it cannot be read */
  load(): Promise<PersistedRunLog | null>;
  save(log: PersistedRunLog): Promise<void>;
  clear(): Promise<void>;
}
