import type { RunLogStore } from '../run_log_store';
import type { PersistedRunLog } from '../../operation_log/operation_log.types';

/**
 * In-memory RunLogStore for tests.
 */
export class MemoryRunLogStore implements RunLogStore {
  private log: PersistedRunLog | null = null;

  async load(): Promise<PersistedRunLog | null> {
    return this.log;
  }

  async save(log: PersistedRunLog): Promise<void> {
    this.log = log;
  }

  async clear(): Promise<void> {
    this.log = null;
  }

  // ==================== Test Helper Methods ====================

  getLog(): PersistedRunLog | null {
    return this.log;
  }
}
