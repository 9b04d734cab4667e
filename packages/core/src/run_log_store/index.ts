// Interface only. Implementations are exported via subpaths:
// - @k7/core/fs -> FsRunLogStore
// - @k7/core/memory -> MemoryRunLogStore
export type { RunLogStore } from './run_log_store';
