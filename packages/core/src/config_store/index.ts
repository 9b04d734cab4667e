// Interface only. Implementations are exported via subpaths:
// - @k7/core/fs -> FsConfigStore and factories
// - @k7/core/memory -> MemoryConfigStore
export type { ConfigStore } from './config_store';
