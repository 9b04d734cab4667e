export { MemoryRunLogStore } from './memory_run_log_store';
