export { FsRunLogStore, RUN_LOG_FILE } from './fs_run_log_store';
