export { FsConfigStore, createConfigManager, K7_DIR, CONFIG_FILE } from './fs_config_store';
export type { ProjectEnvironment } from './fs_config_store';
