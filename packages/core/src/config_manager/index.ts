export { ConfigManager, DEFAULT_CONFIG } from './config_manager';
export type {
  K7Config,
  ResolvedK7Config,
  K7Environment,
  IConfigManager,
} from './config_manager.types';
