export type {
  AppConfig,
  AppConfigInput,
  DerivedConfig,
  ValidatedConfig,
} from './schema';

export { getConfig, loadConfig, resetConfigCache, formatZodError } from './index';
