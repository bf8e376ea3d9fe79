export {
  DEFAULT_HOME_DIR,
  envSchema,
  loadConfig,
  type TitleCacheConfig,
  type ConfigOverrides,
} from './config.js'
