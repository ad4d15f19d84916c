export { ConfigSchema, ConfigDefaults, type RawConfig, type Config, type ProviderId, type BackendKind } from './schema.js';
export {
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  expandTilde,
  ConfigError,
  type LoadConfigOptions,
  type LoadConfigResult,
} from './loader.js';
