/**
 * Configuration module exports
 */
export { getConfigDir } from './config-paths.js';

export {
  type ImageChatRuntimeConfig,
  type ImageChatConfigFile,
  ConfigValidationError,
  CONFIG_SCHEMA,
  DEFAULT_MODEL,
  DEFAULT_BASE_URL,
  DEFAULT_GENERATION_TIMEOUT_MS,
  DEFAULT_CONTEXT_WINDOW,
  getRuntimeConfigPath,
  getDefaultDatabaseUrl,
  defaultRuntimeConfig,
  validateConfigFile,
  loadConfigFile,
  applyEnvironment,
  loadRuntimeConfig,
  resolveDatabasePath,
} from './runtime-config.js';
