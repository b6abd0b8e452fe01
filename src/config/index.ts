/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `sectionpick config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  LayoutSettingsSchema,
  ThemeSettingsSchema,
  TextSettingsSchema,
  KeySettingsSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  mergeConfig,
  getConfigValue,
  setConfigValue,
  parseConfigValue,
  resetConfig,
  listConfig,
} from './loader.js';

// Paths
export { getAppDir, getConfigPath, APP_DIR_NAME, CONFIG_FILE_NAME, HOME_ENV_VAR } from './paths.js';

// Navigation mapping
export { resolveNavigationConfig } from './resolve.js';
