export { loadConfig, normalizeConfig, applyEnvOverrides } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
export {
  CONFIG_ENV,
  CONFIG_FILE_NAME,
  PLUGIN_PATH_ENV,
  STRICT_ENV,
  defaultConfig,
} from './types.js';
export type { AttachkitConfig, LoadedConfig } from './types.js';
