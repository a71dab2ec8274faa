export {
  resolveConfigPath,
  loadConfig,
  writeConfig,
  initConfig,
  removeConfig,
  fileConfigStore,
} from './config-store.js';
export type { ConfigStore, InitConfigOptions } from './config-store.js';
export { parseConfigText, toConfiguration, serializeConfig, CONFIG_FILE_HEADER } from './config-file.js';
export type { ConfigSections } from './config-file.js';
