export {
  resolveConfigPath,
  loadConfig,
  writeConfig,
  initConfig,
  removeConfig,
  fileConfigStore,
  parseConfigText,
  serializeConfig,
} from './config/index.js';
export type { ConfigStore, InitConfigOptions } from './config/index.js';
export { createFetchTransport } from './transport/index.js';
export { generateTopic } from './topics/index.js';
export type { GenerateTopicOptions } from './topics/index.js';
export { createLogger } from './logger.js';
