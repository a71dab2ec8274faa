import { existsSync, mkdirSync, readFileSync, statSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import {
  BUILTIN_MESSAGE_DEFAULTS,
  CONFIG_FILENAME,
  ConflictError,
  NotFoundError,
  defaultConfiguration,
} from '../../domain/index.js';
import type { Configuration, TopicGenerator } from '../../domain/index.js';
import { generateTopic } from '../topics/index.js';
import { parseConfigText, serializeConfig, toConfiguration } from './config-file.js';

/** Read/write access to persisted configuration. */
export interface ConfigStore {
  resolvePath(path?: string): string;
  load(path: string): Configuration;
  write(path: string, configuration: Configuration): void;
}

/**
 * Finds the configuration file path.
 *
 * No path means the current working directory; a directory gets
 * `.ntfy.conf` appended; anything else is used as given.
 */
export function resolveConfigPath(path?: string): string {
  const target = path ?? process.cwd();
  if (existsSync(target) && statSync(target).isDirectory()) {
    return join(target, CONFIG_FILENAME);
  }
  return target;
}

/**
 * Loads configuration from disk.
 *
 * Falls back to the built-in defaults when the file does not exist.
 */
export function loadConfig(path?: string): Configuration {
  const filePath = resolveConfigPath(path);
  if (!existsSync(filePath)) {
    return defaultConfiguration();
  }
  return toConfiguration(parseConfigText(readFileSync(filePath, 'utf-8')), filePath);
}

/** Writes the whole file, creating parent directories as needed. */
export function writeConfig(path: string, configuration: Configuration): void {
  const filePath = resolveConfigPath(path);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, serializeConfig(configuration), 'utf-8');
}

export const fileConfigStore: ConfigStore = {
  resolvePath: resolveConfigPath,
  load: loadConfig,
  write: writeConfig,
};

export interface InitConfigOptions {
  /** Overwrite an existing file. */
  force?: boolean;
  generateTopic?: TopicGenerator;
}

/**
 * Creates a fresh configuration file holding one new topic and the
 * built-in message defaults.
 *
 * @throws ConflictError if the file exists and `force` is not set
 */
export function initConfig(path?: string, options: InitConfigOptions = {}): { path: string; topic: string } {
  const filePath = resolveConfigPath(path);
  if (existsSync(filePath) && !options.force) {
    throw new ConflictError(`Config file already exists at ${filePath}`, { path: filePath });
  }

  const topic = (options.generateTopic ?? generateTopic)();
  writeConfig(filePath, {
    topics: [topic],
    emails: [],
    baseUrls: [],
    defaults: { ...BUILTIN_MESSAGE_DEFAULTS },
  });
  return { path: filePath, topic };
}

/**
 * Deletes the configuration file.
 *
 * @throws NotFoundError if there is no file to delete
 */
export function removeConfig(path?: string): string {
  const filePath = resolveConfigPath(path);
  if (!existsSync(filePath)) {
    throw new NotFoundError(`Config file ${filePath}`, { path: filePath });
  }
  unlinkSync(filePath);
  return filePath;
}
