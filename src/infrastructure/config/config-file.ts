import { ConfigurationError, MESSAGE_DEFAULT_KEYS, toList, toUrlList } from '../../domain/index.js';
import type { Configuration } from '../../domain/index.js';
import { parseMessageDefaults } from '../../application/message-defaults-schema.js';

/** Leading comment block written at the top of every configuration file. */
export const CONFIG_FILE_HEADER: readonly string[] = [
  '# Notification dispatch configuration.',
  '#',
  '# [targets] lists where notifications go. Values are comma separated:',
  '#   topics   = my-secret-topic-1, mysecrettopic2',
  '#   emails   = you@example.com',
  '#   base_url = https://ntfy.sh',
  '#',
  '# [defaults] pre-sets notification fields, one "key = value" per line.',
  '# Allowed keys: title, priority, tags, click, attach, actions, icon.',
  '# See https://ntfy.sh/docs/publish/ for what each one does.',
  '#',
  '# WARNING: a topic works like a password. Anyone who knows it can read',
  '# and publish notifications on it. Keep this file out of version control.',
];

/** Raw `key = value` pairs of the two sections, keys lower-cased. */
export interface ConfigSections {
  targets: Map<string, string>;
  defaults: Map<string, string>;
}

/**
 * Minimal INI reader for the two-section configuration file.
 *
 * Handles only what writeConfig produces plus hand edits of it:
 * `[section]` headers, `key = value` lines, `#`/`;` comment lines.
 * Unknown sections and lines without `=` are skipped.
 */
export function parseConfigText(content: string): ConfigSections {
  const sections: ConfigSections = { targets: new Map(), defaults: new Map() };
  let current: Map<string, string> | undefined;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#') || line.startsWith(';')) continue;

    const header = /^\[(.+)\]$/.exec(line);
    if (header) {
      const name = header[1]?.trim().toLowerCase();
      current = name === 'targets' ? sections.targets : name === 'defaults' ? sections.defaults : undefined;
      continue;
    }

    const eq = line.indexOf('=');
    if (current === undefined || eq === -1) continue;
    current.set(line.slice(0, eq).trim().toLowerCase(), line.slice(eq + 1).trim());
  }

  return sections;
}

/**
 * Turns parsed sections into a Configuration.
 *
 * @param source  file path, used in validation errors
 * @throws ConfigurationError when `[defaults]` holds a key outside the allow-list
 */
export function toConfiguration(sections: ConfigSections, source: string): Configuration {
  return {
    topics: toList(sections.targets.get('topics')) ?? [],
    emails: toList(sections.targets.get('emails')) ?? [],
    baseUrls: toUrlList(sections.targets.get('base_url')) ?? [],
    defaults: parseMessageDefaults(Object.fromEntries(sections.defaults), `defaults in ${source}`),
  };
}

const LINE_BREAK = /[\r\n]/;

function targetLine(key: string, items: readonly string[]): string {
  const bad = items.find((item) => LINE_BREAK.test(item) || item.includes(','));
  if (bad !== undefined) {
    throw new ConfigurationError(`Cannot write ${key} item ${JSON.stringify(bad)}`, { key });
  }
  return `${key} = ${items.join(', ')}`;
}

/**
 * Serializes a Configuration. Empty target lists are left out.
 * @throws ConfigurationError on a value that would not read back as written
 */
export function serializeConfig(configuration: Configuration): string {
  const lines = [...CONFIG_FILE_HEADER, '', '[targets]'];

  if (configuration.topics.length > 0) lines.push(targetLine('topics', configuration.topics));
  if (configuration.emails.length > 0) lines.push(targetLine('emails', configuration.emails));
  if (configuration.baseUrls.length > 0) lines.push(targetLine('base_url', configuration.baseUrls));

  lines.push('', '[defaults]');
  for (const key of MESSAGE_DEFAULT_KEYS) {
    const value = configuration.defaults[key];
    if (value === undefined) continue;
    if (LINE_BREAK.test(value)) {
      throw new ConfigurationError(`Cannot write default ${key}: value contains a line break`, { key });
    }
    lines.push(`${key} = ${value}`);
  }

  return `${lines.join('\n')}\n`;
}
