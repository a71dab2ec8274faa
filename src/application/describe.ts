import { DEFAULT_BASE_URL, MESSAGE_DEFAULT_KEYS } from '../domain/index.js';
import type { Configuration } from '../domain/index.js';

/** Human-readable summary of a configuration, one line per fact. */
export function describeConfiguration(configuration: Configuration, confPath: string): string[] {
  const lines: string[] = [];

  if (configuration.topics.length > 0) {
    lines.push(`Will push to topics: ${configuration.topics.join(', ')}`);
  }
  if (configuration.emails.length > 0) {
    lines.push(`Will send emails to: ${configuration.emails.join(', ')}`);
  }
  lines.push(
    configuration.baseUrls.length > 0
      ? `Base URLs: ${configuration.baseUrls.join(', ')}`
      : `Base URLs: ${DEFAULT_BASE_URL} (default)`,
  );
  for (const key of MESSAGE_DEFAULT_KEYS) {
    const value = configuration.defaults[key];
    if (value !== undefined) lines.push(`Default ${key}: ${value}`);
  }
  lines.push(`Configuration file: ${confPath}`);

  return lines;
}
