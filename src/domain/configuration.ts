/**
 * Core types for the dispatcher configuration.
 *
 * These types carry no framework dependencies. Validation of the open
 * message-defaults map lives in the application layer.
 */

/** A parameter that accepts either one value or several. */
export type StringOrList = string | readonly string[];

/** Notification fields that may be pre-set in configuration. */
export const MESSAGE_DEFAULT_KEYS = [
  'title',
  'priority',
  'tags',
  'click',
  'attach',
  'actions',
  'icon',
] as const;

export type MessageDefaultKey = (typeof MESSAGE_DEFAULT_KEYS)[number];

/** Stored message defaults. Values are kept in their persisted (string) form. */
export type MessageDefaults = Partial<Record<MessageDefaultKey, string>>;

/**
 * The merged configuration a dispatcher owns.
 *
 * `baseUrls` may be empty: requests then go to DEFAULT_BASE_URL.
 */
export interface Configuration {
  topics: string[];
  emails: string[];
  baseUrls: string[];
  defaults: MessageDefaults;
}

export const DEFAULT_BASE_URL = 'https://ntfy.sh';

export const CONFIG_FILENAME = '.ntfy.conf';

export const DEFAULT_ICON_URL =
  'https://raw.githubusercontent.com/vict0rsch/ntfy-wrapper/main/assets/logo.png';

/** Message defaults used when no configuration file exists yet. */
export const BUILTIN_MESSAGE_DEFAULTS: Readonly<MessageDefaults> = {
  title: 'Message from ntfy-wrapper',
  tags: 'fire',
  icon: DEFAULT_ICON_URL,
};

export function isMessageDefaultKey(key: string): key is MessageDefaultKey {
  return (MESSAGE_DEFAULT_KEYS as readonly string[]).includes(key);
}

/** Returns a fresh configuration holding only the built-in defaults. */
export function defaultConfiguration(): Configuration {
  return {
    topics: [],
    emails: [],
    baseUrls: [],
    defaults: { ...BUILTIN_MESSAGE_DEFAULTS },
  };
}

/** Deep-enough copy: every list and the defaults map are new objects. */
export function cloneConfiguration(configuration: Configuration): Configuration {
  return {
    topics: [...configuration.topics],
    emails: [...configuration.emails],
    baseUrls: [...configuration.baseUrls],
    defaults: { ...configuration.defaults },
  };
}
