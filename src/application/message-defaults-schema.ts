import { z } from 'zod';
import type { ZodError } from 'zod';
import {
  ConfigurationError,
  MESSAGE_DEFAULT_KEYS,
  isMessageDefaultKey,
} from '../domain/index.js';
import type { MessageDefaultKey, MessageDefaults } from '../domain/index.js';

/** Every stored value is one line of the configuration file. */
const singleLine = z.string().regex(/^[^\r\n]*$/, 'must not contain line breaks');

/** Priority may be given as ntfy's number (1-5) or its name; stored as text. */
const priority = z.union([singleLine, z.number().finite()]).transform((v) => String(v));

/** Tags and actions accept a list; stored comma-joined, as in the config file. */
const joinable = z
  .union([singleLine, z.array(singleLine)])
  .transform((v) => (typeof v === 'string' ? v : v.join(',')));

/**
 * Zod schema for the message-defaults map.
 *
 * `.strict()` rejects any key outside the allow-list, so the same schema
 * guards the constructor, `updateMessageDefaults` and config file loading.
 */
export const messageDefaultsSchema = z
  .object({
    title: singleLine.optional(),
    priority: priority.optional(),
    tags: joinable.optional(),
    click: singleLine.optional(),
    attach: singleLine.optional(),
    actions: joinable.optional(),
    icon: singleLine.optional(),
  })
  .strict();

export type MessageDefaultsInput = z.input<typeof messageDefaultsSchema>;

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.code === 'unrecognized_keys'
        ? `unknown key(s) ${issue.keys.map((k) => `"${k}"`).join(', ')}; allowed: ${MESSAGE_DEFAULT_KEYS.join(', ')}`
        : `${issue.path.join('.')}: ${issue.message}`,
    )
    .join('; ');
}

/**
 * Validates an open map of message defaults.
 * Unset and blank values are dropped from the result.
 *
 * @param source  where the map came from, used in the error message
 * @throws ConfigurationError on an unknown key or a value of the wrong type
 */
export function parseMessageDefaults(input: unknown, source = 'message defaults'): MessageDefaults {
  const result = messageDefaultsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${source}: ${formatIssues(result.error)}`, {
      issues: result.error.issues,
    });
  }

  const out: MessageDefaults = {};
  for (const key of MESSAGE_DEFAULT_KEYS) {
    const value = result.data[key];
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

const targetItem = z
  .string()
  .regex(/^[^\r\n,]*$/, 'must not contain line breaks or commas');

/**
 * Checks normalized topics, emails or base URLs before they are stored.
 *
 * @param label  what the items are, used in the error message
 * @throws ConfigurationError when an item could not be written to one file line
 */
export function parseTargetItems(items: readonly string[], label: string): string[] {
  const result = z.array(targetItem).safeParse(items);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${label}: ${formatIssues(result.error)}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

/** Checks a list of keys against the allow-list. */
export function parseMessageDefaultKeys(keys: readonly string[]): MessageDefaultKey[] {
  const unknown = keys.filter((key) => !isMessageDefaultKey(key));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Unknown message default key(s): ${unknown.join(', ')}; allowed: ${MESSAGE_DEFAULT_KEYS.join(', ')}`,
      { keys: unknown },
    );
  }
  return keys.filter(isMessageDefaultKey);
}
