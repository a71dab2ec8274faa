import type { StringOrList } from './configuration.js';

export interface ToListOptions {
  /** Split string input and list items on commas. Defaults to true. */
  split?: boolean;
}

/**
 * Normalizes a scalar-or-list value into a canonical list.
 *
 * - `undefined` stays `undefined` ("not provided").
 * - An empty string becomes `[]` ("provided, but empty").
 * - Items are trimmed; empty items and repeats are dropped, first occurrence wins.
 */
export function toList(
  value: StringOrList | undefined,
  options: ToListOptions = {},
): string[] | undefined {
  if (value === undefined) return undefined;

  const split = options.split ?? true;
  const given = typeof value === 'string' ? [value] : value;
  const items = split ? given.flatMap((item) => item.split(',')) : given;

  const out: string[] = [];
  for (const raw of items) {
    const item = raw.trim();
    if (item !== '' && !out.includes(item)) out.push(item);
  }
  return out;
}

/** `toList` for base URLs: one trailing slash stripped before repeats are dropped. */
export function toUrlList(value: StringOrList | undefined): string[] | undefined {
  const urls = toList(value)?.map(stripTrailingSlash).filter((url) => url !== '');
  return urls === undefined ? undefined : [...new Set(urls)];
}

export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

/** Strips a single trailing slash. */
export function stripTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

/** `title` → `Title`: the capitalization ntfy documents for its headers. */
export function wireHeaderName(key: string): string {
  return key.charAt(0).toUpperCase() + key.slice(1);
}
