import { randomInt } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../../domain/index.js';

/** Resolves to <repo>/data/words.json from both src/ and dist/. */
const WORDS_FILE = new URL('../../../data/words.json', import.meta.url);

const wordListSchema = z.array(z.string().regex(/^[a-z]+$/)).min(1);

let cachedWords: readonly string[] | null = null;

function loadWords(): readonly string[] {
  if (cachedWords === null) {
    cachedWords = wordListSchema.parse(JSON.parse(readFileSync(WORDS_FILE, 'utf-8')));
  }
  return cachedWords;
}

export interface GenerateTopicOptions {
  /** Number of words joined with dashes. Defaults to 4. */
  words?: number;
  minLength?: number;
  maxLength?: number;
  /** Word pool; defaults to the bundled list. */
  wordList?: readonly string[];
}

/**
 * Generates a topic name from random words, e.g. `otter-lemon-crane-fudge`.
 *
 * Words are drawn with `crypto.randomInt`. With the default pool and four
 * words there are roughly 10^10 combinations.
 */
export function generateTopic(options: GenerateTopicOptions = {}): string {
  const count = options.words ?? 4;
  const minLength = options.minLength ?? 3;
  const maxLength = options.maxLength ?? 6;

  const pool = (options.wordList ?? loadWords()).filter(
    (word) => word.length >= minLength && word.length <= maxLength,
  );
  if (pool.length === 0 || count < 1) {
    throw new ConfigurationError('Cannot generate a topic: no word fits the requested lengths', {
      words: count,
      minLength,
      maxLength,
    });
  }

  const picked: string[] = [];
  for (let i = 0; i < count; i++) {
    picked.push(pool[randomInt(pool.length)] ?? '');
  }
  return picked.join('-');
}
