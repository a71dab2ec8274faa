import { describe, it, expect } from 'vitest';
import { generateTopic } from '../../src/infrastructure/topics/topic-generator.js';
import { ConfigurationError } from '../../src/domain/index.js';

describe('generateTopic', () => {
  it('joins four short words with dashes by default', () => {
    const topic = generateTopic();
    const words = topic.split('-');
    expect(words).toHaveLength(4);
    for (const word of words) {
      expect(word).toMatch(/^[a-z]{3,6}$/);
    }
  });

  it('honours the word count', () => {
    expect(generateTopic({ words: 2 }).split('-')).toHaveLength(2);
  });

  it('draws from a custom word list', () => {
    expect(generateTopic({ wordList: ['solo'], words: 3 })).toBe('solo-solo-solo');
  });

  it('filters the pool by length', () => {
    expect(generateTopic({ wordList: ['ab', 'abcd', 'abcdefghij'], words: 1 })).toBe('abcd');
  });

  it('fails when no word fits', () => {
    expect(() => generateTopic({ minLength: 20, maxLength: 30 })).toThrow(ConfigurationError);
  });

  it('produces different topics across calls', () => {
    const topics = new Set(Array.from({ length: 20 }, () => generateTopic()));
    expect(topics.size).toBeGreaterThan(1);
  });
});
