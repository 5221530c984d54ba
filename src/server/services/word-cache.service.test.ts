/**
 * Unit tests for WordCache
 *
 * These tests verify:
 * - pickPhrase() article choice and empty-category handling
 * - insert() trimming, deduplication and concurrent inserts
 * - load() partitioning of store records and malformed-record counting
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  WordCache,
  articleFor,
  parseWordRecord,
} from './word-cache.service';
import type { WordStore } from './word-store.service';
import { RemoteStoreError } from '../utils/errors';

function fakeStore(records: unknown[]): WordStore {
  return {
    scan: vi.fn(async () => records),
    put: vi.fn(async () => undefined),
  };
}

/** Returns the given values in turn, then repeats the last one */
function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)];
}

describe('WordCache', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleWarnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('articleFor()', () => {
    it.each([
      ['awful', 'an'],
      ['Ugly', 'an'],
      ['odious', 'an'],
      ['Icky', 'an'],
      ['enormous', 'an'],
      ['slimy', 'a'],
      ['Rotten', 'a'],
      ['yucky', 'a'],
      ['9-headed', 'a'],
      ['', 'a'],
    ])('should use "%s" → "%s"', (descriptor, article) => {
      expect(articleFor(descriptor)).toBe(article);
    });
  });

  describe('pickPhrase()', () => {
    it('should always yield "an awful jerk" from single-word categories', async () => {
      const cache = new WordCache({ descriptors: ['awful'], subjects: ['jerk'] });

      for (let i = 0; i < 20; i++) {
        await expect(cache.pickPhrase()).resolves.toBe('an awful jerk');
      }
    });

    it('should use "a" before a consonant', async () => {
      const cache = new WordCache({ descriptors: ['slimy'], subjects: ['doorknob'] });
      await expect(cache.pickPhrase()).resolves.toBe('a slimy doorknob');
    });

    it('should draw descriptor and subject independently', async () => {
      const cache = new WordCache(
        { descriptors: ['awful', 'slimy', 'rotten'], subjects: ['jerk', 'doorknob'] },
        sequence(0.99, 0.0)
      );

      await expect(cache.pickPhrase()).resolves.toBe('a rotten jerk');
    });

    it('should pick the middle element for a mid-range draw', async () => {
      const cache = new WordCache(
        { descriptors: ['awful', 'slimy', 'rotten'], subjects: ['jerk', 'doorknob'] },
        sequence(0.5, 0.5)
      );

      await expect(cache.pickPhrase()).resolves.toBe('a slimy doorknob');
    });

    it.each([
      [[], []],
      [['awful'], []],
      [[], ['jerk']],
    ])('should return null when descriptors=%j subjects=%j', async (descriptors, subjects) => {
      const cache = new WordCache({ descriptors, subjects });
      await expect(cache.pickPhrase()).resolves.toBeNull();
    });

    it('should return a phrase when both categories have words', async () => {
      const cache = new WordCache({ descriptors: ['odd'], subjects: ['sock'] });
      await expect(cache.pickPhrase()).resolves.toBe('an odd sock');
    });
  });

  describe('insert()', () => {
    it('should insert once and then report already-present', async () => {
      const cache = new WordCache();

      await expect(cache.insert('descriptor', 'slimy')).resolves.toBe('inserted');
      await expect(cache.insert('descriptor', 'slimy')).resolves.toBe('already-present');
      await expect(cache.words('descriptor')).resolves.toEqual(['slimy']);
    });

    it('should trim before comparing and storing', async () => {
      const cache = new WordCache({ subjects: ['doorknob'] });

      await expect(cache.insert('subject', '  doorknob ')).resolves.toBe('already-present');
      await expect(cache.insert('subject', '  wet sock ')).resolves.toBe('inserted');
      await expect(cache.words('subject')).resolves.toEqual(['doorknob', 'wet sock']);
    });

    it('should compare case-sensitively', async () => {
      const cache = new WordCache({ descriptors: ['Slimy'] });

      await expect(cache.insert('descriptor', 'slimy')).resolves.toBe('inserted');
      await expect(cache.words('descriptor')).resolves.toEqual(['Slimy', 'slimy']);
    });

    it('should allow the same word in both categories', async () => {
      const cache = new WordCache({ descriptors: ['monster'] });

      await expect(cache.insert('subject', 'monster')).resolves.toBe('inserted');
      await expect(cache.words('descriptor')).resolves.toEqual(['monster']);
      await expect(cache.words('subject')).resolves.toEqual(['monster']);
    });

    it('should accept exactly one of many concurrent identical inserts', async () => {
      const cache = new WordCache();

      const results = await Promise.all(
        Array.from({ length: 10 }, () => cache.insert('subject', 'goblin'))
      );

      expect(results.filter(r => r === 'inserted')).toHaveLength(1);
      expect(results.filter(r => r === 'already-present')).toHaveLength(9);
      await expect(cache.words('subject')).resolves.toEqual(['goblin']);
    });

    it('should let readers see either none or all of an insert', async () => {
      const cache = new WordCache({ descriptors: ['awful'] });

      const [before, , after] = await Promise.all([
        cache.pickPhrase(),
        cache.insert('subject', 'jerk'),
        cache.pickPhrase(),
      ]);

      expect(before).toBeNull();
      expect(after).toBe('an awful jerk');
    });
  });

  describe('constructor', () => {
    it('should drop duplicate seed words', async () => {
      const cache = new WordCache({ descriptors: ['awful', 'awful', 'slimy'] });
      await expect(cache.words('descriptor')).resolves.toEqual(['awful', 'slimy']);
    });

    it('should trim seed words before deduplicating', async () => {
      const cache = new WordCache({ subjects: [' jerk', 'jerk ', 'goblin'] });
      await expect(cache.words('subject')).resolves.toEqual(['jerk', 'goblin']);
    });
  });

  describe('load()', () => {
    it('should partition records by category in store order', async () => {
      const store = fakeStore([
        { word: 'awful', category: 'descriptor' },
        { word: 'jerk', category: 'subject' },
        { word: 'slimy', category: 'descriptor' },
        { word: 'doorknob', category: 'subject' },
      ]);

      const cache = await WordCache.load(store);

      expect(store.scan).toHaveBeenCalledTimes(1);
      await expect(cache.words('descriptor')).resolves.toEqual(['awful', 'slimy']);
      await expect(cache.words('subject')).resolves.toEqual(['jerk', 'doorknob']);
      expect(consoleWarnSpy).not.toHaveBeenCalled();
      expect(consoleLogSpy).toHaveBeenCalledWith(
        'WordCache loaded (2 descriptors, 2 subjects)'
      );
    });

    it('should read the legacy isNoun flag', async () => {
      const cache = await WordCache.load(
        fakeStore([
          { word: 'goblin', isNoun: true },
          { word: 'grumpy', isNoun: false },
        ])
      );

      await expect(cache.words('subject')).resolves.toEqual(['goblin']);
      await expect(cache.words('descriptor')).resolves.toEqual(['grumpy']);
    });

    it('should skip malformed records and warn once with the count', async () => {
      const cache = await WordCache.load(
        fakeStore([
          { word: 'awful', category: 'descriptor' },
          null,
          'jerk',
          { word: '', category: 'subject' },
          { word: 42, category: 'subject' },
          { word: 'jerk' },
          { word: 'jerk', category: 'noun' },
          { category: 'subject' },
          { word: 'jerk', category: 'subject' },
        ])
      );

      await expect(cache.words('descriptor')).resolves.toEqual(['awful']);
      await expect(cache.words('subject')).resolves.toEqual(['jerk']);
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(consoleWarnSpy).toHaveBeenCalledWith(
        'Discarding stored insult words: 7 of 9 records were malformed'
      );
    });

    it('should collapse duplicate remote records', async () => {
      const cache = await WordCache.load(
        fakeStore([
          { word: 'jerk', category: 'subject' },
          { word: 'jerk', category: 'subject' },
        ])
      );

      await expect(cache.words('subject')).resolves.toEqual(['jerk']);
    });

    it('should trim padded records so later inserts see them as duplicates', async () => {
      const cache = await WordCache.load(
        fakeStore([
          { word: ' slimy ', category: 'descriptor' },
          { word: 'jerk\t', isNoun: true },
        ])
      );

      await expect(cache.insert('descriptor', 'slimy')).resolves.toBe('already-present');
      await expect(cache.words('descriptor')).resolves.toEqual(['slimy']);
      await expect(cache.pickPhrase()).resolves.toBe('a slimy jerk');
    });

    it('should accept an empty store', async () => {
      const cache = await WordCache.load(fakeStore([]));

      await expect(cache.pickPhrase()).resolves.toBeNull();
    });

    it('should propagate a scan failure', async () => {
      const failure = new RemoteStoreError('scan', new Error('ECONNREFUSED'));
      const store: WordStore = {
        scan: vi.fn(async () => {
          throw failure;
        }),
        put: vi.fn(),
      };

      await expect(WordCache.load(store)).rejects.toBe(failure);
    });
  });

  describe('parseWordRecord()', () => {
    it('should return the word and category for a valid record', () => {
      expect(parseWordRecord({ word: 'Slimy', category: 'descriptor', addedBy: 'U1' })).toEqual({
        word: 'Slimy',
        category: 'descriptor',
      });
    });

    it('should prefer the explicit category over isNoun', () => {
      expect(parseWordRecord({ word: 'troll', category: 'subject', isNoun: false })).toEqual({
        word: 'troll',
        category: 'subject',
      });
    });

    it('should trim the word', () => {
      expect(parseWordRecord({ word: '  rotten ', category: 'descriptor' })).toEqual({
        word: 'rotten',
        category: 'descriptor',
      });
      expect(parseWordRecord({ word: ' goblin', isNoun: true })).toEqual({
        word: 'goblin',
        category: 'subject',
      });
    });

    it('should reject arrays and whitespace-only words', () => {
      expect(parseWordRecord(['awful', 'descriptor'])).toBeNull();
      expect(parseWordRecord({ word: '   ', category: 'descriptor' })).toBeNull();
    });
  });
});
