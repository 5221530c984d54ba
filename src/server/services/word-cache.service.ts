/**
 * Word Cache Service - In-Memory Descriptors and Subjects
 *
 * Holds the two word categories used to build insults. The cache is loaded
 * once from the WordStore and afterwards only grows through `insert`.
 *
 * Concurrency:
 * - pickPhrase() takes the shared (read) lock; readers never block each other
 * - insert() takes the exclusive (write) lock for its check-then-append, so
 *   two concurrent inserts of the same word yield exactly one 'inserted'
 *
 * @example
 * ```typescript
 * const cache = await WordCache.load(store);
 * await cache.insert('descriptor', 'slimy'); // 'inserted'
 * await cache.insert('descriptor', 'slimy'); // 'already-present'
 * await cache.pickPhrase();                  // 'a slimy doorknob'
 * ```
 */

import { ReadWriteLock } from '../utils/rw-lock';
import { isDebugEnabled } from '../utils/config';
import type { WordStore } from './word-store.service';
import type {
  InsertResult,
  ParsedWord,
  WordCategory,
} from '../types/word.types';

const VOWELS = new Set(['a', 'e', 'i', 'o', 'u']);

/**
 * Source of uniform random indices. Defaults to Math.random.
 */
export type RandomSource = () => number;

export interface WordCacheLoadResult {
  words: ParsedWord[];
  discarded: number;
}

/**
 * Validates one loosely typed store record.
 *
 * Accepts the explicit `category` field and the older boolean `isNoun` flag.
 * Returns null when the record lacks a non-empty string word or a
 * recognizable category.
 */
export function parseWordRecord(record: unknown): ParsedWord | null {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    return null;
  }

  const word = 'word' in record ? record.word : undefined;
  if (typeof word !== 'string' || word.trim().length === 0) {
    return null;
  }

  const category = 'category' in record ? record.category : undefined;
  if (category === 'descriptor' || category === 'subject') {
    return { word: word.trim(), category };
  }

  const isNoun = 'isNoun' in record ? record.isNoun : undefined;
  if (typeof isNoun === 'boolean') {
    return { word: word.trim(), category: isNoun ? 'subject' : 'descriptor' };
  }

  return null;
}

/**
 * Chooses "an" for descriptors starting with a vowel, "a" otherwise.
 */
export function articleFor(descriptor: string): 'a' | 'an' {
  const first = descriptor.charAt(0).toLowerCase();
  return VOWELS.has(first) ? 'an' : 'a';
}

export class WordCache {
  private readonly descriptors: string[] = [];
  private readonly subjects: string[] = [];
  private readonly lock = new ReadWriteLock();

  constructor(
    initial: { descriptors?: string[]; subjects?: string[] } = {},
    private readonly random: RandomSource = Math.random
  ) {
    for (const word of initial.descriptors ?? []) {
      this.appendUnique(this.descriptors, word);
    }
    for (const word of initial.subjects ?? []) {
      this.appendUnique(this.subjects, word);
    }
  }

  /**
   * Builds a cache from every record in the store.
   *
   * Malformed records are dropped and reported in a single warning.
   * Empty categories are allowed.
   *
   * @throws {ConfigurationError} If the store location is not configured
   * @throws {RemoteStoreError} If the store scan fails
   */
  static async load(
    store: WordStore,
    random: RandomSource = Math.random
  ): Promise<WordCache> {
    const records = await store.scan();
    const { words, discarded } = partitionRecords(records);

    if (discarded > 0) {
      console.warn(
        `Discarding stored insult words: ${discarded} of ${records.length} records were malformed`
      );
    }

    const cache = new WordCache({}, random);
    for (const { word, category } of words) {
      cache.appendUnique(cache.list(category), word);
    }

    console.log(
      `WordCache loaded (${cache.descriptors.length} descriptors, ${cache.subjects.length} subjects)`
    );

    return cache;
  }

  /**
   * Draws one descriptor and one subject uniformly and independently.
   *
   * @returns "<article> <descriptor> <subject>", or null if either category is empty
   */
  async pickPhrase(): Promise<string | null> {
    return this.lock.withRead(() => {
      if (this.descriptors.length === 0 || this.subjects.length === 0) {
        return null;
      }

      const descriptor = this.choose(this.descriptors);
      const subject = this.choose(this.subjects);
      const phrase = `${articleFor(descriptor)} ${descriptor} ${subject}`;

      if (isDebugEnabled()) {
        console.log(
          JSON.stringify({
            debug: 'pickPhrase',
            descriptor,
            subject,
            timestamp: new Date().toISOString(),
          })
        );
      }

      return phrase;
    });
  }

  /**
   * Adds a trimmed word to a category unless it is already there.
   *
   * @throws {PoisonedCacheError} If an earlier critical section failed
   */
  async insert(category: WordCategory, word: string): Promise<InsertResult> {
    return this.lock.withWrite(() =>
      this.appendUnique(this.list(category), word) ? 'inserted' : 'already-present'
    );
  }

  /**
   * Snapshot of one category in insertion order.
   */
  async words(category: WordCategory): Promise<readonly string[]> {
    return this.lock.withRead(() => [...this.list(category)]);
  }

  private list(category: WordCategory): string[] {
    return category === 'descriptor' ? this.descriptors : this.subjects;
  }

  private appendUnique(list: string[], word: string): boolean {
    const trimmed = word.trim();
    if (list.includes(trimmed)) {
      return false;
    }
    list.push(trimmed);
    return true;
  }

  private choose(list: readonly string[]): string {
    const index = Math.min(Math.floor(this.random() * list.length), list.length - 1);
    return list[index];
  }
}

function partitionRecords(records: unknown[]): WordCacheLoadResult {
  const words: ParsedWord[] = [];
  let discarded = 0;

  for (const record of records) {
    const parsed = parseWordRecord(record);
    if (parsed) {
      words.push(parsed);
    } else {
      discarded += 1;
    }
  }

  return { words, discarded };
}
