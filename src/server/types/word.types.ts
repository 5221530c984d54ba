/**
 * TypeScript type definitions for the word cache and command layer.
 * These types define the structure of words stored in Redis and passed between services.
 */

/**
 * The two word categories combined into a phrase.
 * A descriptor is adjective-like ("slimy"), a subject is noun-like ("doorknob").
 */
export type WordCategory = 'descriptor' | 'subject';

/**
 * Word record stored in Redis, one JSON element per list entry.
 *
 * Stored in Redis list: `{WORD_STORE_KEY}` (default `insult:words`)
 *
 * @example
 * {
 *   word: "slimy",
 *   category: "descriptor",
 *   addedBy: "U123",
 *   createdAt: 1728950400000
 * }
 */
export interface StoredWordRecord {
  /** The word or short phrase, case preserved */
  word: string;
  /** Category the word belongs to */
  category: WordCategory;
  /** Slack user ID of whoever added the word, when added through chat */
  addedBy?: string;
  /** Unix timestamp (milliseconds) when the record was written */
  createdAt?: number;
}

/**
 * A record that passed validation during cache load.
 */
export interface ParsedWord {
  word: string;
  category: WordCategory;
}

/**
 * Outcome of inserting a word into the cache.
 * A duplicate is a normal result, not an error.
 */
export type InsertResult = 'inserted' | 'already-present';

/**
 * Classification of one inbound message's text.
 */
export type CommandMatch =
  | { kind: 'insult'; target: string }
  | { kind: 'add-word'; category: WordCategory; word: string }
  | { kind: 'rejected-add-word' }
  | { kind: 'no-match' };

/**
 * Lifecycle of the process-wide word cache.
 */
export type CacheState = 'uninitialized' | 'initializing' | 'ready' | 'failed';
