/**
 * Insult Service - Command Dispatch Orchestrator
 *
 * Coordinates the components behind every chat command:
 * - CommandRouter to classify the message text
 * - WordCache (loaded once, on first use) for phrases and new words
 * - WordStore to persist added words
 * - ReplySink to answer in the channel
 *
 * Dispatch Flow:
 * 1. Classify the message; no match is a no-op
 * 2. Insult: pick a phrase and reply "<target> is <phrase>" (or "Shut up.")
 * 3. Add word: insert into the cache; persist only when it was new
 * 4. Rejected add: reply without touching the cache
 *
 * Cache initialization failures propagate to the caller and nothing is sent
 * to the chat. A failed put after a successful insert is logged and the user
 * is still told "Added.": the cache keeps the word for the rest of the process.
 */

import { OnceCell } from '../utils/once-cell';
import { isDebugEnabled } from '../utils/config';
import { classify } from './command-router.service';
import { WordCache, type RandomSource } from './word-cache.service';
import type { WordStore } from './word-store.service';
import type { ReplySink } from './reply.service';
import type { InboundMessage } from '../types/slack.types';
import type { CacheState, CommandMatch, WordCategory } from '../types/word.types';

export const REPLY_SHUT_UP = 'Shut up.';
export const REPLY_ALREADY_HAVE = 'I already have that word!';
export const REPLY_ADDED = 'Added.';
export const REPLY_REJECTED = 'Nice try wise guy.';

export interface InsultServiceOptions {
  store: WordStore;
  replies: ReplySink;
  random?: RandomSource;
}

/**
 * InsultService owns the process-wide word cache and dispatches commands.
 *
 * @example
 * ```typescript
 * const insults = new InsultService({ store, replies });
 * await insults.dispatch({ channel: 'C1', user: 'U123', text: 'insult me' });
 * // posts "<@U123> is an awful jerk" to C1
 * ```
 */
export class InsultService {
  private readonly cache = new OnceCell<WordCache>();
  private readonly store: WordStore;
  private readonly replies: ReplySink;
  private readonly random: RandomSource;

  constructor(options: InsultServiceOptions) {
    this.store = options.store;
    this.replies = options.replies;
    this.random = options.random ?? Math.random;
  }

  /**
   * Returns the word cache, loading it from the store on the first call.
   * Concurrent first callers share a single store scan and its outcome.
   */
  getCache(): Promise<WordCache> {
    return this.cache.getOrInit(() => WordCache.load(this.store, this.random));
  }

  cacheState(): CacheState {
    switch (this.cache.state) {
      case 'empty':
        return 'uninitialized';
      case 'pending':
        return 'initializing';
      case 'fulfilled':
        return 'ready';
      case 'rejected':
        return 'failed';
    }
  }

  /**
   * Classifies a message and carries out the matching command.
   *
   * @returns The classification that was acted on
   * @throws {ConfigurationError} If the word store is not configured
   * @throws {RemoteStoreError} If loading the word list failed
   * @throws {PoisonedCacheError} If the cache lock is poisoned
   */
  async dispatch(message: InboundMessage): Promise<CommandMatch> {
    const match = classify(message.text, message.user);

    if (isDebugEnabled()) {
      console.log(
        JSON.stringify({
          debug: 'dispatch',
          channel: message.channel,
          kind: match.kind,
          timestamp: new Date().toISOString(),
        })
      );
    }

    switch (match.kind) {
      case 'insult':
        await this.insult(message.channel, match.target);
        break;
      case 'add-word':
        await this.addWord(message.channel, match.category, match.word, message.user);
        break;
      case 'rejected-add-word':
        await this.replies.send(message.channel, REPLY_REJECTED);
        break;
      case 'no-match':
        break;
    }

    return match;
  }

  private async insult(channel: string, target: string): Promise<void> {
    const cache = await this.getCache();
    const phrase = await cache.pickPhrase();
    const reply = phrase === null ? REPLY_SHUT_UP : `${target} is ${phrase}`;
    await this.replies.send(channel, reply);
  }

  private async addWord(
    channel: string,
    category: WordCategory,
    word: string,
    addedBy: string
  ): Promise<void> {
    const cache = await this.getCache();
    const result = await cache.insert(category, word);

    if (result === 'already-present') {
      await this.replies.send(channel, REPLY_ALREADY_HAVE);
      return;
    }

    try {
      await this.store.put(word.trim(), category, addedBy);
    } catch (error) {
      console.error(
        `Failed to persist ${category} "${word.trim()}"; keeping it in memory only:`,
        error instanceof Error ? error.message : error
      );
    }

    await this.replies.send(channel, REPLY_ADDED);
  }
}
