/**
 * Command Router - Classifies Chat Messages into Bot Commands
 *
 * Patterns are anchored to the whole message (or its trailing clause) so that
 * ordinary conversation mentioning "insult" or "add" does not trigger the bot.
 * They are evaluated in order and the first match wins:
 *
 * 1. `insult <@U456>`                 → insult the mentioned user
 * 2. `... insult me`                  → insult the requester
 * 3. `<@BOT> add adjective|noun word` → add a word (rejected when empty)
 *
 * Keywords are case-insensitive; captured words keep their case.
 */

import type { CommandMatch, WordCategory } from '../types/word.types';

/** Slack user mention, e.g. `<@U456>` or `<@U456|alice>` */
const MENTION = String.raw`<@[A-Z0-9_]+(?:\|[^>]*)?>`;

const INSULT_TARGET_PATTERN = new RegExp(
  String.raw`^\s*(?:${MENTION}\s+)?insult\s+(${MENTION})\s*[.!?]*\s*$`,
  'i'
);

const INSULT_ME_PATTERN = /(?:^|[\s,])insult\s+me\s*[.!?]*\s*$/i;

// Word payload: letters and digits in any script, underscores, spaces, commas, hyphens
const ADD_WORD_PATTERN = new RegExp(
  String.raw`^\s*(?:${MENTION}\s+)?add\s+(adjective|noun)(?:\s([\p{L}\p{M}\p{N}_ ,-]*))?$`,
  'iu'
);

const CATEGORY_KEYWORDS: Record<string, WordCategory> = {
  adjective: 'descriptor',
  noun: 'subject',
};

/**
 * Formats a Slack user ID as a mention token.
 */
export function toUserTag(userId: string): string {
  return `<@${userId}>`;
}

/**
 * Decides which command, if any, a message triggers.
 *
 * @param text - Raw message text as delivered by Slack
 * @param requesterId - Slack user ID of the sender
 *
 * @example
 * ```typescript
 * classify('insult me', 'U123');
 * // { kind: 'insult', target: '<@U123>' }
 *
 * classify('<@UBOT> add noun doorknob', 'U123');
 * // { kind: 'add-word', category: 'subject', word: 'doorknob' }
 * ```
 */
export function classify(text: string, requesterId: string): CommandMatch {
  const targeted = INSULT_TARGET_PATTERN.exec(text);
  if (targeted) {
    return { kind: 'insult', target: targeted[1] };
  }

  if (INSULT_ME_PATTERN.test(text)) {
    return { kind: 'insult', target: toUserTag(requesterId) };
  }

  const addition = ADD_WORD_PATTERN.exec(text);
  if (addition) {
    const category = CATEGORY_KEYWORDS[addition[1].toLowerCase()];
    const word = (addition[2] ?? '').trim();
    if (word.length === 0) {
      return { kind: 'rejected-add-word' };
    }
    return { kind: 'add-word', category, word };
  }

  return { kind: 'no-match' };
}
