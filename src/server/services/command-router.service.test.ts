import { describe, it, expect } from 'vitest';
import { classify, toUserTag } from './command-router.service';

describe('classify', () => {
  describe('insulting a named target', () => {
    it('should target the mentioned user', () => {
      expect(classify('insult <@U456>', 'U123')).toEqual({
        kind: 'insult',
        target: '<@U456>',
      });
    });

    it('should accept a leading bot mention and trailing punctuation', () => {
      expect(classify('<@UBOT> insult <@U456>!', 'U123')).toEqual({
        kind: 'insult',
        target: '<@U456>',
      });
    });

    it('should keep a labelled mention token as is', () => {
      expect(classify('insult <@U456|alice>', 'U123')).toEqual({
        kind: 'insult',
        target: '<@U456|alice>',
      });
    });

    it('should match the keyword case-insensitively', () => {
      expect(classify('Insult <@U456>', 'U123')).toEqual({
        kind: 'insult',
        target: '<@U456>',
      });
    });

    it('should not match when more text follows the mention', () => {
      expect(classify('insult <@U456> and <@U789>', 'U123')).toEqual({ kind: 'no-match' });
    });
  });

  describe('insulting the requester', () => {
    it('should target the requester for "insult me"', () => {
      expect(classify('insult me', 'U123')).toEqual({
        kind: 'insult',
        target: '<@U123>',
      });
    });

    it('should match "insult me" as a trailing clause', () => {
      expect(classify('<@UBOT> go ahead, insult me!', 'U777')).toEqual({
        kind: 'insult',
        target: '<@U777>',
      });
    });

    it('should not match "insult me" in the middle of a sentence', () => {
      expect(classify("please don't insult me again", 'U123')).toEqual({ kind: 'no-match' });
    });

    it('should not match inside a longer word', () => {
      expect(classify('consult me', 'U123')).toEqual({ kind: 'no-match' });
    });
  });

  describe('adding words', () => {
    it('should add an adjective as a descriptor', () => {
      expect(classify('add adjective slimy', 'U123')).toEqual({
        kind: 'add-word',
        category: 'descriptor',
        word: 'slimy',
      });
    });

    it('should add a noun as a subject after a bot mention', () => {
      expect(classify('<@UBOT> add noun doorknob', 'U123')).toEqual({
        kind: 'add-word',
        category: 'subject',
        word: 'doorknob',
      });
    });

    it('should keep spaces, commas, hyphens and case inside the phrase', () => {
      expect(classify('add noun  Half-baked, soggy_waffle  ', 'U123')).toEqual({
        kind: 'add-word',
        category: 'subject',
        word: 'Half-baked, soggy_waffle',
      });
    });

    it('should reject a word that is only whitespace', () => {
      expect(classify('add noun   ', 'U123')).toEqual({ kind: 'rejected-add-word' });
    });

    it('should reject a missing word', () => {
      expect(classify('add adjective', 'U123')).toEqual({ kind: 'rejected-add-word' });
    });

    it('should accept letters outside ASCII', () => {
      expect(classify('add adjective café', 'U123')).toEqual({
        kind: 'add-word',
        category: 'descriptor',
        word: 'café',
      });
      expect(classify('<@UBOT> add noun naïve fool', 'U123')).toEqual({
        kind: 'add-word',
        category: 'subject',
        word: 'naïve fool',
      });
      expect(classify('add noun Dummkopf-Größe', 'U123')).toEqual({
        kind: 'add-word',
        category: 'subject',
        word: 'Dummkopf-Größe',
      });
    });

    it('should not match characters outside the allowed set', () => {
      expect(classify("add noun don't", 'U123')).toEqual({ kind: 'no-match' });
    });

    it('should not match an unknown category keyword', () => {
      expect(classify('add verb run', 'U123')).toEqual({ kind: 'no-match' });
      expect(classify('add nouns socks', 'U123')).toEqual({ kind: 'no-match' });
    });

    it('should not match "add" in the middle of a message', () => {
      expect(classify('we should add noun support', 'U123')).toEqual({ kind: 'no-match' });
    });
  });

  describe('ordering', () => {
    it('should prefer a named target over the requester', () => {
      expect(classify('insult <@U456>', 'U456')).toEqual({
        kind: 'insult',
        target: '<@U456>',
      });
    });

    it('should classify an add command ending in "insult me" as an insult', () => {
      expect(classify('add noun insult me', 'U123')).toEqual({
        kind: 'insult',
        target: '<@U123>',
      });
    });
  });

  it('should return no-match for ordinary chat', () => {
    expect(classify('hello there', 'U123')).toEqual({ kind: 'no-match' });
  });
});

describe('toUserTag', () => {
  it('should wrap the user ID in mention syntax', () => {
    expect(toUserTag('U123')).toBe('<@U123>');
  });
});
