import { describe, expect, it } from 'vitest';
import { classifyPath } from '../src/parse.js';
import { TitleRegistry, normalizeTitle } from '../src/registry.js';

describe('normalizeTitle', () => {
  it('folds case, ampersands and punctuation', () => {
    expect(normalizeTitle('Law & Order: SVU')).toBe('law and order svu');
  });
});

describe('TitleRegistry', () => {
  it('keeps the first spelling of a title', () => {
    const registry = new TitleRegistry({ titles: ['MythBusters', 'Mythbusters'] });
    expect(registry.spellingOf('mythbusters')).toBe('MythBusters');
    expect(registry.spellingOf('Unknown')).toBeUndefined();
  });

  it('lists franchises without duplicates', () => {
    const registry = new TitleRegistry({ franchises: ['Star Wars', 'star wars', ' Alien '] });
    expect(registry.franchises).toEqual(['Star Wars', 'Alien']);
  });

  it('remembers shows and book series from records', () => {
    const registry = new TitleRegistry();
    for (const input of ['Breaking.Bad.S01E01.mkv', 'Mistborn.Book.1.The.Final.Empire.epub', 'Heat.1995.mkv']) {
      const result = classifyPath(input);
      if (result.ok) registry.remember(result.record);
    }
    expect(registry.spellingOf('breaking bad')).toBe('Breaking Bad');
    expect(registry.spellingOf('MISTBORN')).toBe('Mistborn');
    expect(registry.franchises).toEqual([]);
  });

  it('does not change records classified before it learned a spelling', () => {
    const registry = new TitleRegistry();
    const before = classifyPath('firefly.s01e01.mkv', { registry });
    registry.addTitle('FireFly');
    const after = classifyPath('firefly.s01e01.mkv', { registry });
    expect(before.ok && before.record.title).toBe('Firefly');
    expect(after.ok && after.record.title).toBe('FireFly');
  });
});
