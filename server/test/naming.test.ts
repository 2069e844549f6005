import { describe, expect, it } from 'vitest';
import type { NameParts } from '../src/naming.js';
import { episodeCode, formatCanonical, pad2, placementFolder, relativePathFor, sanitize } from '../src/naming.js';

const plain = { isExtra: false } as const;

function movie(baseTitle: string, extra: Partial<NameParts> = {}): NameParts {
  return {
    kind: { type: 'movie', ...plain },
    link: { type: 'movie', baseTitle },
    title: baseTitle,
    attributes: {},
    ...extra,
  };
}

describe('sanitize', () => {
  it('drops characters illegal in file names and trims dots', () => {
    expect(sanitize('What If...?')).toBe('What If');
    expect(sanitize('AC/DC: Live')).toBe('ACDC Live');
    expect(sanitize('  spaced   out  ')).toBe('spaced out');
    expect(sanitize(undefined)).toBe('');
  });
});

describe('episodeCode', () => {
  it('pads season and episode numbers', () => {
    expect(pad2(3)).toBe('03');
    expect(episodeCode(2, [5])).toBe('S02E05');
    expect(episodeCode(1, [1, 2])).toBe('S01E01E02');
    expect(episodeCode(undefined, [7])).toBe('Episode 07');
    expect(episodeCode(undefined, [])).toBe('');
  });
});

describe('formatCanonical', () => {
  it('names movies with and without a year', () => {
    expect(formatCanonical(movie('The Matrix', { link: { type: 'movie', baseTitle: 'The Matrix', year: 1999 } }))).toBe('The Matrix (1999)');
    expect(formatCanonical(movie('Home Video'))).toBe('Home Video');
  });

  it('appends the extra type to movie extras', () => {
    const parts = movie('The Matrix', { kind: { type: 'movie', isExtra: true, extraType: 'Behind the Scenes' } });
    expect(formatCanonical(parts)).toBe('The Matrix - Behind the Scenes');
  });

  it('names tv episodes', () => {
    const parts: NameParts = {
      kind: { type: 'tv-episode', isExtra: false },
      link: { type: 'tv', showName: 'Breaking Bad', season: 2, episode: 5, episodeTitle: 'Breakage' },
      title: 'Breaking Bad',
      attributes: {},
    };
    expect(formatCanonical(parts)).toBe('Breaking Bad - S02E05 - Breakage');
  });

  it('names multi-episode files with the show year', () => {
    const parts: NameParts = {
      kind: { type: 'tv-episode', isExtra: false },
      link: { type: 'tv', showName: 'Doctor Who', showYear: 2005, season: 1, episode: 1, episodes: [1, 2] },
      title: 'Doctor Who',
      attributes: {},
    };
    expect(formatCanonical(parts)).toBe('Doctor Who (2005) - S01E01E02');
  });

  it('names series and standalone books', () => {
    expect(formatCanonical({
      kind: { type: 'ebook', isExtra: false },
      link: { type: 'book', isStandalone: false, seriesName: 'Mistborn', seriesIndex: 2 },
      title: 'The Well of Ascension',
      attributes: {},
      book: { authors: [], format: 'ebook' },
    })).toBe('Mistborn/02 - The Well of Ascension');
    expect(formatCanonical({
      kind: { type: 'ebook', isExtra: false },
      link: { type: 'book', isStandalone: true },
      title: 'Good Omens',
      attributes: {},
      book: { authors: ['Terry Pratchett', 'Neil Gaiman'], format: 'ebook' },
    })).toBe('Good Omens (Terry Pratchett & Neil Gaiman)');
  });

  it('names music and software', () => {
    expect(formatCanonical({
      kind: { type: 'music-track', isExtra: false },
      link: { type: 'music', trackNumber: 1, artist: 'Artist Name', trackTitle: 'Song Title' },
      title: 'Song Title',
      attributes: {},
    })).toBe('01 - Artist Name - Song Title');
    expect(formatCanonical({
      kind: { type: 'software', isExtra: false },
      link: { type: 'software', name: 'Tool', version: '2.1.0', platform: 'x64' },
      title: 'Tool',
      attributes: {},
    })).toBe('Tool v2.1.0 (x64)');
  });

  it('returns an empty name when nothing usable was found', () => {
    expect(formatCanonical(movie(''))).toBe('');
  });
});

describe('placementFolder', () => {
  it('files movies under their franchise', () => {
    expect(placementFolder(movie('Star Wars', { link: { type: 'movie', baseTitle: 'Star Wars', franchise: 'Star Wars' } }))).toBe('Movies/Star Wars');
  });

  it('keeps extras apart', () => {
    expect(placementFolder(movie('The Matrix', { kind: { type: 'movie', isExtra: true } }))).toBe('Extras/Movies');
    expect(placementFolder({
      kind: { type: 'tv-episode', isExtra: true },
      link: { type: 'tv', showName: 'Lost', season: 1, episode: 2 },
      title: 'Lost',
      attributes: {},
    })).toBe('Extras/TV Shows/Lost');
  });

  it('honors configured folder names', () => {
    const folders = { movies: 'Films', tv: 'Series', music: 'Audio', software: 'Apps', books: 'Library', extras: 'Bonus' };
    expect(placementFolder(movie('Heat'), folders)).toBe('Films');
  });
});

describe('relativePathFor', () => {
  it('joins folder, file name and extension', () => {
    const parts: NameParts = {
      kind: { type: 'audiobook', isExtra: false },
      link: { type: 'book', isStandalone: false, seriesName: 'Mistborn', seriesIndex: 1 },
      title: 'The Final Empire',
      attributes: {},
      book: { authors: [], format: 'audiobook' },
    };
    expect(relativePathFor(parts, 'Mistborn/01 - The Final Empire', 'm4b')).toBe('Books/Mistborn/Audiobooks/01 - The Final Empire.m4b');
    expect(relativePathFor(movie('Heat'), 'Heat', undefined)).toBe('Movies/Heat');
  });
});
