import { describe, expect, it } from 'vitest';
import { joinTokens, splitExtension, splitPath, tokenize } from '../src/tokenize.js';

describe('splitPath', () => {
  it('normalizes backslashes and separates the file name', () => {
    expect(splitPath('C:\\Media\\Movies\\Film.mkv')).toEqual({ dirs: ['C:', 'Media', 'Movies'], file: 'Film.mkv' });
  });

  it('drops empty segments', () => {
    expect(splitPath('/srv//media/Show/')).toEqual({ dirs: ['srv', 'media'], file: 'Show' });
  });
});

describe('splitExtension', () => {
  it('only splits known extensions', () => {
    expect(splitExtension('Movie.1999')).toEqual({ stem: 'Movie.1999' });
    expect(splitExtension('Show.720p')).toEqual({ stem: 'Show.720p' });
    expect(splitExtension('Film.MKV')).toEqual({ stem: 'Film', extension: 'mkv' });
  });

  it('keeps compound archive extensions together', () => {
    expect(splitExtension('tool-1.2.0.tar.gz')).toEqual({ stem: 'tool-1.2.0', extension: 'tar.gz' });
  });

  it('reads a bare known extension and leaves other dotfiles alone', () => {
    expect(splitExtension('.mkv')).toEqual({ stem: '', extension: 'mkv' });
    expect(splitExtension('.hidden')).toEqual({ stem: '.hidden' });
  });

  it('knows subtitle extensions', () => {
    expect(splitExtension('Movie.en.srt')).toEqual({ stem: 'Movie.en', extension: 'srt' });
  });
});

describe('tokenize', () => {
  it('yields an empty sequence for an empty name', () => {
    expect(tokenize('')).toEqual([]);
  });

  it('splits words, separators and the extension', () => {
    const tokens = tokenize('The.Matrix.1999.x264-GROUP.mkv');
    expect(tokens.map(t => t.kind)).toEqual([
      'word', 'separator', 'word', 'separator', 'word', 'separator', 'word', 'separator', 'word', 'extension',
    ]);
    expect(tokens.map(t => t.raw)).toEqual(['The', '.', 'Matrix', '.', '1999', '.', 'x264', '-', 'GROUP', 'mkv']);
    expect(tokens[7].norm).toBe('-');
    expect(tokens[1].norm).toBe(' ');
    expect(tokens.map(t => t.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('keeps bracketed groups whole with their contents tokenized', () => {
    const tokens = tokenize('[Group] Show - 01 (1080p).mkv');
    expect(tokens.map(t => t.raw)).toEqual(['[Group]', ' ', 'Show', ' - ', '01', ' ', '(1080p)', 'mkv']);
    expect(tokens[0].kind).toBe('bracketed');
    expect(tokens[0].norm).toBe('group');
    expect(tokens[6].children?.map(c => c.raw)).toEqual(['1080p']);
  });

  it('treats an unbalanced opener as ordinary separator text', () => {
    const tokens = tokenize('Movie (2001.mkv');
    expect(tokens.map(t => t.kind)).toEqual(['word', 'separator', 'word', 'extension']);
    expect(tokens[1].raw).toBe(' (');
  });

  it('returns frozen tokens', () => {
    const tokens = tokenize('A.B.mkv');
    expect(Object.isFrozen(tokens)).toBe(true);
    expect(Object.isFrozen(tokens[0])).toBe(true);
  });
});

describe('joinTokens', () => {
  it('joins words and brackets with single spaces', () => {
    expect(joinTokens(tokenize('Good.Omens_(Terry Pratchett)'))).toBe('Good Omens (Terry Pratchett)');
  });
});
