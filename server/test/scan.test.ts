import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { OperationJournal } from '../src/journal.js';
import { TitleRegistry } from '../src/registry.js';
import { idFromPath, normalizePathForCache, scanDirectory, subtitleLanguage } from '../src/scan.js';

let root: string;

function touch(rel: string, content = 'x') {
  const file = path.join(root, rel);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
}

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'media-scan-'));
  touch('Movies/The.Matrix.1999.1080p.mkv', 'matrix');
  touch('Show/Show.S01E02.mkv');
  touch('notes.txt');
  touch('library/Movies/Heat (1995).mkv');
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('normalizePathForCache', () => {
  it('uses forward slashes', () => {
    expect(normalizePathForCache('a\\b\\\\c')).toBe('a/b/c');
    expect(idFromPath('a/b')).toHaveLength(40);
  });
});

describe('scanDirectory', () => {
  it('classifies media files by their path under the root', async () => {
    const registry = new TitleRegistry();
    const items = await scanDirectory({ root, destRoot: path.join(root, 'library'), registry });
    expect(items.map(i => i.record?.canonicalName)).toEqual(['The Matrix (1999)', 'Show - S01E02']);
    expect(items[0]).toMatchObject({ size: 6, ext: 'mkv' });
    expect(registry.spellingOf('show')).toBe('Show');
  });

  it('includes the destination when it is not excluded', async () => {
    const items = await scanDirectory({ root });
    expect(items).toHaveLength(3);
  });

  it('skips files the journal already placed', async () => {
    const journal = new OperationJournal(path.join(root, 'journal.json'));
    const [first] = await scanDirectory({ root, destRoot: path.join(root, 'library') });
    journal.record([{ from: first.path, to: '/elsewhere', size: first.size, action: 'hardlink', type: 'movie', canonicalName: 'The Matrix (1999)' }]);

    const items = await scanDirectory({ root, destRoot: path.join(root, 'library'), journal });
    expect(items[0]).toMatchObject({ path: first.path, skipped: 'already placed' });
    expect(items[0].record).toBeUndefined();
    expect(items[1].record?.kind.type).toBe('tv-episode');
  });

  it('attaches subtitles to the video they are named after', async () => {
    touch('Movies/The.Matrix.1999.1080p.en.srt');
    touch('Movies/Subs/The.Matrix.1999.1080p.srt');
    touch('orphan.srt');
    const items = await scanDirectory({ root, destRoot: path.join(root, 'library') });
    const movies = normalizePathForCache(path.join(root, 'Movies'));
    expect(items[0].sidecars).toEqual([
      { path: `${movies}/Subs/The.Matrix.1999.1080p.srt`, ext: 'srt' },
      { path: `${movies}/The.Matrix.1999.1080p.en.srt`, ext: 'srt', language: 'en' },
    ]);
    expect(items[1].sidecars).toBeUndefined();
    expect(items).toHaveLength(3);
    expect(items[2]).toMatchObject({ ext: 'srt', skipped: 'subtitle without a matching video' });
  });

  it('lists nothing for a dangling link', async () => {
    fs.symlinkSync(path.join(root, 'gone.mkv'), path.join(root, 'Broken.2001.mkv'));
    const items = await scanDirectory({ root, destRoot: path.join(root, 'library') });
    expect(items.map(i => i.record?.canonicalName)).toEqual(['The Matrix (1999)', 'Show - S01E02']);
  });
});

describe('subtitleLanguage', () => {
  it('reads the language between the video name and the extension', () => {
    expect(subtitleLanguage('Heat.1995', 'Heat.1995')).toBe('');
    expect(subtitleLanguage('Heat.1995', 'heat.1995.English.forced')).toBe('en');
    expect(subtitleLanguage('Heat.1995', 'Heat.1995.fr')).toBe('fr');
  });

  it('rejects subtitles of another video', () => {
    expect(subtitleLanguage('Heat', 'Heat.1995')).toBeUndefined();
    expect(subtitleLanguage('Heat.1995', 'Heat.1995.Part2')).toBeUndefined();
  });
});
