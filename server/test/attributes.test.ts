import { describe, expect, it } from 'vitest';
import { extractAttributes } from '../src/attributes.js';
import { joinTokens, tokenize } from '../src/tokenize.js';

const extract = (name: string) => {
  const e = extractAttributes(tokenize(name));
  return { attributes: e.attributes, title: joinTokens(e.titleTokens) };
};

describe('extractAttributes', () => {
  it('reads a dash after a year as part of the title', () => {
    expect(extract('The Matrix (1999) - Interview.mkv')).toEqual({
      attributes: { year: 1999 },
      title: 'The Matrix Interview',
    });
  });

  it('reads a typical movie release name', () => {
    expect(extract('The.Matrix.1999.1080p.BluRay.x264-GROUP.mkv')).toEqual({
      attributes: { quality: '1080p', source: 'BluRay', codec: 'x264', year: 1999, releaseGroup: 'GROUP' },
      title: 'The Matrix',
    });
  });

  it('matches values that span separators', () => {
    const { attributes, title } = extract('Movie.2019.1080p.WEB-DL.DDP5.1.H.264-NTb.mkv');
    expect(title).toBe('Movie');
    expect(attributes.source).toBe('WEB-DL');
    // the rightmost codec wins
    expect(attributes.codec).toBe('H.264');
    expect(attributes.releaseGroup).toBe('NTb');
    expect(attributes.year).toBe(2019);
  });

  it('keeps language words that belong to the title', () => {
    expect(extract('The.English.Patient.1996.720p.mkv')).toEqual({
      attributes: { quality: '720p', year: 1996 },
      title: 'The English Patient',
    });
  });

  it('reads languages after the technical tail starts', () => {
    expect(extract('Movie.2010.1080p.FRENCH.x264.mkv').attributes.language).toBe('fr');
  });

  it('keeps source-like title words before the tail', () => {
    expect(extract("Charlotte's.Web.2006.DVDRip.XviD.avi")).toEqual({
      attributes: { source: 'DVDRip', codec: 'XviD', year: 2006 },
      title: "Charlotte's Web",
    });
  });

  it('never takes the first word as a year', () => {
    expect(extract('1917.2019.1080p.mkv')).toEqual({ attributes: { quality: '1080p', year: 2019 }, title: '1917' });
    expect(extract('1917.mkv')).toEqual({ attributes: {}, title: '1917' });
  });

  it('consumes only the rightmost year', () => {
    expect(extract('2001.A.Space.Odyssey.1968.mkv')).toEqual({ attributes: { year: 1968 }, title: '2001 A Space Odyssey' });
  });

  it('reads years and tags inside brackets', () => {
    expect(extract('The Matrix (1999).mkv')).toEqual({ attributes: { year: 1999 }, title: 'The Matrix' });
  });

  it('takes a leading bracketed tag as the release group', () => {
    expect(extract('[SubsPlease] Show - 01 (1080p).mkv')).toEqual({
      attributes: { quality: '1080p', releaseGroup: 'SubsPlease' },
      title: 'Show 01',
    });
  });

  it('reads software versions and platforms', () => {
    expect(extract('Tool.v2.1.0.x64.exe')).toEqual({ attributes: { version: '2.1.0', platform: 'x64' }, title: 'Tool' });
  });

  it('reads subtitle languages', () => {
    expect(extract('Movie.2012.720p.ENG.SUBS.mkv').attributes.subtitleLanguage).toBe('en');
  });
});
