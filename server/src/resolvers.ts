import type {
  BookLink,
  ClassifyHints,
  MovieLink,
  MusicLink,
  SoftwareLink,
  Token,
  TvLink,
} from './types.js';
import type { Extraction } from './attributes.js';
import { extractAttributes } from './attributes.js';
import type { KindDecision } from './kind.js';
import type { ExtrasResult } from './extras.js';
import { joinTokens, tokenize } from './tokenize.js';
import { normalizeTitle } from './registry.js';
import { DEFAULT_FOLDERS } from './naming.js';

export interface ResolveContext {
  readonly extraction: Extraction;
  readonly decision: KindDecision;
  readonly extras: ExtrasResult;
  readonly dirs: readonly string[];
  readonly hints: ClassifyHints;
}

const SMALL_WORDS = new Set(['a', 'an', 'and', 'as', 'at', 'but', 'by', 'for', 'in', 'nor', 'of', 'on', 'or', 'the', 'to', 'vs', 'via']);
const NUMBER_WORDS = ['zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine', 'ten',
  'eleven', 'twelve', 'thirteen', 'fourteen', 'fifteen', 'sixteen', 'seventeen', 'eighteen', 'nineteen', 'twenty'];
const BOOK_MARKERS = new Set(['book', 'bk', 'vol', 'volume']);
const FORMAT_DIRS = /^(e-?books?|audio-?books?)$/i;
const SEASON_DIR = /^(season\s*\d+|s\d{1,2}|specials?)$/i;

/**
 * Whitespace-normalize a title and fix its case when the source was all one
 * case ("the.matrix", "THE.MATRIX"); mixed-case titles keep their spelling.
 */
export function displayCase(text: string): string {
  const t = String(text || '').replace(/\s+/g, ' ').replace(/^[\s,;:-]+|[\s,;:-]+$/g, '').trim();
  const hasLower = /\p{Ll}/u.test(t);
  const hasUpper = /\p{Lu}/u.test(t);
  if (hasLower && hasUpper) return t;
  if (!hasLower && !hasUpper) return t;
  return t
    .split(' ')
    .map((w, i) => {
      const lw = w.toLowerCase();
      if (i > 0 && SMALL_WORDS.has(lw)) return lw;
      return lw.replace(/\p{L}/u, c => c.toUpperCase());
    })
    .join(' ');
}

function numberValue(word: string): number | undefined {
  if (/^\d{1,3}$/.test(word)) return Number(word);
  const i = NUMBER_WORDS.indexOf(word.toLowerCase());
  return i >= 0 ? i : undefined;
}

function firstConsumed(extraction: Extraction, after = -1) {
  let min = Infinity;
  for (const i of extraction.consumed) if (i > after && i < min) min = i;
  return min;
}

/** Where the title ends: at the year, or at the first attribute after the first title word */
function titleEnd(extraction: Extraction) {
  const start = extraction.titleTokens[0]?.index ?? -1;
  const year = extraction.positions.year;
  return year !== undefined && year > start ? year : firstConsumed(extraction, start);
}

function spelled(hints: ClassifyHints, name: string) {
  return (name && hints.registry?.spellingOf(name)) || name;
}

/** Title of the nearest directory that names a work, skipping season and format folders */
export function directoryTitle(dirs: readonly string[]): string {
  for (let i = dirs.length - 1; i >= 0; i--) {
    const dir = dirs[i].trim();
    if (SEASON_DIR.test(dir) || FORMAT_DIRS.test(dir)) continue;
    const extraction = extractAttributes(tokenize(dir));
    const end = titleEnd(extraction);
    const title = displayCase(joinTokens(extraction.titleTokens.filter(t => t.index < end)));
    if (title) return title;
  }
  return '';
}

export function resolveSeries(ctx: ResolveContext): TvLink {
  const { extraction, decision, extras, dirs, hints } = ctx;
  const marker = decision.episode;
  const titles = extraction.titleTokens.filter(t => !extras.markerIndices.has(t.index));
  if (!marker) {
    return { type: 'tv', showName: spelled(hints, displayCase(joinTokens(titles)) || directoryTitle(dirs)) };
  }
  const stop = firstConsumed(extraction, marker.end);
  const show = titles.filter(t => t.index < marker.start);
  const episodeTitle = displayCase(joinTokens(titles.filter(t => t.index > marker.end && t.index < stop)));
  const yearAt = extraction.positions.year;
  const showYear = yearAt !== undefined && yearAt < marker.start ? extraction.attributes.year : undefined;
  return {
    type: 'tv',
    showName: spelled(hints, displayCase(joinTokens(show)) || directoryTitle(dirs)),
    season: marker.season,
    episode: marker.episodes[0],
    episodes: marker.episodes.length > 1 ? marker.episodes : undefined,
    episodeTitle: episodeTitle || undefined,
    showYear,
  };
}

/** Longest known franchise contained in the title on word boundaries */
export function matchFranchise(title: string, known: readonly string[]): string | undefined {
  const haystack = ` ${normalizeTitle(title)} `;
  let best: { name: string; size: number } | undefined;
  for (const name of known) {
    const key = normalizeTitle(name);
    if (!key || !haystack.includes(` ${key} `)) continue;
    if (!best || key.length > best.size) best = { name: name.trim(), size: key.length };
  }
  return best?.name;
}

export function resolveFranchise(ctx: ResolveContext): MovieLink {
  const { extraction, extras, dirs, hints } = ctx;
  const end = titleEnd(extraction);
  const base = extraction.titleTokens.filter(t => t.index < end && !extras.markerIndices.has(t.index));
  const raw = extras.isExtra && extras.parentHint ? extras.parentHint : joinTokens(base);
  const baseTitle = displayCase(raw) || directoryTitle(dirs);
  const known = [...(hints.registry?.franchises ?? []), ...(hints.knownFranchises ?? [])];
  return {
    type: 'movie',
    baseTitle,
    year: extraction.attributes.year,
    franchise: baseTitle ? matchFranchise(baseTitle, known) : undefined,
  };
}

export interface BookResolution {
  readonly link: BookLink;
  readonly title: string;
  readonly authors: readonly string[];
}

export function splitAuthors(text: string): string[] {
  return text
    .split(/\s*(?:&|,|;|\band\b)\s*/i)
    .map(a => displayCase(a))
    .filter(Boolean);
}

/** Pull "by Author" or a trailing "(Author)" off the end of a book title */
function takeAuthors(tokens: readonly Token[]): { rest: readonly Token[]; authors: string[] } {
  const by = tokens.findIndex((t, i) => i > 0 && t.kind === 'word' && t.norm === 'by');
  if (by > 0 && by < tokens.length - 1) {
    return { rest: tokens.slice(0, by), authors: splitAuthors(joinTokens(tokens.slice(by + 1))) };
  }
  const last = tokens[tokens.length - 1];
  if (tokens.length > 1 && last.kind === 'bracketed' && last.raw.startsWith('(')) {
    const authors = splitAuthors(last.raw.slice(1, -1));
    if (authors.length) return { rest: tokens.slice(0, -1), authors };
  }
  return { rest: tokens, authors: [] };
}

/**
 * Series named by the folder layout this service writes: the folder above an
 * Ebooks/Audiobooks folder, or a folder directly under the books root.
 * Any other parent folder is not evidence of a series.
 */
function seriesDirectory(dirs: readonly string[], booksRoot: string) {
  const n = dirs.length;
  if (n < 2) return '';
  const parent = dirs[n - 1].trim();
  const above = dirs[n - 2].trim();
  const isRoot = (d: string) => normalizeTitle(d) === normalizeTitle(booksRoot);
  if (FORMAT_DIRS.test(parent)) return isRoot(above) || FORMAT_DIRS.test(above) ? '' : directoryTitle([above]);
  return isRoot(above) ? directoryTitle([parent]) : '';
}

export function resolveBook(ctx: ResolveContext): BookResolution {
  const { extraction, dirs, hints } = ctx;
  const list = extraction.titleTokens;
  const booksRoot = (hints.folders ?? DEFAULT_FOLDERS).books;
  let series: { name: string; index: number; rest: readonly Token[] } | undefined;

  for (let i = 0; i < list.length && !series; i++) {
    const t = list[i];
    if (t.kind !== 'word') continue;
    const hash = t.raw.match(/^#(\d{1,3})$/);
    let index: number | undefined;
    let end = i;
    if (hash) index = Number(hash[1]);
    else if (BOOK_MARKERS.has(t.norm) && list[i + 1]?.kind === 'word') {
      index = numberValue(list[i + 1].norm);
      end = i + 1;
    }
    if (index === undefined) continue;
    const name = displayCase(joinTokens(list.slice(0, i))) || seriesDirectory(dirs, booksRoot);
    if (name) series = { name, index, rest: list.slice(end + 1) };
  }

  // "NN - Title" inside a series folder, the layout this service writes
  if (!series && list.length > 1 && list[0].kind === 'word' && /^\d{1,3}$/.test(list[0].raw)) {
    const sep = extraction.tokens[list[0].index + 1];
    const name = seriesDirectory(dirs, booksRoot);
    if (sep?.kind === 'separator' && sep.raw.includes('-') && name) {
      series = { name, index: Number(list[0].raw), rest: list.slice(1) };
    }
  }

  const { rest, authors } = takeAuthors(series ? series.rest : list);
  const seriesName = series ? spelled(hints, series.name) : undefined;
  const title = displayCase(joinTokens(rest)) || seriesName || directoryTitle(dirs);
  const link: BookLink = series && seriesName
    ? { type: 'book', isStandalone: false, seriesName, seriesIndex: series.index }
    : { type: 'book', isStandalone: true };
  return { link, title, authors: hints.authors?.length ? [...hints.authors] : authors };
}

export function resolveMusic(ctx: ResolveContext): MusicLink {
  const { extraction, dirs } = ctx;
  const title = new Set(extraction.titleTokens.map(t => t.index));
  const segments: Token[][] = [];
  let current: Token[] = [];
  for (const t of extraction.tokens) {
    if (t.kind === 'separator' && t.raw.includes('-') && current.length) {
      segments.push(current);
      current = [];
    } else if (title.has(t.index)) {
      current.push(t);
    }
  }
  if (current.length) segments.push(current);

  let trackNumber: number | undefined;
  const first = segments[0];
  if (first && first[0].kind === 'word' && /^\d{1,3}$/.test(first[0].raw) && (first.length > 1 || segments.length > 1)) {
    trackNumber = Number(first[0].raw);
    if (first.length === 1) segments.shift();
    else first.shift();
  } else {
    for (const seg of segments) {
      const at = seg.findIndex((t, i) => t.norm === 'track' && seg[i + 1] && /^\d{1,3}$/.test(seg[i + 1].raw));
      if (at < 0) continue;
      trackNumber = Number(seg[at + 1].raw);
      seg.splice(at, 2);
      break;
    }
  }

  const parts = segments.filter(s => s.length).map(s => displayCase(joinTokens(s)));
  const artist = parts.length >= 2 ? parts[0] : undefined;
  const trackTitle = (artist ? parts.slice(1) : parts).join(' - ') || directoryTitle(dirs);
  return { type: 'music', artist, trackNumber, trackTitle };
}

export function resolveSoftware(ctx: ResolveContext): SoftwareLink {
  const { extraction, dirs } = ctx;
  const end = firstConsumed(extraction, extraction.titleTokens[0]?.index ?? -1);
  const before = extraction.titleTokens.filter(t => t.index < end);
  const name = displayCase(joinTokens(before.length ? before : extraction.titleTokens)) || directoryTitle(dirs);
  return {
    type: 'software',
    name,
    version: extraction.attributes.version,
    platform: extraction.attributes.platform,
  };
}
