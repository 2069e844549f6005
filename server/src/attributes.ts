import type { AttributeKind, AttributeSet, AttributeValues, Token } from './types.js';

type Value = string | number;

interface Recognizer {
  kind: AttributeKind;
  /** Longest run of words tried as one value */
  maxWords: number;
  /** Only match after the first technical token (anything but a year) an earlier recognizer consumed */
  tailOnly?: boolean;
  /** Consume only the rightmost match, leaving earlier lookalikes in the title */
  rightmostOnly?: boolean;
  match(text: string): Value | undefined;
}

function table(entries: [RegExp, string | ((m: RegExpMatchArray) => string)][]) {
  return (text: string): string | undefined => {
    for (const [re, out] of entries) {
      const m = text.match(re);
      if (m) return typeof out === 'string' ? out : out(m);
    }
    return undefined;
  };
}

const channels = (m: RegExpMatchArray, name: string) => (m[1] ? `${name} ${m[1]}` : name);

const LANGUAGES: Record<string, string> = {
  english: 'en', eng: 'en',
  french: 'fr', fre: 'fr', fra: 'fr', truefrench: 'fr', vff: 'fr',
  german: 'de', ger: 'de', deu: 'de',
  spanish: 'es', spa: 'es', esp: 'es', castellano: 'es',
  italian: 'it', ita: 'it',
  japanese: 'ja', jpn: 'ja', jap: 'ja',
  korean: 'ko', kor: 'ko',
  chinese: 'zh', chi: 'zh', zho: 'zh', mandarin: 'zh', cantonese: 'zh',
  russian: 'ru', rus: 'ru',
  hindi: 'hi', hin: 'hi',
  portuguese: 'pt', por: 'pt',
  dutch: 'nl', nld: 'nl', dut: 'nl',
  swedish: 'sv', swe: 'sv',
  polish: 'pl', pol: 'pl',
  multi: 'multi',
  dual: 'dual',
};

const LANGUAGE_CODES = new Set(Object.values(LANGUAGES).filter(c => c.length === 2));

const languageOf = (w: string): string | undefined => LANGUAGES[w.toLowerCase()];

/** Language code of a name, a three-letter tag or a two-letter code, as used in subtitle file names */
export function languageCode(word: string): string | undefined {
  const w = word.toLowerCase();
  return languageOf(w) ?? (LANGUAGE_CODES.has(w) ? w : undefined);
}

// Order is part of the contract: a token taken by one recognizer is invisible
// to every recognizer after it.
export const RECOGNIZERS: readonly Recognizer[] = [
  {
    kind: 'quality',
    maxWords: 1,
    match: table([
      [/^(2160|1080|720|576|480|360)([pi])$/i, m => `${m[1]}${m[2].toLowerCase()}`],
      [/^(4k|uhd)$/i, '2160p'],
    ]),
  },
  {
    kind: 'source',
    maxWords: 2,
    match: table([
      [/^blu-?ray$/i, 'BluRay'],
      [/^bd-?rip$/i, 'BDRip'],
      [/^br-?rip$/i, 'BRRip'],
      [/^(bd)?remux$/i, 'Remux'],
      [/^web[-. ]?dl$/i, 'WEB-DL'],
      [/^web[-. ]?rip$/i, 'WEBRip'],
      [/^hdtv$/i, 'HDTV'],
      [/^pdtv$/i, 'PDTV'],
      [/^dvd-?rip$/i, 'DVDRip'],
      [/^hd-?rip$/i, 'HDRip'],
      [/^camrip$/i, 'CAM'],
      [/^(hdts|telesync)$/i, 'TS'],
      [/^telecine$/i, 'TC'],
      [/^(dvdscr|screener)$/i, 'SCR'],
    ]),
  },
  {
    // words that also turn up in titles ("Charlotte's Web")
    kind: 'source',
    maxWords: 1,
    tailOnly: true,
    match: table([
      [/^web$/i, 'WEB'],
      [/^dvd(r|5|9)?$/i, 'DVD'],
      [/^cam$/i, 'CAM'],
      [/^scr$/i, 'SCR'],
    ]),
  },
  {
    kind: 'service',
    maxWords: 1,
    match: table([[/^(amzn|nf|dsnp|hmax|atvp|hulu|pcok|pmtp)$/i, m => m[1].toUpperCase()]]),
  },
  {
    kind: 'codec',
    maxWords: 3,
    match: table([
      [/^x[ .]?264$/i, 'x264'],
      [/^x[ .]?265$/i, 'x265'],
      [/^h[ .]?264$/i, 'H.264'],
      [/^h[ .]?265$/i, 'H.265'],
      [/^hevc$/i, 'HEVC'],
      [/^avc$/i, 'AVC'],
      [/^xvid$/i, 'XviD'],
      [/^divx$/i, 'DivX'],
      [/^av1$/i, 'AV1'],
      [/^vp9$/i, 'VP9'],
      [/^aac[ .]?(\d\.\d)?$/i, m => channels(m, 'AAC')],
      [/^e-?ac-?3[ .]?(\d\.\d)?$/i, m => channels(m, 'EAC3')],
      [/^ac3[ .]?(\d\.\d)?$/i, m => channels(m, 'AC3')],
      [/^(?:ddp|dd\+)[ .]?(\d\.\d)?$/i, m => channels(m, 'DDP')],
      [/^dd[ .]?(\d\.\d)?$/i, m => channels(m, 'DD')],
      [/^dts-?hd[ .]?(?:ma)?$/i, 'DTS-HD'],
      [/^dts$/i, 'DTS'],
      [/^truehd$/i, 'TrueHD'],
      [/^atmos$/i, 'Atmos'],
      [/^flac$/i, 'FLAC'],
      [/^mp3$/i, 'MP3'],
      [/^opus$/i, 'Opus'],
    ]),
  },
  {
    kind: 'hdr',
    maxWords: 2,
    match: table([
      [/^hdr10(\+|plus)$/i, 'HDR10+'],
      [/^hdr(10)?$/i, m => (m[1] ? 'HDR10' : 'HDR')],
      [/^(dv|dovi|dolby[ .]vision)$/i, 'DV'],
      [/^(10|8)-?bit$/i, m => `${m[1]}bit`],
    ]),
  },
  {
    kind: 'edition',
    maxWords: 2,
    match: table([
      [/^extended([ .](cut|edition))?$/i, 'Extended'],
      [/^directors?'?s?[ .]cut$/i, "Director's Cut"],
      [/^theatrical([ .]cut)?$/i, 'Theatrical'],
      [/^(unrated|uncut|uncensored|remastered|imax|criterion|proper|repack|internal|limited)$/i, m => m[1].toUpperCase() === 'IMAX' ? 'IMAX' : m[1][0].toUpperCase() + m[1].slice(1).toLowerCase()],
    ]),
  },
  {
    kind: 'version',
    maxWords: 4,
    match: table([
      [/^v(\d+(?:\.\d+){0,3})$/i, m => m[1]],
      [/^(\d+\.\d+\.\d+(?:\.\d+)?)$/, m => m[1]],
    ]),
  },
  {
    kind: 'platform',
    maxWords: 2,
    match: table([
      [/^(x64|x86[_-]?64|amd64|win64)$/i, 'x64'],
      [/^(x86|win32|i386)$/i, 'x86'],
      [/^(arm64|aarch64)$/i, 'arm64'],
    ]),
  },
  {
    kind: 'platform',
    maxWords: 1,
    tailOnly: true,
    match: table([
      [/^(macos|osx|mac)$/i, 'macOS'],
      [/^linux$/i, 'Linux'],
      [/^windows$/i, 'Windows'],
      [/^android$/i, 'Android'],
    ]),
  },
  {
    kind: 'year',
    maxWords: 1,
    rightmostOnly: true,
    match: (text: string) => (/^(19|20)\d{2}$/.test(text) ? Number(text) : undefined),
  },
  {
    kind: 'subtitleLanguage',
    maxWords: 2,
    tailOnly: true,
    match: (text: string) => {
      if (/^e-?subs?$/i.test(text)) return 'en';
      if (/^vostfr$/i.test(text)) return 'fr';
      const m = text.match(/^([a-z]+)[ .-]?(subs?|subbed|subtitles?)$/i) ?? text.match(/^(?:subs?|subtitles?)[ .-]([a-z]+)$/i);
      return m ? languageOf(m[1]) : undefined;
    },
  },
  {
    kind: 'language',
    maxWords: 1,
    tailOnly: true,
    match: (text: string) => languageOf(text),
  },
];

export const ATTRIBUTE_KINDS: readonly AttributeKind[] = [
  'quality', 'source', 'service', 'codec', 'hdr', 'edition', 'version', 'platform',
  'year', 'subtitleLanguage', 'language', 'releaseGroup',
];

interface Slot {
  token: Token;
  /** Top-level index of the token, or of the bracketed group holding it */
  top: number;
  /** Source order across brackets */
  ordinal: number;
}

export interface Extraction {
  readonly tokens: readonly Token[];
  readonly attributes: AttributeSet;
  /** Unconsumed words and bracketed groups, in source order */
  readonly titleTokens: readonly Token[];
  /** Top-level indices consumed by a recognizer */
  readonly consumed: ReadonlySet<number>;
  /** Top-level index of the occurrence each attribute was taken from */
  readonly positions: Readonly<Partial<Record<AttributeKind, number>>>;
}

/** Each run is a top-level or bracketed token sequence with its words' slots */
function collectRuns(tokens: readonly Token[]) {
  const runs: { seq: readonly Token[]; slots: Map<Token, Slot> }[] = [];
  let ordinal = 0;
  const visit = (seq: readonly Token[], top: number | undefined) => {
    const slots = new Map<Token, Slot>();
    runs.push({ seq, slots });
    for (const t of seq) {
      const owner = top ?? t.index;
      if (t.kind === 'word') slots.set(t, { token: t, top: owner, ordinal: ordinal++ });
      else if (t.kind === 'bracketed' && t.children) visit(t.children, owner);
    }
  };
  visit(tokens.filter(t => t.kind !== 'extension'), undefined);
  return runs;
}

export function extractAttributes(tokens: readonly Token[]): Extraction {
  const runs = collectRuns(tokens);
  const taken = new Map<Token, AttributeKind>();
  const values: Partial<Record<AttributeKind, { value: Value; ordinal: number; top: number }>> = {};
  let firstTaken = Infinity;

  const record = (kind: AttributeKind, value: Value, words: Slot[]) => {
    const ordinal = words[0].ordinal;
    const prev = values[kind];
    if (!prev || prev.ordinal <= ordinal) values[kind] = { value, ordinal, top: words[0].top };
    for (const w of words) {
      taken.set(w.token, kind);
      // a year sits inside titles too often to mark where the technical tail begins
      if (kind !== 'year') firstTaken = Math.min(firstTaken, w.ordinal);
    }
  };

  for (const r of RECOGNIZERS) {
    const limit = firstTaken;
    const found: { value: Value; words: Slot[] }[] = [];
    for (const { seq, slots } of runs) {
      for (let i = 0; i < seq.length; i++) {
        const start = slots.get(seq[i]);
        if (!start || taken.has(seq[i])) continue;
        if (r.tailOnly && !(start.ordinal > limit)) continue;
        if (r.kind === 'year' && start.ordinal === 0) continue;
        // widest window first: word (separator word)*
        let hit: { value: Value; words: Slot[]; end: number } | undefined;
        const words: Slot[] = [start];
        let text = seq[i].raw;
        let j = i;
        const windows: { text: string; words: Slot[]; end: number }[] = [{ text, words: [...words], end: i }];
        while (words.length < r.maxWords && j + 2 < seq.length) {
          const sep = seq[j + 1];
          const next = seq[j + 2];
          const slot = slots.get(next);
          if (sep.kind !== 'separator' || !slot || taken.has(next)) break;
          text += sep.raw + next.raw;
          words.push(slot);
          j += 2;
          windows.push({ text, words: [...words], end: j });
        }
        for (const w of windows.reverse()) {
          const value = r.match(w.text);
          if (value !== undefined) { hit = { value, words: w.words, end: w.end }; break; }
        }
        if (!hit) continue;
        found.push({ value: hit.value, words: hit.words });
        if (!r.rightmostOnly) {
          for (const w of hit.words) taken.set(w.token, r.kind);
        }
        i = hit.end;
      }
    }
    if (!found.length) continue;
    if (r.rightmostOnly) {
      const last = found.reduce((a, b) => (b.words[0].ordinal > a.words[0].ordinal ? b : a));
      record(r.kind, last.value, last.words);
    } else {
      for (const f of found) record(r.kind, f.value, f.words);
    }
  }

  const top = runs[0];
  const consumed = new Set<number>();
  for (const t of top.seq) {
    if (t.kind === 'word' && taken.has(t)) consumed.add(t.index);
    if (t.kind === 'bracketed' && t.children && isFullyTaken(t.children, taken)) consumed.add(t.index);
  }

  const group = findReleaseGroup(top.seq, consumed, taken);
  if (group) {
    consumed.add(group.index);
    values.releaseGroup = { value: group.value, ordinal: Infinity, top: group.index };
  }

  const attributes: Partial<AttributeValues> = {};
  const positions: Partial<Record<AttributeKind, number>> = {};
  for (const kind of ATTRIBUTE_KINDS) {
    const v = values[kind];
    if (!v) continue;
    assign(attributes, kind, v.value);
    positions[kind] = v.top;
  }

  const titleTokens = top.seq.filter(t => (t.kind === 'word' || t.kind === 'bracketed') && !consumed.has(t.index));
  return Object.freeze({
    tokens,
    attributes: Object.freeze(attributes),
    titleTokens: Object.freeze(titleTokens),
    consumed,
    positions: Object.freeze(positions),
  });
}

function assign(out: Partial<AttributeValues>, kind: AttributeKind, value: Value) {
  if (kind === 'year') {
    if (typeof value === 'number') out.year = value;
    return;
  }
  out[kind] = String(value);
}

function isFullyTaken(children: readonly Token[], taken: Map<Token, AttributeKind>): boolean {
  let words = 0;
  for (const c of children) {
    if (c.kind === 'word') {
      words++;
      if (!taken.has(c)) return false;
    } else if (c.kind === 'bracketed' && c.children && !isFullyTaken(c.children, taken)) {
      return false;
    }
  }
  return words > 0;
}

function isTechnical(t: Token, taken: Map<Token, AttributeKind>): boolean {
  if (t.kind === 'word') {
    const kind = taken.get(t);
    return kind !== undefined && kind !== 'year';
  }
  return (t.children ?? []).some(c => isTechnical(c, taken));
}

function findReleaseGroup(seq: readonly Token[], consumed: Set<number>, taken: Map<Token, AttributeKind>) {
  const entries = seq.filter(t => t.kind !== 'separator');
  const last = entries[entries.length - 1];
  if (!last) return undefined;

  // x264-GROUP; a year before the dash is a title ("Movie (1999) - Interview")
  if (last.kind === 'word' && last.index >= 2 && !consumed.has(last.index)) {
    const sep = seq[last.index - 1];
    const before = seq[last.index - 2];
    if (sep.kind === 'separator' && sep.raw.includes('-') && consumed.has(before.index) && isTechnical(before, taken)) {
      return { index: last.index, value: last.raw };
    }
  }

  // [GROUP] at either end
  const tag = (t: Token | undefined) => {
    if (!t || t.kind !== 'bracketed' || !t.raw.startsWith('[') || consumed.has(t.index)) return undefined;
    const inner = t.raw.slice(1, -1).trim();
    const words = (t.children ?? []).filter(c => c.kind === 'word');
    if (!inner || /\s/.test(inner) || /^\d+$/.test(inner) || words.some(w => taken.has(w))) return undefined;
    return { index: t.index, value: inner };
  };
  return tag(last) ?? (entries.length > 1 ? tag(entries[0]) : undefined);
}
