import type { Token } from './types.js';

// Extensions we split off a file name. Anything else after the final dot is
// treated as part of the name, so "Movie.1999" or "Show.720p" never lose a token.
export const VIDEO_EXTENSIONS = new Set(['mkv', 'mp4', 'avi', 'mov', 'wmv', 'm4v', 'webm', 'mpg', 'mpeg', 'flv', 'm2ts', 'vob']);
export const AUDIO_EXTENSIONS = new Set(['mp3', 'flac', 'm4a', 'wav', 'aac', 'ogg', 'opus', 'wma', 'alac', 'aiff', 'ape']);
export const AUDIOBOOK_EXTENSIONS = new Set(['m4b', 'aax']);
/** Audio containers that are as likely to hold an audiobook as a song */
export const SHARED_AUDIOBOOK_EXTENSIONS = new Set(['mp3', 'm4a', 'ogg', 'opus']);
export const EBOOK_EXTENSIONS = new Set(['epub', 'mobi', 'azw', 'azw3', 'pdf', 'djvu', 'fb2', 'cbz', 'cbr']);
export const SOFTWARE_EXTENSIONS = new Set(['exe', 'msi', 'dmg', 'pkg', 'deb', 'rpm', 'appimage', 'apk', 'zip', 'rar', '7z', 'tar.gz', 'tar.bz2', 'tar.xz']);
/** Subtitle sidecars that travel with their video */
export const SUBTITLE_EXTENSIONS = new Set(['srt', 'ass', 'ssa', 'sub', 'vtt']);
const OTHER_EXTENSIONS = new Set(['idx', 'nfo', 'txt', 'jpg', 'jpeg', 'png', 'iso']);

/** Extensions of the files a scan picks up */
export const MEDIA_EXTENSIONS: readonly string[] = [
  ...VIDEO_EXTENSIONS,
  ...AUDIO_EXTENSIONS,
  ...AUDIOBOOK_EXTENSIONS,
  ...EBOOK_EXTENSIONS,
  ...SOFTWARE_EXTENSIONS,
];

const KNOWN_EXTENSIONS = new Set([...MEDIA_EXTENSIONS, ...SUBTITLE_EXTENSIONS, ...OTHER_EXTENSIONS]);

const SEPARATOR_RE = /[._\-\s]/;
const CLOSERS: Record<string, string> = { '[': ']', '(': ')', '{': '}' };

export interface SplitPath {
  readonly dirs: readonly string[];
  readonly file: string;
}

export function splitPath(fullPath: string): SplitPath {
  const parts = String(fullPath).replace(/\\+/g, '/').split('/').filter(p => p.trim().length > 0);
  const file = parts.pop() ?? '';
  return { dirs: parts, file };
}

export function splitExtension(file: string): { stem: string; extension?: string } {
  const m = file.match(/\.(tar\.(?:gz|bz2|xz))$/i) ?? file.match(/\.([A-Za-z0-9]{1,8})$/);
  // a bare ".mkv" is an extension with an empty stem
  if (!m || m.index === undefined) return { stem: file };
  const ext = m[1].toLowerCase();
  if (!KNOWN_EXTENSIONS.has(ext)) return { stem: file };
  return { stem: file.slice(0, m.index), extension: ext };
}

function findCloser(text: string, start: number): number {
  const open = text[start];
  const close = CLOSERS[open];
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    if (text[i] === open) depth++;
    else if (text[i] === close) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function scan(text: string): Token[] {
  const tokens: Token[] = [];
  let word = '';
  let sep = '';

  const push = (kind: Token['kind'], raw: string, extra?: Pick<Token, 'children' | 'norm'>) => {
    const norm = extra?.norm ?? (kind === 'separator' ? (raw.includes('-') ? '-' : ' ') : raw.toLowerCase());
    tokens.push(Object.freeze({ kind, raw, norm, index: tokens.length, ...(extra?.children ? { children: extra.children } : {}) }));
  };
  const flushWord = () => { if (word) { push('word', word); word = ''; } };
  const flushSep = () => { if (sep) { push('separator', sep); sep = ''; } };

  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch in CLOSERS) {
      const end = findCloser(text, i);
      if (end > i) {
        flushWord();
        flushSep();
        const inner = text.slice(i + 1, end);
        push('bracketed', text.slice(i, end + 1), {
          norm: inner.trim().toLowerCase(),
          children: Object.freeze(scan(inner)),
        });
        i = end + 1;
        continue;
      }
    }
    // stray brackets separate words like any other punctuation between tags
    if (SEPARATOR_RE.test(ch) || ch === ']' || ch === ')' || ch === '}' || ch in CLOSERS) {
      flushWord();
      sep += ch;
    } else {
      flushSep();
      word += ch;
    }
    i++;
  }
  flushWord();
  flushSep();
  return tokens;
}

/**
 * Split a file name into words, separators, bracketed groups and a trailing
 * extension token. Total: any string yields a (possibly empty) sequence.
 */
export function tokenize(file: string): readonly Token[] {
  const { stem, extension } = splitExtension(String(file ?? ''));
  const tokens = scan(stem);
  if (extension) {
    tokens.push(Object.freeze({ kind: 'extension', raw: extension, norm: extension, index: tokens.length }));
  }
  return Object.freeze(tokens);
}

export function extensionOf(tokens: readonly Token[]): string | undefined {
  const last = tokens[tokens.length - 1];
  return last && last.kind === 'extension' ? last.norm : undefined;
}

/** Display text of a run of title tokens: words and bracketed groups joined by single spaces */
export function joinTokens(tokens: readonly Token[]): string {
  return tokens
    .filter(t => t.kind === 'word' || t.kind === 'bracketed')
    .map(t => t.raw)
    .join(' ')
    .replace(/\s{2,}/g, ' ')
    .trim();
}
