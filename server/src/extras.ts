import type { Token } from './types.js';
import type { EpisodeMarker } from './kind.js';
import { joinTokens, tokenize } from './tokenize.js';

interface Marker {
  words: readonly string[];
  label: string;
}

// Longer phrases first so "deleted scenes" wins over a shorter overlap.
const MARKERS: readonly Marker[] = [
  { words: ['behind', 'the', 'scenes'], label: 'Behind the Scenes' },
  { words: ['special', 'features'], label: 'Special Features' },
  { words: ['deleted', 'scenes'], label: 'Deleted Scenes' },
  { words: ['deleted', 'scene'], label: 'Deleted Scenes' },
  { words: ['making', 'of'], label: 'Making Of' },
  { words: ['gag', 'reel'], label: 'Gag Reel' },
  { words: ['bts'], label: 'Behind the Scenes' },
  { words: ['interviews'], label: 'Interview' },
  { words: ['interview'], label: 'Interview' },
  { words: ['featurettes'], label: 'Featurette' },
  { words: ['featurette'], label: 'Featurette' },
  { words: ['bonus'], label: 'Bonus' },
  { words: ['extras'], label: 'Extras' },
  { words: ['extra'], label: 'Extras' },
  { words: ['commentary'], label: 'Commentary' },
  { words: ['bloopers'], label: 'Bloopers' },
  { words: ['blooper'], label: 'Bloopers' },
];

const ARTICLES = new Set(['the', 'a', 'an']);

export interface ExtrasResult {
  readonly isExtra: boolean;
  readonly parentHint?: string;
  readonly extraType?: string;
  /** Top-level indices of the marker words, so resolvers can leave them out of titles */
  readonly markerIndices: ReadonlySet<number>;
}

interface Hit {
  /** Position in the word list */
  at: number;
  length: number;
  label: string;
}

function findMarkers(words: readonly Token[]): Hit[] {
  const hits: Hit[] = [];
  for (let i = 0; i < words.length; i++) {
    const m = MARKERS.find(mk => mk.words.every((w, k) => words[i + k]?.norm === w));
    if (!m) continue;
    hits.push({ at: i, length: m.words.length, label: m.label });
    i += m.words.length - 1;
  }
  return hits;
}

/** Label of the first marker in a directory name, if any */
function markerInDirectory(dir: string | undefined): string | undefined {
  if (!dir) return undefined;
  const words = tokenize(dir).filter(t => t.kind === 'word');
  return findMarkers(words)[0]?.label;
}

/**
 * Flag extra content and pick the parent-work hint: the longest run of title
 * words not broken by a marker (or an episode code), preferring runs that come
 * before the first marker.
 */
export function detectExtras(titleTokens: readonly Token[], episode?: EpisodeMarker, dirs: readonly string[] = []): ExtrasResult {
  const words = titleTokens.filter(t => t.kind === 'word');
  const hits = findMarkers(words);
  const fromDir = hits.length ? undefined : markerInDirectory(dirs[dirs.length - 1]);
  if (!hits.length && !fromDir) return { isExtra: false, markerIndices: new Set() };

  const markerAt = new Set<number>();
  for (const h of hits) for (let k = 0; k < h.length; k++) markerAt.add(h.at + k);
  const isBreak = (t: Token, i: number) =>
    markerAt.has(i) || (episode !== undefined && t.index >= episode.start && t.index <= episode.end);

  const runs: { tokens: Token[]; before: boolean }[] = [];
  let current: Token[] = [];
  const firstMarker = hits.length ? hits[0].at : Infinity;
  words.forEach((t, i) => {
    if (isBreak(t, i)) {
      if (current.length) runs.push({ tokens: current, before: i <= firstMarker });
      current = [];
    } else {
      current.push(t);
    }
  });
  if (current.length) runs.push({ tokens: current, before: firstMarker === Infinity });

  // "The Interview", "A Bonus": the marker word is the title itself
  if (hits.length && runs.length && runs.every(r => r.tokens.every(t => ARTICLES.has(t.norm)))) {
    return { isExtra: false, markerIndices: new Set() };
  }

  const longest = (list: typeof runs) =>
    list.reduce<(typeof runs)[number] | undefined>((best, r) => (!best || r.tokens.length > best.tokens.length ? r : best), undefined);
  const pick = longest(runs.filter(r => r.before)) ?? longest(runs);
  const hint = pick ? joinTokens(pick.tokens) : '';

  return {
    isExtra: true,
    extraType: hits.length ? hits[0].label : fromDir,
    ...(hint ? { parentHint: hint } : {}),
    markerIndices: new Set([...markerAt].map(i => words[i].index)),
  };
}
