import type { Confidence, MediaType, Token } from './types.js';
import type { Extraction } from './attributes.js';
import {
  AUDIO_EXTENSIONS,
  AUDIOBOOK_EXTENSIONS,
  EBOOK_EXTENSIONS,
  SHARED_AUDIOBOOK_EXTENSIONS,
  SOFTWARE_EXTENSIONS,
  VIDEO_EXTENSIONS,
} from './tokenize.js';
import { log } from './logging.js';

const SXXEXX = /^s(\d{1,2})e(\d{1,3})((?:e\d{1,3})*)$/i;
const SXX = /^s(\d{1,2})$/i;
const EXX = /^e(\d{1,3})$/i;
const XXxYY = /^(\d{1,2})x(\d{1,3})$/i;
const NUMBER = /^\d{1,3}$/;
const AUDIOBOOK_MARKERS = new Set(['audiobook', 'audiobooks', 'unabridged', 'abridged', 'narrated']);
const LONG_AUDIO_SECONDS = 2 * 60 * 60;
const LONG_AUDIO_BYTES = 150 * 1024 * 1024;
const FEATURE_SECONDS = 60 * 60;

/** What the caller knows about the file itself, beyond its name */
export interface MediaFacts {
  readonly fileSize?: number;
  readonly durationSeconds?: number;
}

export interface EpisodeMarker {
  /** Top-level index of the first and last token of the marker */
  readonly start: number;
  readonly end: number;
  readonly season?: number;
  readonly episodes: readonly number[];
}

export interface KindDecision {
  readonly type: MediaType;
  readonly confidence: Confidence;
  /** Evidence in the order it was weighed */
  readonly signals: readonly string[];
  readonly episode?: EpisodeMarker;
}

/** Find the first season/episode pattern among the title words */
export function findEpisodeMarker(titleTokens: readonly Token[]): EpisodeMarker | undefined {
  const words = titleTokens.filter(t => t.kind === 'word');
  for (let i = 0; i < words.length; i++) {
    const w = words[i];
    const next = words[i + 1];
    let m = w.raw.match(SXXEXX);
    if (m) {
      const more = [...m[3].matchAll(/e(\d{1,3})/gi)].map(x => Number(x[1]));
      return { start: w.index, end: w.index, season: Number(m[1]), episodes: [Number(m[2]), ...more] };
    }
    m = w.raw.match(XXxYY);
    if (m) return { start: w.index, end: w.index, season: Number(m[1]), episodes: [Number(m[2])] };
    if (next) {
      const s = w.raw.match(SXX);
      const e = next.raw.match(EXX);
      if (s && e) return { start: w.index, end: next.index, season: Number(s[1]), episodes: [Number(e[1])] };
    }
    // Season 1 Episode 2
    if (w.norm === 'season' && next && NUMBER.test(next.raw) && words[i + 2]?.norm === 'episode' && words[i + 3] && NUMBER.test(words[i + 3].raw)) {
      return { start: w.index, end: words[i + 3].index, season: Number(next.raw), episodes: [Number(words[i + 3].raw)] };
    }
    if (w.norm === 'episode' && next && NUMBER.test(next.raw)) {
      return { start: w.index, end: next.index, episodes: [Number(next.raw)] };
    }
  }
  return undefined;
}

/**
 * Track/album shape of a music file name: a leading track number, "Track N",
 * "CD N"/"Disc N", or an "Artist - Title" dash between title words.
 */
export function hasTrackShape(tokens: readonly Token[], titleTokens: readonly Token[]): boolean {
  const words = titleTokens.filter(t => t.kind === 'word');
  if (words.length >= 2 && NUMBER.test(words[0].raw)) return true;
  for (let i = 0; i < words.length; i++) {
    const w = words[i];
    if (/^(cd|disc)\d{1,2}$/i.test(w.raw)) return true;
    if ((w.norm === 'track' || w.norm === 'cd' || w.norm === 'disc') && words[i + 1] && NUMBER.test(words[i + 1].raw)) return true;
  }
  const title = new Set(titleTokens.map(t => t.index));
  return tokens.some(t =>
    t.kind === 'separator' && t.raw.includes('-') && title.has(t.index - 1) && title.has(t.index + 1));
}

// songs rarely run two hours; a size is only trusted when no duration is known
function isLongAudio(facts: MediaFacts) {
  if (facts.durationSeconds !== undefined) return facts.durationSeconds >= LONG_AUDIO_SECONDS;
  return facts.fileSize !== undefined && facts.fileSize >= LONG_AUDIO_BYTES;
}

function hasAudiobookMarker(titleTokens: readonly Token[], dirs: readonly string[]) {
  return titleTokens.some(t => AUDIOBOOK_MARKERS.has(t.norm)) ||
    dirs.some(d => /\baudio-?books?\b/i.test(d));
}

/**
 * Decide the primary media kind. First match wins:
 * book extensions (and long audio in a container audiobooks share),
 * season/episode pattern, audio with track shape, software extensions,
 * then the movie default.
 */
export function decideKind(
  extraction: Extraction,
  extension: string | undefined,
  dirs: readonly string[] = [],
  facts: MediaFacts = {},
): KindDecision {
  const { titleTokens, tokens, attributes } = extraction;
  const ext = extension ?? '';
  const episode = findEpisodeMarker(titleTokens);
  const signals: string[] = [];
  let decision: KindDecision;

  if (EBOOK_EXTENSIONS.has(ext)) {
    decision = { type: 'ebook', confidence: 'high', signals: [`extension:${ext}`] };
  } else if (AUDIOBOOK_EXTENSIONS.has(ext)) {
    decision = { type: 'audiobook', confidence: 'high', signals: [`extension:${ext}`] };
  } else if (SHARED_AUDIOBOOK_EXTENSIONS.has(ext) && hasAudiobookMarker(titleTokens, dirs)) {
    decision = { type: 'audiobook', confidence: 'high', signals: [`extension:${ext}`, 'audiobook-marker'] };
  } else if (SHARED_AUDIOBOOK_EXTENSIONS.has(ext) && !episode && isLongAudio(facts)) {
    decision = { type: 'audiobook', confidence: 'low', signals: [`extension:${ext}`, 'long-audio'] };
  } else if (episode) {
    decision = { type: 'tv-episode', confidence: 'high', signals: ['episode-pattern'], episode };
  } else if (AUDIO_EXTENSIONS.has(ext) && hasTrackShape(tokens, titleTokens)) {
    decision = { type: 'music-track', confidence: 'high', signals: [`extension:${ext}`, 'track-shape'] };
  } else if (SOFTWARE_EXTENSIONS.has(ext)) {
    decision = { type: 'software', confidence: 'high', signals: [`extension:${ext}`] };
  } else if (AUDIO_EXTENSIONS.has(ext)) {
    decision = { type: 'music-track', confidence: 'low', signals: [`extension:${ext}`, 'default'] };
  } else {
    const video = VIDEO_EXTENSIONS.has(ext);
    const looksReleased = video &&
      (attributes.year !== undefined || attributes.quality !== undefined || attributes.source !== undefined);
    const featureLength = video && facts.durationSeconds !== undefined && facts.durationSeconds >= FEATURE_SECONDS;
    decision = {
      type: 'movie',
      confidence: looksReleased || featureLength ? 'high' : 'low',
      signals: featureLength ? ['default', 'feature-length'] : ['default'],
    };
  }

  signals.push(...decision.signals);
  // contradictory evidence is settled by the order above; say so and lower confidence
  const contradicted =
    (episode && decision.type !== 'tv-episode') ||
    (decision.type === 'tv-episode' && (AUDIO_EXTENSIONS.has(ext) || SOFTWARE_EXTENSIONS.has(ext)));
  if (contradicted) {
    signals.push('ambiguous');
    log('info', `decideKind: contradictory evidence for ${joinRaw(tokens)}; chose ${decision.type} (low confidence)`);
    return Object.freeze({ ...decision, confidence: 'low', signals: Object.freeze(signals) });
  }
  return Object.freeze({ ...decision, signals: Object.freeze(signals) });
}

function joinRaw(tokens: readonly Token[]) {
  return tokens.map(t => (t.kind === 'extension' ? `.${t.raw}` : t.raw)).join('');
}
