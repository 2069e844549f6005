import type {
  BookDetails,
  ClassificationRecord,
  ClassifyHints,
  MediaKind,
  MediaType,
  ParentLink,
} from './types.js';
import type { ClassifyResult } from './errors.js';
import { errorMessage } from './errors.js';
import { log } from './logging.js';
import { assembleRecord, classifyPath } from './parse.js';
import {
  AUDIO_EXTENSIONS,
  AUDIOBOOK_EXTENSIONS,
  EBOOK_EXTENSIONS,
  SHARED_AUDIOBOOK_EXTENSIONS,
  SOFTWARE_EXTENSIONS,
  VIDEO_EXTENSIONS,
  splitExtension,
  splitPath,
  tokenize,
} from './tokenize.js';
import { extractAttributes } from './attributes.js';

export const DEFAULT_CANDIDATE_TIMEOUT_MS = 5000;

export interface CandidateRequest {
  readonly path: string;
  readonly titleTokens: readonly string[];
  readonly kind: MediaType;
  readonly extension?: string;
}

/** One outside opinion on a file; every field is optional */
export interface Candidate {
  readonly type?: MediaType;
  readonly title?: string;
  readonly year?: number;
  readonly showName?: string;
  readonly season?: number;
  readonly episode?: number;
  readonly episodeTitle?: string;
  readonly franchise?: string;
  readonly seriesName?: string;
  readonly seriesIndex?: number;
  readonly authors?: readonly string[];
  readonly artist?: string;
  readonly trackNumber?: number;
  readonly version?: string;
  readonly platform?: string;
  readonly isExtra?: boolean;
  readonly extraType?: string;
  readonly parentHint?: string;
}

export interface CandidateClassifier {
  readonly name: string;
  classify(request: CandidateRequest, signal: AbortSignal): Promise<Candidate | undefined>;
}

/**
 * Ask the classifier behind a timeout. Resolves to undefined on timeout,
 * error or an empty answer; the timer is cleared either way.
 */
export async function askCandidate(
  classifier: CandidateClassifier,
  request: CandidateRequest,
  timeoutMs = DEFAULT_CANDIDATE_TIMEOUT_MS,
): Promise<Candidate | undefined> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<undefined>(resolve => {
    timer = setTimeout(() => {
      log('warn', `candidate ${classifier.name} timed out after ${timeoutMs}ms for ${request.path}`);
      resolve(undefined);
      controller.abort();
    }, timeoutMs);
  });
  try {
    const answer = await Promise.race([classifier.classify(request, controller.signal), timeout]);
    if (answer && Object.keys(answer).length) return answer;
    return undefined;
  } catch (e) {
    log('warn', `candidate ${classifier.name} failed for ${request.path}: ${errorMessage(e)}`);
    return undefined;
  } finally {
    clearTimeout(timer);
  }
}

/** Whether a file's container can hold the given kind at all */
export function containerAllows(type: MediaType, extension: string | undefined): boolean {
  if (!extension) return true;
  switch (type) {
    case 'movie':
    case 'tv-episode':
      return VIDEO_EXTENSIONS.has(extension);
    case 'music-track':
      return AUDIO_EXTENSIONS.has(extension);
    case 'audiobook':
      return AUDIOBOOK_EXTENSIONS.has(extension) || SHARED_AUDIOBOOK_EXTENSIONS.has(extension);
    case 'ebook':
      return EBOOK_EXTENSIONS.has(extension);
    case 'software':
      return SOFTWARE_EXTENSIONS.has(extension);
  }
}

const text = (s: string | undefined) => (s && s.trim() ? s.trim() : undefined);

function seedLink(type: MediaType, title: string): ParentLink {
  switch (type) {
    case 'movie': return { type: 'movie', baseTitle: title };
    case 'tv-episode': return { type: 'tv', showName: title };
    case 'ebook':
    case 'audiobook': return { type: 'book', isStandalone: true };
    case 'music-track': return { type: 'music', trackTitle: title };
    case 'software': return { type: 'software', name: title };
  }
}

function titleOf(link: ParentLink, fallback: string, bookTitle: string | undefined): string {
  switch (link.type) {
    case 'movie': return link.baseTitle;
    case 'tv': return link.showName;
    case 'book': return bookTitle || fallback;
    case 'music': return link.trackTitle;
    case 'software': return link.name;
  }
}

/**
 * Merge a candidate into a local record as one vote. The candidate may only
 * replace the kind of a low-confidence record, and only with a kind the
 * file's container can hold; otherwise it fills fields the rules left empty.
 */
export function mergeCandidate(
  record: ClassificationRecord,
  candidate: Candidate,
  source: string,
  hints: ClassifyHints = {},
): ClassificationRecord {
  const local = record.kind.type;
  const replace = record.confidence === 'low' &&
    candidate.type !== undefined &&
    candidate.type !== local &&
    containerAllows(candidate.type, record.extension) &&
    (candidate.type !== 'tv-episode' || candidate.episode !== undefined);
  const type = replace && candidate.type ? candidate.type : local;
  // a replacing vote supplies the structure, a filling vote only the gaps
  function pick<T>(mine: T | undefined, theirs: T | undefined): T | undefined {
    return replace ? theirs ?? mine : mine ?? theirs;
  }
  const pickText = (mine: string | undefined, theirs: string | undefined) => pick(text(mine), text(theirs));

  const base = replace ? seedLink(type, record.title) : record.link;
  let link: ParentLink;
  switch (base.type) {
    case 'movie':
      link = {
        type: 'movie',
        baseTitle: pickText(base.baseTitle, candidate.title) ?? '',
        year: pick(base.year, candidate.year),
        franchise: pickText(base.franchise, candidate.franchise),
      };
      break;
    case 'tv':
      link = {
        type: 'tv',
        showName: pickText(base.showName, candidate.showName ?? candidate.title) ?? '',
        season: pick(base.season, candidate.season),
        episode: pick(base.episode, candidate.episode),
        episodes: base.episodes,
        episodeTitle: pickText(base.episodeTitle, candidate.episodeTitle),
        showYear: pick(base.showYear, candidate.year),
      };
      break;
    case 'book': {
      const seriesName = text(candidate.seriesName);
      link = base.isStandalone && seriesName && candidate.seriesIndex !== undefined
        ? { type: 'book', isStandalone: false, seriesName, seriesIndex: candidate.seriesIndex }
        : base;
      break;
    }
    case 'music':
      link = {
        type: 'music',
        artist: pickText(base.artist, candidate.artist),
        trackNumber: pick(base.trackNumber, candidate.trackNumber),
        trackTitle: pickText(base.trackTitle, candidate.title) ?? '',
      };
      break;
    case 'software':
      link = {
        type: 'software',
        name: pickText(base.name, candidate.title) ?? '',
        version: pickText(base.version, candidate.version),
        platform: pickText(base.platform, candidate.platform),
      };
      break;
  }

  const video = type === 'movie' || type === 'tv-episode';
  const kind: MediaKind = video
    ? {
        type,
        isExtra: record.kind.isExtra || candidate.isExtra === true,
        parentHint: text(record.kind.parentHint) ?? text(candidate.parentHint),
        extraType: text(record.kind.extraType) ?? text(candidate.extraType),
      }
    : { type, isExtra: false };

  let book: BookDetails | undefined;
  let bookTitle: string | undefined;
  if (type === 'ebook' || type === 'audiobook') {
    const authors = record.book?.authors.length ? record.book.authors : (candidate.authors ?? []).map(a => a.trim()).filter(Boolean);
    book = { authors, publicationYear: record.book?.publicationYear ?? candidate.year, format: type };
    bookTitle = replace ? text(candidate.title) ?? record.title : record.title || text(candidate.title);
  }

  const signals = [...record.signals, `candidate:${source}`];
  if (replace) signals.push(`kind:${local}->${type}`);
  const { file } = splitPath(record.path);

  return assembleRecord({
    path: record.path,
    stem: splitExtension(file).stem,
    extension: record.extension,
    title: titleOf(link, record.title, bookTitle),
    kind,
    attributes: record.attributes,
    link,
    confidence: record.confidence,
    signals,
    book,
  }, hints);
}

/**
 * Classify with the local rules, then consult the candidate classifier as one
 * more vote. Any candidate failure leaves the local record as the answer.
 */
export async function classifyWithAssist(
  input: string,
  hints: ClassifyHints = {},
  classifier?: CandidateClassifier,
  timeoutMs = DEFAULT_CANDIDATE_TIMEOUT_MS,
): Promise<ClassifyResult> {
  const local = classifyPath(input, hints);
  if (!local.ok || !classifier) return local;
  const { record } = local;
  const titleTokens = extractAttributes(tokenize(splitPath(input).file)).titleTokens.map(t => t.raw);
  const candidate = await askCandidate(classifier, {
    path: input,
    titleTokens,
    kind: record.kind.type,
    extension: record.extension,
  }, timeoutMs);
  if (!candidate) return local;
  return { ok: true, record: mergeCandidate(record, candidate, classifier.name, hints) };
}
