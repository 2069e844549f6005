import type {
  AttributeSet,
  BookDetails,
  ClassificationRecord,
  ClassifyHints,
  Confidence,
  MediaKind,
  ParentLink,
} from './types.js';
import type { ClassifyResult, MalformedReason } from './errors.js';
import { malformed } from './errors.js';
import { log } from './logging.js';
import { extensionOf, splitExtension, splitPath, tokenize } from './tokenize.js';
import { extractAttributes } from './attributes.js';
import { decideKind } from './kind.js';
import { detectExtras } from './extras.js';
import type { ResolveContext } from './resolvers.js';
import { displayCase, resolveBook, resolveFranchise, resolveMusic, resolveSeries, resolveSoftware } from './resolvers.js';
import { DEFAULT_FOLDERS, formatCanonical, relativePathFor, sanitize } from './naming.js';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function checkPath(input: unknown): MalformedReason | undefined {
  if (typeof input !== 'string' || !input.trim()) return 'empty';
  if (input.includes('\u0000') || LONE_SURROGATE.test(input)) return 'invalid-text';
  if (!splitPath(input).file) return 'no-file-name';
  return undefined;
}

/** Everything a record is built from; the canonical name and placement are derived */
export interface RecordParts {
  readonly path: string;
  readonly stem: string;
  readonly extension?: string;
  readonly title: string;
  readonly kind: MediaKind;
  readonly attributes: AttributeSet;
  readonly link: ParentLink;
  readonly confidence: Confidence;
  readonly signals: readonly string[];
  readonly book?: BookDetails;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/** Format, place and freeze a record */
export function assembleRecord(parts: RecordParts, hints: ClassifyHints = {}): ClassificationRecord {
  const formatted = formatCanonical(parts);
  const canonicalName = formatted || sanitize(parts.stem) || 'Untitled';
  const relativePath = relativePathFor(parts, canonicalName, parts.extension, hints.folders ?? DEFAULT_FOLDERS);
  return deepFreeze({
    path: parts.path,
    title: parts.title,
    kind: { ...parts.kind },
    attributes: { ...parts.attributes },
    link: { ...parts.link },
    canonicalName,
    relativePath,
    extension: parts.extension,
    confidence: parts.confidence,
    signals: [...parts.signals],
    book: parts.book ? { ...parts.book, authors: [...parts.book.authors] } : undefined,
  });
}

/**
 * Classify one source path. Total for every string: only an empty path, a
 * path that is not valid text, or one without a file name is declined.
 */
export function classifyPath(input: string, hints: ClassifyHints = {}): ClassifyResult {
  const reason = checkPath(input);
  if (reason) {
    log('debug', `classifyPath: declined ${JSON.stringify(input)} (${reason})`);
    return { ok: false, error: malformed(typeof input === 'string' ? input : '', reason) };
  }

  const { dirs, file } = splitPath(input);
  const tokens = tokenize(file);
  const extension = extensionOf(tokens);
  const extraction = extractAttributes(tokens);
  const decision = decideKind(extraction, extension, dirs, hints);
  const video = decision.type === 'movie' || decision.type === 'tv-episode';
  const extras = video
    ? detectExtras(extraction.titleTokens, decision.episode, dirs)
    : { isExtra: false, markerIndices: new Set<number>() };
  const ctx: ResolveContext = { extraction, decision, extras, dirs, hints };
  const signals = [...decision.signals];

  const kind: MediaKind = {
    type: decision.type,
    isExtra: extras.isExtra,
    parentHint: extras.parentHint ? displayCase(extras.parentHint) : undefined,
    extraType: extras.extraType,
  };
  if (extras.isExtra) signals.push(`extra:${extras.extraType ?? 'unknown'}`);

  let link: ParentLink;
  let title: string;
  let book: BookDetails | undefined;
  switch (decision.type) {
    case 'tv-episode': {
      let tv = resolveSeries(ctx);
      if (tv.season === undefined && tv.episode !== undefined && hints.defaultSeason !== undefined) {
        tv = { ...tv, season: hints.defaultSeason };
        signals.push('default-season');
      }
      link = tv;
      title = tv.showName;
      break;
    }
    case 'ebook':
    case 'audiobook': {
      const resolved = resolveBook(ctx);
      link = resolved.link;
      title = resolved.title;
      book = { authors: resolved.authors, publicationYear: extraction.attributes.year, format: decision.type };
      break;
    }
    case 'music-track': {
      const music = resolveMusic(ctx);
      link = music;
      title = music.trackTitle;
      break;
    }
    case 'software': {
      const sw = resolveSoftware(ctx);
      link = sw;
      title = sw.name;
      break;
    }
    case 'movie': {
      const movie = resolveFranchise(ctx);
      if (movie.franchise) signals.push(`franchise:${movie.franchise}`);
      link = movie;
      title = movie.baseTitle;
      break;
    }
  }

  const record = assembleRecord({
    path: input,
    stem: splitExtension(file).stem,
    extension,
    title,
    kind,
    attributes: extraction.attributes,
    link,
    confidence: decision.confidence,
    signals,
    book,
  }, hints);
  return { ok: true, record };
}

/** Classify a batch; a declined path is reported in place and does not stop the rest */
export function classifyMany(paths: readonly string[], hints: ClassifyHints = {}): ClassifyResult[] {
  return paths.map(p => {
    const result = classifyPath(p, hints);
    if (!result.ok) log('warn', `${result.error.message}: ${JSON.stringify(p)}`);
    return result;
  });
}

/** Stable JSON text of a record; absent fields are left out */
export function serializeRecord(record: ClassificationRecord): string {
  return JSON.stringify(record);
}
