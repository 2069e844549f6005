import path from 'path';
import crypto from 'crypto';
import fg from 'fast-glob';
import type { ClassifyHints, ScanItem, Sidecar } from './types.js';
import type { OperationJournal } from './journal.js';
import type { TitleRegistry } from './registry.js';
import { classifyPath } from './parse.js';
import { languageCode } from './attributes.js';
import { MEDIA_EXTENSIONS, SUBTITLE_EXTENSIONS, VIDEO_EXTENSIONS, splitExtension } from './tokenize.js';
import { log } from './logging.js';

export function normalizePathForCache(p: string) {
  return String(p || '').replace(/\\+/g, '/');
}

export const idFromPath = (p: string) => crypto.createHash('sha1').update(p).digest('hex');

const SUBTITLE_DIR = /^(subs?|subtitles?)$/i;
const SUBTITLE_FLAGS = new Set(['forced', 'sdh', 'cc', 'hi']);

export interface ScanOptions {
  readonly root: string;
  /** Destination tree; skipped when it lives inside the source */
  readonly destRoot?: string;
  readonly hints?: ClassifyHints;
  /** Caller-owned registry; every classified record is remembered into it */
  readonly registry?: TitleRegistry;
  readonly journal?: OperationJournal;
}

interface Listed {
  path: string;
  size: number;
  ext: string;
  stem: string;
}

/**
 * Language of a subtitle named after its video: "Movie.en.srt",
 * "Movie.English.forced.srt". Undefined when the subtitle is not that
 * video's, a language of '' when it matches without one.
 */
export function subtitleLanguage(videoStem: string, subtitleStem: string): string | undefined {
  const video = videoStem.toLowerCase();
  const sub = subtitleStem.toLowerCase();
  if (sub === video) return '';
  if (!sub.startsWith(`${video}.`)) return undefined;
  const tags = sub.slice(video.length + 1).split('.').filter(Boolean);
  let language = '';
  for (const tag of tags) {
    const code = languageCode(tag);
    if (code && !language) language = code;
    else if (!SUBTITLE_FLAGS.has(tag)) return undefined;
  }
  return language;
}

/** Attach each subtitle to the video of the same name in its folder (or the folder above a Subs folder) */
function pairSubtitles(videos: readonly Listed[], subtitles: readonly Listed[]) {
  const byVideo = new Map<string, Sidecar[]>();
  const orphans: Listed[] = [];
  for (const sub of subtitles) {
    let dir = path.posix.dirname(sub.path);
    if (SUBTITLE_DIR.test(path.posix.basename(dir))) dir = path.posix.dirname(dir);
    let best: { video: Listed; language: string } | undefined;
    for (const video of videos) {
      if (path.posix.dirname(video.path) !== dir) continue;
      const language = subtitleLanguage(video.stem, sub.stem);
      if (language === undefined) continue;
      if (!best || video.stem.length > best.video.stem.length) best = { video, language };
    }
    if (!best) {
      orphans.push(sub);
      continue;
    }
    const list = byVideo.get(best.video.path) ?? [];
    list.push(best.language ? { path: sub.path, ext: sub.ext, language: best.language } : { path: sub.path, ext: sub.ext });
    byVideo.set(best.video.path, list);
  }
  return { byVideo, orphans };
}

/**
 * List media files under root and classify each by its path relative to the
 * root, so folder names give context. Files the journal already placed are
 * reported as skipped; subtitles travel with the video they are named after.
 */
export async function scanDirectory(opts: ScanOptions): Promise<ScanItem[]> {
  const root = path.resolve(opts.root);
  const pattern = `**/*.{${[...MEDIA_EXTENSIONS, ...SUBTITLE_EXTENSIONS].join(',')}}`;
  const ignore: string[] = [];
  if (opts.destRoot) {
    const rel = path.relative(root, path.resolve(opts.destRoot));
    if (rel && !rel.startsWith('..') && !path.isAbsolute(rel)) ignore.push(`${normalizePathForCache(rel)}/**`);
  }
  // stats come with the listing, so a file that vanishes afterwards is simply absent
  const entries = await fg(pattern, { cwd: root, absolute: true, suppressErrors: true, caseSensitiveMatch: false, ignore, stats: true });
  entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  log('info', `scan: ${entries.length} candidate files under ${root}`);

  const media: Listed[] = [];
  const subtitles: Listed[] = [];
  for (const entry of entries) {
    if (!entry.stats?.isFile()) {
      log('debug', `scan: skipping ${entry.path}, not a readable file`);
      continue;
    }
    const { stem, extension } = splitExtension(path.posix.basename(normalizePathForCache(entry.path)));
    const listed = { path: normalizePathForCache(entry.path), size: entry.stats.size, ext: extension ?? '', stem };
    (SUBTITLE_EXTENSIONS.has(listed.ext) ? subtitles : media).push(listed);
  }
  const { byVideo, orphans } = pairSubtitles(media.filter(m => VIDEO_EXTENSIONS.has(m.ext)), subtitles);

  const hints: ClassifyHints = { ...opts.hints, registry: opts.registry ?? opts.hints?.registry };
  const items: ScanItem[] = [];
  for (const f of media) {
    const item: ScanItem = { id: idFromPath(f.path), path: f.path, size: f.size, ext: f.ext };
    if (opts.journal?.has(f.path, f.size)) {
      items.push({ ...item, skipped: 'already placed' });
      continue;
    }
    const result = classifyPath(normalizePathForCache(path.relative(root, f.path)), { ...hints, fileSize: f.size });
    if (!result.ok) {
      log('warn', `scan: ${result.error.message}: ${f.path}`);
      items.push({ ...item, skipped: result.error.message });
      continue;
    }
    opts.registry?.remember(result.record);
    const sidecars = byVideo.get(f.path);
    items.push(sidecars ? { ...item, record: result.record, sidecars } : { ...item, record: result.record });
  }
  for (const sub of orphans) {
    items.push({ id: idFromPath(sub.path), path: sub.path, size: sub.size, ext: sub.ext, skipped: 'subtitle without a matching video' });
  }
  return items;
}
