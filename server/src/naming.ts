import path from 'path';
import type { AttributeSet, BookDetails, FolderNames, MediaKind, ParentLink } from './types.js';

export const DEFAULT_FOLDERS: FolderNames = Object.freeze({
  movies: 'Movies',
  tv: 'TV Shows',
  music: 'Music',
  software: 'Software',
  books: 'Books',
  extras: 'Extras',
});

export function sanitize(s: string | undefined) {
  if (!s) return '';
  // Keep the source spelling; only drop characters illegal in Windows/most
  // filesystem names and collapse whitespace.
  const cleaned = String(s).replace(/[<>:"/\\|?*\u0000-\u001F]/g, '');
  return cleaned.replace(/\s+/g, ' ').trim().replace(/^[. ]+|[. ]+$/g, '');
}

export function pad2(n: number) { return String(n).padStart(2, '0'); }

export interface NameParts {
  readonly kind: MediaKind;
  readonly link: ParentLink;
  readonly title: string;
  readonly attributes: AttributeSet;
  readonly book?: BookDetails;
}

const withYear = (name: string, year: number | undefined) => (year !== undefined && name ? `${name} (${year})` : name);
const joinDash = (parts: readonly (string | undefined)[]) => parts.filter((p): p is string => Boolean(p)).join(' - ');

export function episodeCode(season: number | undefined, episodes: readonly number[]) {
  if (!episodes.length) return season !== undefined ? `Season ${pad2(season)}` : '';
  if (season === undefined) return `Episode ${pad2(episodes[0])}`;
  return `S${pad2(season)}E${episodes.map(pad2).join('E')}`;
}

/**
 * Canonical display name for a classified item. Absent fields are dropped
 * together with their punctuation; the result may be empty when nothing
 * usable was found, and callers fall back to the source name.
 */
export function formatCanonical(parts: NameParts): string {
  const { kind, link, title, book } = parts;
  switch (link.type) {
    case 'movie': {
      const name = withYear(sanitize(link.baseTitle), link.year);
      return kind.isExtra ? joinDash([name, sanitize(kind.extraType)]) : name;
    }
    case 'tv': {
      const episodes = link.episodes ?? (link.episode !== undefined ? [link.episode] : []);
      return joinDash([
        withYear(sanitize(link.showName), link.showYear),
        episodeCode(link.season, episodes),
        kind.isExtra ? sanitize(kind.extraType) : undefined,
        sanitize(link.episodeTitle),
      ]);
    }
    case 'book': {
      const name = sanitize(title);
      if (!link.isStandalone) {
        return `${sanitize(link.seriesName)}/${joinDash([pad2(link.seriesIndex), name])}`;
      }
      const authors = (book?.authors ?? []).map(a => sanitize(a)).filter(Boolean);
      return authors.length && name ? `${name} (${authors.join(' & ')})` : name;
    }
    case 'music':
      return joinDash([
        link.trackNumber !== undefined ? pad2(link.trackNumber) : undefined,
        sanitize(link.artist),
        sanitize(link.trackTitle),
      ]);
    case 'software': {
      let name = sanitize(link.name);
      if (!name) return '';
      if (link.version) name += ` v${sanitize(link.version)}`;
      if (link.platform) name += ` (${sanitize(link.platform)})`;
      return name;
    }
  }
}

/** Category folders a canonical name is placed under, relative to the destination root */
export function placementFolder(parts: NameParts, folders: FolderNames = DEFAULT_FOLDERS): string {
  const { kind, link, book } = parts;
  switch (link.type) {
    case 'movie':
      if (kind.isExtra) return path.posix.join(folders.extras, folders.movies);
      return link.franchise ? path.posix.join(folders.movies, sanitize(link.franchise)) : folders.movies;
    case 'tv': {
      const show = withYear(sanitize(link.showName), link.showYear) || 'Unknown Show';
      if (kind.isExtra) return path.posix.join(folders.extras, folders.tv, show);
      return link.season !== undefined
        ? path.posix.join(folders.tv, show, `Season ${pad2(link.season)}`)
        : path.posix.join(folders.tv, show);
    }
    case 'book':
      if (link.isStandalone) return folders.books;
      return path.posix.join(folders.books, sanitize(link.seriesName), book?.format === 'audiobook' ? 'Audiobooks' : 'Ebooks');
    case 'music':
      return folders.music;
    case 'software':
      return folders.software;
  }
}

/** Destination suffix: category folders, file name, extension */
export function relativePathFor(parts: NameParts, canonicalName: string, extension: string | undefined, folders: FolderNames = DEFAULT_FOLDERS): string {
  // series books carry their series folder in the canonical name already
  const file = canonicalName.includes('/') ? canonicalName.slice(canonicalName.lastIndexOf('/') + 1) : canonicalName;
  return path.posix.join(placementFolder(parts, folders), extension ? `${file}.${extension}` : file);
}
