export type TokenKind = 'word' | 'bracketed' | 'separator' | 'extension';

export interface Token {
  readonly kind: TokenKind;
  /** Text as it appeared in the source, used for display */
  readonly raw: string;
  /** Case-folded text used for matching */
  readonly norm: string;
  /** Position in the enclosing token sequence */
  readonly index: number;
  /** Tokenized contents of a bracketed group */
  readonly children?: readonly Token[];
}

export type AttributeKind =
  | 'quality'
  | 'source'
  | 'service'
  | 'codec'
  | 'hdr'
  | 'edition'
  | 'version'
  | 'platform'
  | 'year'
  | 'language'
  | 'subtitleLanguage'
  | 'releaseGroup';

export interface AttributeValues {
  quality: string;
  source: string;
  service: string;
  codec: string;
  hdr: string;
  edition: string;
  version: string;
  platform: string;
  year: number;
  language: string;
  subtitleLanguage: string;
  releaseGroup: string;
}

export type AttributeSet = Readonly<Partial<AttributeValues>>;

export type MediaType =
  | 'movie'
  | 'tv-episode'
  | 'music-track'
  | 'software'
  | 'ebook'
  | 'audiobook';

export interface MediaKind {
  readonly type: MediaType;
  readonly isExtra: boolean;
  /** Best guess at the parent work of an extra; absent when none was found */
  readonly parentHint?: string;
  /** Display label of the extra marker, e.g. "Behind the Scenes" */
  readonly extraType?: string;
}

export interface TvLink {
  readonly type: 'tv';
  readonly showName: string;
  readonly season?: number;
  readonly episode?: number;
  /** All episode numbers of a multi-episode file */
  readonly episodes?: readonly number[];
  readonly episodeTitle?: string;
  readonly showYear?: number;
}

export interface MovieLink {
  readonly type: 'movie';
  readonly franchise?: string;
  readonly baseTitle: string;
  readonly year?: number;
}

export type BookLink =
  | { readonly type: 'book'; readonly isStandalone: true }
  | {
      readonly type: 'book';
      readonly isStandalone: false;
      readonly seriesName: string;
      readonly seriesIndex: number;
    };

export interface MusicLink {
  readonly type: 'music';
  readonly artist?: string;
  readonly trackNumber?: number;
  readonly trackTitle: string;
}

export interface SoftwareLink {
  readonly type: 'software';
  readonly name: string;
  readonly version?: string;
  readonly platform?: string;
}

export type ParentLink = TvLink | MovieLink | BookLink | MusicLink | SoftwareLink;

export type BookFormat = 'ebook' | 'audiobook';

export type Confidence = 'high' | 'low';

export interface BookDetails {
  readonly authors: readonly string[];
  readonly publicationYear?: number;
  readonly format: BookFormat;
}

export interface ClassificationRecord {
  readonly path: string;
  readonly title: string;
  readonly kind: MediaKind;
  readonly attributes: AttributeSet;
  readonly link: ParentLink;
  readonly canonicalName: string;
  /** Category folder + canonical name + extension, relative to the destination root */
  readonly relativePath: string;
  readonly extension?: string;
  readonly confidence: Confidence;
  readonly signals: readonly string[];
  readonly book?: BookDetails;
}

export interface ReadonlyTitleRegistry {
  readonly franchises: readonly string[];
  /** Registered spelling of a show, franchise or book series, if known */
  spellingOf(name: string): string | undefined;
}

export interface ClassifyHints {
  readonly registry?: ReadonlyTitleRegistry;
  readonly knownFranchises?: readonly string[];
  readonly defaultSeason?: number;
  readonly fileSize?: number;
  readonly durationSeconds?: number;
  readonly authors?: readonly string[];
  readonly folders?: FolderNames;
}

export interface FolderNames {
  readonly movies: string;
  readonly tv: string;
  readonly music: string;
  readonly software: string;
  readonly books: string;
  readonly extras: string;
}

export type LinkMode = 'hardlink' | 'rename';

/** Subtitle file that moves with a video */
export interface Sidecar {
  path: string;
  ext: string;
  language?: string;
}

export interface ScanItem {
  id: string;
  path: string;
  size: number;
  ext: string;
  record?: ClassificationRecord;
  sidecars?: Sidecar[];
  skipped?: string;
}

export interface PlacementPlan {
  from: string;
  to: string;
  action: LinkMode;
  dryRun: boolean;
  meta: {
    type: MediaType;
    isExtra: boolean;
    canonicalName: string;
    /** Set on the companion plan of a subtitle sidecar */
    sidecar?: boolean;
  };
}
