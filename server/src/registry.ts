import type { ClassificationRecord, ReadonlyTitleRegistry } from './types.js';

export function normalizeTitle(s: string) {
  return String(s || '')
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Known franchises, shows and book series. Owned by the caller and passed into
 * each classification; the engine only reads it, callers decide when to
 * remember what was classified.
 */
export class TitleRegistry implements ReadonlyTitleRegistry {
  private readonly franchiseByKey = new Map<string, string>();
  private readonly spellingByKey = new Map<string, string>();

  constructor(init: { franchises?: readonly string[]; titles?: readonly string[] } = {}) {
    for (const f of init.franchises ?? []) this.addFranchise(f);
    for (const t of init.titles ?? []) this.addTitle(t);
  }

  get franchises(): readonly string[] {
    return [...this.franchiseByKey.values()];
  }

  addFranchise(name: string) {
    const key = normalizeTitle(name);
    if (key && !this.franchiseByKey.has(key)) this.franchiseByKey.set(key, name.trim());
    return this;
  }

  addTitle(name: string) {
    const key = normalizeTitle(name);
    if (key && !this.spellingByKey.has(key)) this.spellingByKey.set(key, name.trim());
    return this;
  }

  spellingOf(name: string): string | undefined {
    return this.spellingByKey.get(normalizeTitle(name));
  }

  /** Keep the show, series or franchise of a record for later classifications */
  remember(record: ClassificationRecord) {
    const link = record.link;
    if (link.type === 'tv' && link.showName) this.addTitle(link.showName);
    if (link.type === 'book' && !link.isStandalone) this.addTitle(link.seriesName);
    if (link.type === 'movie' && link.franchise) this.addFranchise(link.franchise);
    return this;
  }
}
