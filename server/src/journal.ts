import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import { z } from 'zod';
import type { MediaType } from './types.js';
import { log } from './logging.js';

const entrySchema = z.object({
  hash: z.string(),
  from: z.string(),
  to: z.string(),
  action: z.enum(['hardlink', 'rename', 'copy']),
  type: z.enum(['movie', 'tv-episode', 'music-track', 'software', 'ebook', 'audiobook']),
  canonicalName: z.string(),
  appliedAt: z.number(),
});

export type JournalEntry = z.infer<typeof entrySchema>;
export type JournalAction = JournalEntry['action'];

export function hashPathSize(filePath: string, size: number) {
  return crypto.createHash('sha1').update(filePath + '|' + size).digest('hex');
}

/** Append-only record of placed files, persisted as a JSON list */
export class OperationJournal {
  private cache: JournalEntry[];

  constructor(private readonly file: string) {
    this.cache = this.safeLoad();
  }

  private safeLoad(): JournalEntry[] {
    if (!fs.existsSync(this.file)) return [];
    try {
      const parsed = z.array(entrySchema).safeParse(JSON.parse(fs.readFileSync(this.file, 'utf8')));
      if (parsed.success) return parsed.data;
      log('warn', `journal at ${this.file} failed validation; starting empty`);
    } catch (e) {
      log('warn', `journal at ${this.file} is unreadable; starting empty (${String(e)})`);
    }
    return [];
  }

  private save() {
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    fs.writeFileSync(this.file, JSON.stringify(this.cache, null, 2));
  }

  record(entries: readonly { from: string; to: string; size: number; action: JournalAction; type: MediaType; canonicalName: string }[]) {
    if (!entries.length) return;
    const now = Date.now();
    for (const e of entries) {
      this.cache.push({
        hash: hashPathSize(e.from, e.size),
        from: e.from,
        to: e.to,
        action: e.action,
        type: e.type,
        canonicalName: e.canonicalName,
        appliedAt: now,
      });
    }
    this.save();
  }

  /** Whether this source file (same path and size) was already placed */
  has(filePath: string, size: number) {
    const hash = hashPathSize(filePath, size);
    return this.cache.some(e => e.hash === hash);
  }

  list(): readonly JournalEntry[] {
    return this.cache.slice();
  }

  /** Undo the most recent n placements: moved files go back, links and copies are removed */
  undoLast(n: number): JournalEntry[] {
    if (!n || n <= 0) return [];
    const undone: JournalEntry[] = [];
    for (let i = 0; i < n; i++) {
      const e = this.cache.pop();
      if (!e) break;
      try {
        if (e.action === 'rename') {
          fs.mkdirSync(path.dirname(e.from), { recursive: true });
          fs.renameSync(e.to, e.from);
        } else if (fs.existsSync(e.to)) {
          fs.unlinkSync(e.to);
        }
      } catch (err) {
        this.cache.push(e);
        this.save();
        throw err;
      }
      log('info', `journal: undid ${e.action} ${e.from} -> ${e.to}`);
      undone.push(e);
    }
    this.save();
    return undone;
  }
}
