import fs from 'fs';
import path from 'path';
import type { ClassificationRecord, LinkMode, PlacementPlan, ScanItem, Sidecar } from './types.js';
import type { JournalAction, OperationJournal } from './journal.js';
import { MediaError, errorMessage } from './errors.js';
import { log } from './logging.js';

/** Plan where a classified file goes under the destination root; nothing touches the disk */
export function planPlacement(item: Pick<ScanItem, 'path'>, record: ClassificationRecord, destRoot: string, action: LinkMode): PlacementPlan {
  const to = path.join(destRoot, ...record.relativePath.split('/'));
  log('debug', `planPlacement: ${item.path} -> ${to} (${record.kind.type})`);
  return {
    from: item.path,
    to,
    action,
    dryRun: true,
    meta: { type: record.kind.type, isExtra: record.kind.isExtra, canonicalName: record.canonicalName },
  };
}

/**
 * Companion plans for the subtitles of a video: same folder and name as the
 * video's final target, with the language code before the extension.
 */
export function planSidecars(video: PlacementPlan, sidecars: readonly Sidecar[]): PlacementPlan[] {
  const dir = path.dirname(video.to);
  const base = path.basename(video.to, path.extname(video.to));
  return sidecars.map(s => ({
    from: s.path,
    to: path.join(dir, `${base}${s.language ? `.${s.language}` : ''}.${s.ext}`),
    action: video.action,
    dryRun: video.dryRun,
    meta: { ...video.meta, sidecar: true },
  }));
}

function ensureDir(p: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
}

export function uniquePath(p: string) {
  if (!fs.existsSync(p)) return p;
  const dir = path.dirname(p);
  const ext = path.extname(p);
  const base = path.basename(p, ext);
  let i = 2;
  while (true) {
    const cand = path.join(dir, `${base} (${i})${ext}`);
    if (!fs.existsSync(cand)) return cand;
    i++;
  }
}

/** Collision-free target for a preview, matching what applyPlans will create */
export function finalizePlan(p: PlacementPlan): PlacementPlan {
  return { ...p, to: uniquePath(p.to) };
}

function errnoCode(e: unknown) {
  return e instanceof Error && 'code' in e ? String(e.code) : undefined;
}

type Done = { from: string; to: string; action: JournalAction };

function place(p: PlacementPlan, target: string, allowCopyFallback: boolean): Done {
  if (p.action === 'rename') {
    try {
      fs.renameSync(p.from, target);
      return { from: p.from, to: target, action: 'rename' };
    } catch (e) {
      if (errnoCode(e) !== 'EXDEV' || !allowCopyFallback) throw e;
      // across devices a move is a copy followed by removing the source
      fs.copyFileSync(p.from, target);
      fs.unlinkSync(p.from);
      return { from: p.from, to: target, action: 'rename' };
    }
  }
  try {
    fs.linkSync(p.from, target);
    return { from: p.from, to: target, action: 'hardlink' };
  } catch (e) {
    if (!allowCopyFallback) throw e;
    log('warn', `link failed for ${p.from} -> ${target} (${errnoCode(e) ?? errorMessage(e)}); copying instead`);
    fs.copyFileSync(p.from, target);
    return { from: p.from, to: target, action: 'copy' };
  }
}

function rollback(done: readonly Done[]) {
  for (const j of [...done].reverse()) {
    try {
      if (j.action === 'rename') fs.renameSync(j.to, j.from);
      else fs.unlinkSync(j.to);
    } catch (e) {
      log('error', `rollback failed for ${j.to}: ${errorMessage(e)}`);
    }
  }
}

export interface ApplyOptions {
  readonly allowCopyFallback: boolean;
  readonly journal?: OperationJournal;
}

/**
 * Execute plans in order. On the first failure every placement already made
 * in this call is undone and a PLACEMENT_FAILED error is thrown.
 */
export function applyPlans(plans: readonly PlacementPlan[], options: ApplyOptions): { results: { from: string; to: string; action: JournalAction }[] } {
  const done: Done[] = [];
  const sizes: number[] = [];
  const live = plans.filter(p => !p.dryRun);
  for (const p of live) {
    log('info', `applyPlans - processing: ${p.from} -> ${p.to} (action=${p.action})`);
    try {
      const size = fs.statSync(p.from).size;
      ensureDir(p.to);
      done.push(place(p, uniquePath(p.to), options.allowCopyFallback));
      sizes.push(size);
    } catch (e) {
      rollback(done);
      throw new MediaError('PLACEMENT_FAILED', `could not place ${p.from}: ${errorMessage(e)}`, { from: p.from, to: p.to, rolledBack: done.length }, { cause: e });
    }
  }
  options.journal?.record(done.map((d, i) => ({
    ...d,
    size: sizes[i],
    type: live[i].meta.type,
    canonicalName: live[i].meta.canonicalName,
  })));
  return { results: done };
}
