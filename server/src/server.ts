// server/src/server.ts
import fs from 'fs';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { z, ZodError } from 'zod';

import type { AppConfig, Settings } from './config.js';
import { saveSettings } from './config.js';
import type { CandidateClassifier } from './candidate.js';
import { classifyWithAssist } from './candidate.js';
import { MediaError, statusFor } from './errors.js';
import type { OperationJournal } from './journal.js';
import { getLogLevel, getLogs, log, setLogLevel } from './logging.js';
import { classifyMany } from './parse.js';
import type { TitleRegistry } from './registry.js';
import { applyPlans, finalizePlan, planPlacement, planSidecars } from './renamer.js';
import { scanDirectory } from './scan.js';
import type { ClassifyHints, PlacementPlan } from './types.js';

export interface ServerDeps {
  readonly config: AppConfig;
  readonly settings: Settings;
  readonly registry: TitleRegistry;
  readonly journal: OperationJournal;
  readonly candidate?: CandidateClassifier;
}

const hintsSchema = z.object({
  knownFranchises: z.array(z.string()).max(1000).optional(),
  defaultSeason: z.number().int().min(0).optional(),
  authors: z.array(z.string()).max(20).optional(),
  fileSize: z.number().nonnegative().optional(),
  durationSeconds: z.number().nonnegative().optional(),
}).default({});

const classifySchema = z.object({
  path: z.string(),
  hints: hintsSchema,
  assist: z.boolean().default(true),
});

const batchSchema = z.object({
  paths: z.array(z.string()).min(1).max(1000),
  hints: hintsSchema,
});

const scanSchema = z.object({
  root: z.string().min(1).optional(),
  dest: z.string().min(1).optional(),
}).default({});

const mediaTypeSchema = z.enum(['movie', 'tv-episode', 'music-track', 'software', 'ebook', 'audiobook']);

const planSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  action: z.enum(['hardlink', 'rename']),
  dryRun: z.boolean().default(false),
  meta: z.object({ type: mediaTypeSchema, isExtra: z.boolean(), canonicalName: z.string(), sidecar: z.boolean().optional() }),
});

const applySchema = z.object({ plans: z.array(planSchema).min(1) });
const undoSchema = z.object({ count: z.number().int().min(1).max(1000).default(1) }).default({});
const logsQuery = z.object({ since: z.coerce.number().int().nonnegative().optional() });
const levelSchema = z.object({ level: z.string().transform(s => s.toLowerCase()).pipe(z.enum(['debug', 'info', 'warn', 'error'])) });
const franchisesSchema = z.object({ franchises: z.array(z.string().trim().min(1)).min(1) });

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  const { config, registry, journal, candidate } = deps;
  let settings = deps.settings;

  if (config.enableCors) {
    await app.register(cors, { origin: true });
    log('info', 'CORS enabled');
  }

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: 'invalid request', issues: error.issues.map(i => `${i.path.join('.')}: ${i.message}`) });
    }
    if (error instanceof MediaError) {
      log(error.code === 'PLACEMENT_FAILED' ? 'error' : 'warn', `${req.method} ${req.url}: ${error.message}`);
      return reply.status(statusFor(error.code)).send({ error: error.message, code: error.code });
    }
    const status = error.statusCode ?? 500;
    if (status >= 500) log('error', `${req.method} ${req.url}: ${error.message}`);
    return reply.status(status).send({ error: status >= 500 ? 'internal error' : error.message });
  });

  const hintsFor = (h: z.infer<typeof hintsSchema>): ClassifyHints => ({
    registry,
    knownFranchises: [...settings.knownFranchises, ...(h.knownFranchises ?? [])],
    defaultSeason: h.defaultSeason ?? settings.defaultSeason,
    authors: h.authors,
    fileSize: h.fileSize,
    durationSeconds: h.durationSeconds,
    folders: settings.folders,
  });

  // Health endpoint for production readiness checks
  app.get('/health', async () => {
    return { status: 'ok', uptime: process.uptime(), now: Date.now() };
  });

  app.post('/api/classify', async (req, reply) => {
    const body = classifySchema.parse(req.body);
    const assist = body.assist && settings.useCandidate ? candidate : undefined;
    const result = await classifyWithAssist(body.path, hintsFor(body.hints), assist, config.candidateTimeoutMs);
    if (!result.ok) return reply.status(400).send({ error: result.error.message, reason: result.error.reason });
    return { record: result.record };
  });

  app.post('/api/classify/batch', async req => {
    const body = batchSchema.parse(req.body);
    const results = classifyMany(body.paths, hintsFor(body.hints)).map((r, i) =>
      r.ok ? { path: body.paths[i], ok: true, record: r.record } : { path: body.paths[i], ok: false, error: r.error.message, reason: r.error.reason });
    log('info', `batch: classified ${results.filter(r => r.ok).length}/${results.length}`);
    return { results };
  });

  app.post('/api/scan', async (req, reply) => {
    const body = scanSchema.parse(req.body ?? {});
    const root = body.root ?? config.sourceDir;
    const dest = body.dest ?? config.destDir;
    if (!root) return reply.status(400).send({ error: 'no source directory; pass root or set MEDIA_SOURCE_DIR' });
    if (!fs.existsSync(root)) {
      log('error', `Scan failed: source directory does not exist or is inaccessible: ${root}`);
      return reply.status(400).send({ error: 'source directory does not exist or is inaccessible' });
    }
    const items = await scanDirectory({ root, destRoot: dest, hints: hintsFor({}), registry, journal });
    const plans: PlacementPlan[] = [];
    if (dest) {
      for (const item of items) {
        if (!item.record) continue;
        const video = finalizePlan(planPlacement(item, item.record, dest, settings.linkMode));
        plans.push(video, ...planSidecars(video, item.sidecars ?? []).map(finalizePlan));
      }
    }
    log('info', `scan: ${items.length} items, ${plans.length} plans`);
    return { items, plans };
  });

  app.post('/api/apply', async req => {
    const { plans } = applySchema.parse(req.body);
    const { results } = applyPlans(plans, { allowCopyFallback: settings.allowCopyFallback, journal });
    log('info', `apply: placed ${results.length} of ${plans.length} plans`);
    return { ok: true, results };
  });

  app.get('/api/journal', async () => journal.list());

  app.post('/api/journal/undo', async req => {
    const { count } = undoSchema.parse(req.body ?? {});
    return { ok: true, undone: journal.undoLast(count) };
  });

  // Plain logs fetch (non-stream)
  app.get('/api/logs', async req => {
    const { since } = logsQuery.parse(req.query);
    return getLogs(since);
  });

  // Get/set runtime log level
  app.get('/api/loglevel', async () => ({ level: getLogLevel() }));
  app.post('/api/loglevel', async req => {
    const { level } = levelSchema.parse(req.body);
    setLogLevel(level);
    return { ok: true, level };
  });

  app.get('/api/franchises', async () => ({ franchises: registry.franchises }));
  app.post('/api/franchises', async req => {
    const { franchises } = franchisesSchema.parse(req.body);
    for (const f of franchises) registry.addFranchise(f);
    const known = new Set(settings.knownFranchises);
    for (const f of franchises) known.add(f);
    settings = saveSettings(config.settingsPath, { ...settings, knownFranchises: [...known] });
    log('info', `franchises: ${franchises.length} added`);
    return { ok: true, franchises: registry.franchises };
  });

  app.get('/api/settings', async () => settings);
  app.post('/api/settings', async req => {
    const incoming = z.object({}).passthrough().parse(req.body);
    settings = saveSettings(config.settingsPath, { ...settings, ...incoming });
    for (const f of settings.knownFranchises) registry.addFranchise(f);
    log('info', 'Settings saved');
    return { ok: true, settings };
  });

  return app;
}
