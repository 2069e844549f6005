import fs from 'fs';
import os from 'os';
import path from 'path';
import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AppConfig } from '../src/config.js';
import { defaultSettings } from '../src/config.js';
import type { CandidateClassifier } from '../src/candidate.js';
import { OperationJournal } from '../src/journal.js';
import { setLogLevel } from '../src/logging.js';
import { TitleRegistry } from '../src/registry.js';
import { buildServer } from '../src/server.js';

let dir: string;
let app: FastifyInstance;
let config: AppConfig;

async function start(candidate?: CandidateClassifier) {
  app = await buildServer({
    config,
    settings: defaultSettings(),
    registry: new TitleRegistry(),
    journal: new OperationJournal(config.journalPath),
    candidate,
  });
}

beforeEach(async () => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-server-'));
  config = {
    port: 0,
    logLevel: 'error',
    settingsPath: path.join(dir, 'settings.json'),
    journalPath: path.join(dir, 'journal.json'),
    candidateTimeoutMs: 50,
    enableCors: false,
  };
  await start();
});

afterEach(async () => {
  await app.close();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('classification routes', () => {
  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('ok');
  });

  it('classifies one path', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/classify', payload: { path: 'Heat.1995.mkv' } });
    expect(res.statusCode).toBe(200);
    expect(res.json().record.canonicalName).toBe('Heat (1995)');
  });

  it('declines malformed paths with 400', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/classify', payload: { path: '' } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'skipped: empty path', reason: 'empty' });
  });

  it('rejects bodies that fail validation', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/classify', payload: { hints: {} } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('invalid request');
  });

  it('consults the candidate classifier when one is configured', async () => {
    await app.close();
    const classify = vi.fn(async () => ({ type: 'tv-episode' as const, showName: 'Home Movies', season: 1, episode: 3 }));
    await start({ name: 'fake', classify });
    const res = await app.inject({ method: 'POST', url: '/api/classify', payload: { path: 'Home Video.mkv' } });
    expect(res.json().record.canonicalName).toBe('Home Movies - S01E03');
    expect(classify).toHaveBeenCalledTimes(1);

    await app.inject({ method: 'POST', url: '/api/classify', payload: { path: 'Home Video.mkv', assist: false } });
    expect(classify).toHaveBeenCalledTimes(1);
  });

  it('classifies a batch and reports declines in place', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/classify/batch', payload: { paths: ['', 'Heat.1995.mkv'] } });
    const { results } = res.json();
    expect(results[0]).toEqual({ path: '', ok: false, error: 'skipped: empty path', reason: 'empty' });
    expect(results[1].record.relativePath).toBe('Movies/Heat (1995).mkv');
  });
});

describe('placement routes', () => {
  it('scans, applies and undoes', async () => {
    const root = path.join(dir, 'incoming');
    const dest = path.join(dir, 'library');
    fs.mkdirSync(root);
    fs.writeFileSync(path.join(root, 'Heat.1995.mkv'), 'heat');

    const scan = await app.inject({ method: 'POST', url: '/api/scan', payload: { root, dest } });
    expect(scan.statusCode).toBe(200);
    const { items, plans } = scan.json();
    expect(items).toHaveLength(1);
    const target = path.join(dest, 'Movies', 'Heat (1995).mkv');
    expect(plans).toEqual([{
      from: path.join(root, 'Heat.1995.mkv'),
      to: target,
      action: 'hardlink',
      dryRun: true,
      meta: { type: 'movie', isExtra: false, canonicalName: 'Heat (1995)' },
    }]);

    const live = plans.map((p: object) => ({ ...p, dryRun: false }));
    const apply = await app.inject({ method: 'POST', url: '/api/apply', payload: { plans: live } });
    expect(apply.statusCode).toBe(200);
    expect(fs.readFileSync(target, 'utf8')).toBe('heat');

    const journal = await app.inject({ method: 'GET', url: '/api/journal' });
    expect(journal.json()).toHaveLength(1);

    const undo = await app.inject({ method: 'POST', url: '/api/journal/undo', payload: { count: 1 } });
    expect(undo.json().undone).toHaveLength(1);
    expect(fs.existsSync(target)).toBe(false);
  });

  it('plans subtitles beside their video', async () => {
    const root = path.join(dir, 'incoming');
    const dest = path.join(dir, 'library');
    fs.mkdirSync(root);
    fs.writeFileSync(path.join(root, 'Heat.1995.mkv'), 'heat');
    fs.writeFileSync(path.join(root, 'Heat.1995.en.srt'), 'subs');

    const scan = await app.inject({ method: 'POST', url: '/api/scan', payload: { root, dest } });
    const { items, plans } = scan.json();
    expect(items).toHaveLength(1);
    expect(plans[1]).toEqual({
      from: path.join(root, 'Heat.1995.en.srt'),
      to: path.join(dest, 'Movies', 'Heat (1995).en.srt'),
      action: 'hardlink',
      dryRun: true,
      meta: { type: 'movie', isExtra: false, canonicalName: 'Heat (1995)', sidecar: true },
    });

    const live = plans.map((p: object) => ({ ...p, dryRun: false }));
    await app.inject({ method: 'POST', url: '/api/apply', payload: { plans: live } });
    expect(fs.readFileSync(path.join(dest, 'Movies', 'Heat (1995).en.srt'), 'utf8')).toBe('subs');
  });

  it('rejects a missing source directory', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/scan', payload: { root: path.join(dir, 'nowhere') } });
    expect(res.statusCode).toBe(400);
  });

  it('reports placement failures', async () => {
    const plan = {
      from: path.join(dir, 'missing.mkv'),
      to: path.join(dir, 'out', 'missing.mkv'),
      action: 'rename',
      meta: { type: 'movie', isExtra: false, canonicalName: 'Missing' },
    };
    const res = await app.inject({ method: 'POST', url: '/api/apply', payload: { plans: [plan] } });
    expect(res.statusCode).toBe(500);
    expect(res.json().code).toBe('PLACEMENT_FAILED');
  });
});

describe('settings routes', () => {
  it('changes the log level at runtime', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/loglevel', payload: { level: 'DEBUG' } });
    expect(res.json()).toEqual({ ok: true, level: 'debug' });
    expect((await app.inject({ method: 'GET', url: '/api/loglevel' })).json()).toEqual({ level: 'debug' });
    setLogLevel('error');
  });

  it('persists franchises', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/franchises', payload: { franchises: ['Star Wars'] } });
    expect(res.json().franchises).toEqual(['Star Wars']);
    expect(JSON.parse(fs.readFileSync(config.settingsPath, 'utf8')).knownFranchises).toEqual(['Star Wars']);

    const classify = await app.inject({ method: 'POST', url: '/api/classify', payload: { path: 'Star.Wars.1977.mkv' } });
    expect(classify.json().record.relativePath).toBe('Movies/Star Wars/Star Wars (1977).mkv');
  });

  it('applies saved folder names to later classifications', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/settings', payload: { folders: { movies: 'Films' } } });
    expect(res.json().settings.folders.movies).toBe('Films');
    const classify = await app.inject({ method: 'POST', url: '/api/classify', payload: { path: 'Heat.1995.mkv' } });
    expect(classify.json().record.relativePath).toBe('Films/Heat (1995).mkv');
  });

  it('rejects invalid settings', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/settings', payload: { linkMode: 'symlink' } });
    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe('CONFIG_INVALID');
  });
});
