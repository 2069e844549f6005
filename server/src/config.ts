import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { MediaError } from './errors.js';
import type { LogLevel } from './logging.js';
import { log } from './logging.js';
import { DEFAULT_FOLDERS } from './naming.js';

const envSchema = z.object({
  MEDIA_SOURCE_DIR: z.string().optional(),
  MEDIA_DEST_DIR: z.string().optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SETTINGS_PATH: z.string().default(path.join('config', 'settings.json')),
  JOURNAL_PATH: z.string().default(path.join('config', 'journal.json')),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  CANDIDATE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  ENABLE_CORS: z.enum(['0', '1', 'true', 'false']).default('0').transform(v => v === '1' || v === 'true'),
});

export interface AppConfig {
  readonly sourceDir?: string;
  readonly destDir?: string;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly settingsPath: string;
  readonly journalPath: string;
  readonly openai?: { readonly apiKey: string; readonly model: string; readonly baseUrl: string };
  readonly candidateTimeoutMs: number;
  readonly enableCors: boolean;
}

/** Read process configuration; blank variables count as unset */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new MediaError('CONFIG_INVALID', `Invalid environment: ${issues.join('; ')}`, { issues });
  }
  const e = parsed.data;
  return {
    sourceDir: e.MEDIA_SOURCE_DIR ? path.resolve(e.MEDIA_SOURCE_DIR) : undefined,
    destDir: e.MEDIA_DEST_DIR ? path.resolve(e.MEDIA_DEST_DIR) : undefined,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    settingsPath: path.resolve(e.SETTINGS_PATH),
    journalPath: path.resolve(e.JOURNAL_PATH),
    openai: e.OPENAI_API_KEY ? { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL, baseUrl: e.OPENAI_BASE_URL } : undefined,
    candidateTimeoutMs: e.CANDIDATE_TIMEOUT_MS,
    enableCors: e.ENABLE_CORS,
  };
}

const folderName = (fallback: string) => z.string().trim().min(1).refine(s => !/[/\\]/.test(s), 'folder names cannot contain slashes').default(fallback);

export const settingsSchema = z.object({
  knownFranchises: z.array(z.string().trim().min(1)).default([]),
  folders: z.object({
    movies: folderName(DEFAULT_FOLDERS.movies),
    tv: folderName(DEFAULT_FOLDERS.tv),
    music: folderName(DEFAULT_FOLDERS.music),
    software: folderName(DEFAULT_FOLDERS.software),
    books: folderName(DEFAULT_FOLDERS.books),
    extras: folderName(DEFAULT_FOLDERS.extras),
  }).default({}),
  defaultSeason: z.number().int().min(0).optional(),
  linkMode: z.enum(['hardlink', 'rename']).default('hardlink'),
  allowCopyFallback: z.boolean().default(true),
  useCandidate: z.boolean().default(true),
});

export type Settings = z.infer<typeof settingsSchema>;

export function defaultSettings(): Settings {
  return settingsSchema.parse({});
}

/** Settings file contents; a missing file gives the defaults, an unreadable one is logged and ignored */
export function loadSettings(file: string): Settings {
  if (!fs.existsSync(file)) return defaultSettings();
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    log('warn', `Settings at ${file} are not valid JSON; using defaults (${e instanceof Error ? e.message : String(e)})`);
    return defaultSettings();
  }
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    log('warn', `Settings at ${file} failed validation; using defaults (${parsed.error.issues.map(i => i.message).join('; ')})`);
    return defaultSettings();
  }
  return parsed.data;
}

export function parseSettings(input: unknown): Settings {
  const parsed = settingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new MediaError('CONFIG_INVALID', `Invalid settings: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

export function saveSettings(file: string, input: unknown): Settings {
  const settings = parseSettings(input);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(settings, null, 2));
  return settings;
}
