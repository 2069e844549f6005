import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(v: unknown): v is LogLevel {
  return LOG_LEVELS.some(l => l === v);
}

const envLevel = process.env.LOG_LEVEL;
const initialLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
const logger = pino({ level: initialLevel, base: { name: 'media-classifier' } });

export type LogEntry = { level: LogLevel; msg: string; time: number };
const ring: LogEntry[] = [];
const RING_MAX = 2000;

let runtimeLevel: LogLevel = initialLevel;

export function setLogLevel(level: LogLevel) {
  runtimeLevel = level;
  logger.level = level;
}

export function getLogLevel() { return runtimeLevel; }

export function log(level: LogLevel, msg: string) {
  // The ring keeps every entry so /api/logs can show debug lines even when
  // pino is set to a higher threshold.
  ring.push({ level, msg, time: Date.now() });
  if (ring.length > RING_MAX) ring.splice(0, ring.length - RING_MAX);
  logger[level](msg);
}

export function getLogs(since?: number) {
  return ring.filter(e => !since || e.time > since);
}

export function clearLogs() {
  ring.length = 0;
}
