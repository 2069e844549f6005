import type { ClassificationRecord } from './types.js';

export type MediaErrorCode = 'MALFORMED_INPUT' | 'CONFIG_INVALID' | 'CANDIDATE_FAILED' | 'PLACEMENT_FAILED';

/** Failure raised by the I/O wrappers around the classifier; the core never throws */
export class MediaError extends Error {
  readonly code: MediaErrorCode;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(code: MediaErrorCode, message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MediaError';
    this.code = code;
    this.context = Object.freeze({ ...context });
  }
}

export type MalformedReason = 'empty' | 'invalid-text' | 'no-file-name';

export interface MalformedInput {
  readonly kind: 'MalformedInput';
  readonly path: string;
  readonly reason: MalformedReason;
  readonly message: string;
}

export type ClassifyResult =
  | { readonly ok: true; readonly record: ClassificationRecord }
  | { readonly ok: false; readonly error: MalformedInput };

export function malformed(path: string, reason: MalformedReason): MalformedInput {
  const message = reason === 'empty'
    ? 'skipped: empty path'
    : reason === 'no-file-name'
      ? 'skipped: path has no file name'
      : 'skipped: path is not valid text';
  return Object.freeze({ kind: 'MalformedInput', path, reason, message });
}

export function statusFor(code: MediaErrorCode): number {
  switch (code) {
    case 'MALFORMED_INPUT':
    case 'CONFIG_INVALID':
      return 400;
    case 'CANDIDATE_FAILED':
      return 502;
    case 'PLACEMENT_FAILED':
      return 500;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
