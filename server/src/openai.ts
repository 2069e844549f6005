import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import fetch from 'node-fetch';
import { z } from 'zod';
import type { Candidate, CandidateClassifier, CandidateRequest } from './candidate.js';
import { MediaError } from './errors.js';
import { log } from './logging.js';

export interface HttpResponse {
  readonly ok: boolean;
  readonly status: number;
  text(): Promise<string>;
}

export type HttpPost = (
  url: string,
  init: { method: 'POST'; headers: Record<string, string>; body: string; signal: AbortSignal },
) => Promise<HttpResponse>;

const nodeFetchPost: HttpPost = (url, init) => fetch(url, init);

const here = path.dirname(fileURLToPath(import.meta.url));
let promptCached: string | null = null;

function findPrompt() {
  // Cope with running from sources, from dist/ and from a different cwd
  const candidates = [
    path.resolve(here, '..', 'prompts', 'file_analysis.txt'),
    path.resolve(here, '..', '..', '..', 'server', 'prompts', 'file_analysis.txt'),
    path.resolve(process.cwd(), 'server', 'prompts', 'file_analysis.txt'),
    path.resolve(process.cwd(), 'prompts', 'file_analysis.txt'),
  ];
  return candidates.find(c => fs.existsSync(c));
}

export function loadPrompt(): string {
  if (promptCached !== null) return promptCached;
  const file = findPrompt();
  if (!file) {
    log('warn', 'file_analysis prompt not found; using the short built-in prompt');
    promptCached = 'Classify the media file at the given path. Answer with one JSON object.';
  } else {
    promptCached = fs.readFileSync(file, 'utf8');
  }
  return promptCached;
}

const completionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })).min(1),
});

const int = z.coerce.number().int().min(0).nullish();

const answerSchema = z.object({
  media_type: z.enum(['movie', 'tv-episode', 'music-track', 'software', 'ebook', 'audiobook']).nullish(),
  title: z.string().nullish(),
  year: z.coerce.number().int().min(1800).max(2100).nullish(),
  show_name: z.string().nullish(),
  season_number: int,
  episode_number: int,
  episode_title: z.string().nullish(),
  franchise: z.string().nullish(),
  series_name: z.string().nullish(),
  series_number: int,
  authors: z.union([z.array(z.string()), z.string().transform(s => [s])]).nullish(),
  artist: z.string().nullish(),
  track_number: int,
  version: z.string().nullish(),
  platform: z.string().nullish(),
  is_extra: z.boolean().nullish(),
  extra_type: z.string().nullish(),
  related_title: z.string().nullish(),
});

export type CandidateAnswer = z.infer<typeof answerSchema>;

export function toCandidate(a: CandidateAnswer): Candidate {
  return {
    type: a.media_type ?? undefined,
    title: a.title ?? undefined,
    year: a.year ?? undefined,
    showName: a.show_name ?? undefined,
    season: a.season_number ?? undefined,
    episode: a.episode_number ?? undefined,
    episodeTitle: a.episode_title ?? undefined,
    franchise: a.franchise ?? undefined,
    seriesName: a.series_name ?? undefined,
    seriesIndex: a.series_number ?? undefined,
    authors: a.authors ?? undefined,
    artist: a.artist ?? undefined,
    trackNumber: a.track_number ?? undefined,
    version: a.version ?? undefined,
    platform: a.platform ?? undefined,
    isExtra: a.is_extra ?? undefined,
    extraType: a.extra_type ?? undefined,
    parentHint: a.related_title ?? undefined,
  };
}

export interface OpenAIOptions {
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl: string;
  readonly post?: HttpPost;
  readonly prompt?: string;
}

/** Candidate classifier speaking the OpenAI chat completions protocol */
export class OpenAICandidateClassifier implements CandidateClassifier {
  readonly name = 'openai';
  private readonly post: HttpPost;

  constructor(private readonly options: OpenAIOptions) {
    this.post = options.post ?? nodeFetchPost;
  }

  async classify(request: CandidateRequest, signal: AbortSignal): Promise<Candidate | undefined> {
    const { dir, base } = path.posix.parse(request.path.replace(/\\+/g, '/'));
    const user = [
      `Filename: ${base}`,
      `Parent folders: ${dir || '(none)'}`,
      `Local guess: ${request.kind}`,
      `Title words: ${request.titleTokens.join(' ')}`,
    ].join('\n');
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const res = await this.post(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json', authorization: `Bearer ${this.options.apiKey}` },
      body: JSON.stringify({
        model: this.options.model,
        temperature: 0.3,
        max_tokens: 250,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: this.options.prompt ?? loadPrompt() },
          { role: 'user', content: user },
        ],
      }),
      signal,
    });
    const body = await res.text();
    if (!res.ok) {
      throw new MediaError('CANDIDATE_FAILED', `chat completion failed: ${res.status}`, { status: res.status, body: body.slice(0, 200) });
    }
    const content = completionSchema.safeParse(parseJson(body));
    if (!content.success) throw new MediaError('CANDIDATE_FAILED', 'unexpected chat completion shape');
    const text = content.data.choices[0].message.content;
    if (!text) return undefined;
    const answer = answerSchema.safeParse(parseJson(text));
    if (!answer.success) {
      throw new MediaError('CANDIDATE_FAILED', `unusable candidate answer: ${answer.error.issues.map(i => i.path.join('.')).join(', ')}`);
    }
    log('debug', `openai candidate for ${request.path}: ${text}`);
    return toCandidate(answer.data);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new MediaError('CANDIDATE_FAILED', 'candidate returned invalid JSON', {}, { cause: e });
  }
}
