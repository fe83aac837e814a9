// Central fetch helper: timeout via AbortController, typed failures, envelope + schema checks

import { z } from 'zod';
import { emit } from '../lib/events.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const TIMEOUT_MESSAGE = 'Request timed out (the server may be starting up or busy). Press Refresh to retry later.';

export class RequestTimeoutError extends Error {
  constructor(readonly url: string, readonly timeoutMs: number) {
    super(`request timed out after ${timeoutMs} ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class HttpStatusError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

/** `success:false`, no `data`, invalid JSON or a payload that does not match the schema */
export class PayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadError';
  }
}

const EnvelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
});

export interface FetchJsonOptions<T> {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  method?: 'GET' | 'POST';
  body?: BodyInit;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const defaultFetch: FetchLike = (input, init) => fetch(input, init);

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function statusMessage(res: Response, body: unknown): string {
  const env = EnvelopeSchema.safeParse(body);
  if (env.success && env.data.error) return `HTTP ${res.status}: ${env.data.error}`;
  return `HTTP ${res.status} ${res.statusText}`.trim();
}

function issuesText(err: z.ZodError): string {
  return err.issues.slice(0, 3).map(i => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ');
}

export async function fetchJson<T>(url: string, opts: FetchJsonOptions<T>): Promise<T> {
  const { schema, method = 'GET', body, timeoutMs = 15_000, fetchImpl = defaultFetch } = opts;
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => { timedOut = true; controller.abort(); }, timeoutMs);
  const t0 = Date.now();
  emit('api:attempt', { url });
  try {
    const res = await fetchImpl(url, { method, body, signal: controller.signal });
    const text = await res.text();
    const json = parseJson(text);
    if (!res.ok) throw new HttpStatusError(res.status, statusMessage(res, json));
    if (json === undefined) throw new PayloadError('invalid JSON in response');
    const env = EnvelopeSchema.safeParse(json);
    if (!env.success) throw new PayloadError('response is not an API envelope');
    if (!env.data.success) throw new PayloadError(env.data.error || 'request failed');
    if (env.data.data === undefined) throw new PayloadError('response has no data');
    const parsed = schema.safeParse(env.data.data);
    if (!parsed.success) throw new PayloadError(`unexpected response shape: ${issuesText(parsed.error)}`);
    emit('api:success', { url, ms: Date.now() - t0 });
    return parsed.data;
  } catch (err) {
    const out = timedOut ? new RequestTimeoutError(url, timeoutMs) : err;
    emit('api:error', { url, ms: Date.now() - t0, error: out instanceof Error ? out.message : String(out) });
    throw out;
  } finally {
    clearTimeout(timer);
  }
}

/** User-facing text: timeouts get a fixed hint, everything else its own message. */
export function describeLoadError(err: unknown): string {
  if (err instanceof RequestTimeoutError) return TIMEOUT_MESSAGE;
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export function withRefresh(url: string, force: boolean): string {
  if (!force) return url;
  return url + (url.includes('?') ? '&' : '?') + 'refresh=true';
}
