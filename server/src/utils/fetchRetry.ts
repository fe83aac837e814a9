// Reusable fetch with retry/backoff
import fetch, { type RequestInit, type Response } from 'node-fetch';
import { logger } from './logger.js';

export type FetchRetryOptions = {
  retries?: number;          // total attempts including first (default 3)
  backoffMs?: number;        // initial backoff (default 500)
  backoffFactor?: number;    // multiplier (default 2)
  maxBackoffMs?: number;     // cap (default 5000)
  retryOn?: Array<number>;   // status codes to retry (default [429,502,503,504])
  timeoutMs?: number;        // per attempt timeout (optional)
  label?: string;            // upstream label for logs
};

export async function fetchWithRetry(url: string, init: RequestInit = {}, opts: FetchRetryOptions = {}): Promise<Response> {
  const {
    retries = 3,
    backoffMs = 500,
    backoffFactor = 2,
    maxBackoffMs = 5000,
    retryOn = [429, 502, 503, 504],
    timeoutMs,
    label = 'generic',
  } = opts;
  let attempt = 0;
  let delay = backoffMs;
  let lastErr: unknown = null;
  const started = Date.now();
  while (attempt < Math.max(1, retries)) {
    const controller = timeoutMs ? new AbortController() : null;
    const timer = controller && timeoutMs ? setTimeout(() => controller.abort(), timeoutMs).unref() : undefined;
    try {
      const res = await fetch(url, { ...init, signal: controller?.signal });
      if (retryOn.includes(res.status) && attempt < retries - 1) {
        logger.warn({ url, status: res.status, attempt, label }, 'fetch_retry_status');
      } else {
        // non-ok responses are returned; caller decides
        return res;
      }
    } catch (err) {
      lastErr = err;
      if (attempt >= retries - 1) break;
      logger.warn({ url, err: err instanceof Error ? err.message : String(err), attempt, label }, 'fetch_retry_err');
    } finally {
      if (timer) clearTimeout(timer);
    }
    await new Promise(r => setTimeout(r, delay));
    delay = Math.min(maxBackoffMs, delay * backoffFactor);
    attempt++;
  }
  const totalMs = Date.now() - started;
  logger.error({ url, attempts: attempt + 1, totalMs, label, err: lastErr }, 'fetch_failed_exhausted');
  throw lastErr instanceof Error ? lastErr : new Error('fetch_failed');
}
