import type { FetchLike } from '../src/modules/fetch.js';
import type { ChartRenderer, Series } from '../src/services/ChartManager.js';
import type { DomSurface, Timers } from '../src/shared/utils/dom-utils.js';
import type { QuoteRecord } from '../src/types/market.types.js';

export class FakeSurface implements DomSurface {
  readonly html = new Map<string, string>();
  readonly text = new Map<string, string>();

  constructor(private only?: readonly string[]) {}

  has(id: string) {
    return !this.only || this.only.includes(id);
  }
  setHtml(id: string, html: string) {
    this.html.set(id, html);
  }
  setText(id: string, text: string) {
    this.text.set(id, text);
  }
  get(id: string): string {
    return this.html.get(id) ?? '';
  }
}

export class FakeTimers implements Timers {
  private queue: { at: number; fn: () => void; live: boolean }[] = [];
  now = 0;

  set(fn: () => void, ms: number) {
    const entry = { at: this.now + ms, fn, live: true };
    this.queue.push(entry);
    return () => { entry.live = false; };
  }

  get pending(): number {
    return this.queue.filter(e => e.live).length;
  }

  advance(ms: number) {
    this.now += ms;
    const due = this.queue.filter(e => e.live && e.at <= this.now).sort((a, b) => a.at - b.at);
    for (const e of due) {
      e.live = false;
      e.fn();
    }
    this.queue = this.queue.filter(e => e.live);
  }
}

export class FakeCharts implements ChartRenderer {
  readonly drawn: { kind: 'line' | 'bar'; id: string; labels: string[]; series: Series[] }[] = [];
  readonly destroyed: string[] = [];

  line(id: string, labels: string[], series: Series[]) {
    this.drawn.push({ kind: 'line', id, labels, series });
  }
  bar(id: string, labels: string[], series: Series[]) {
    this.drawn.push({ kind: 'bar', id, labels, series });
  }
  destroy(id: string) {
    this.destroyed.push(id);
  }
}

export class FakeNotifier {
  readonly messages: string[] = [];
  show(message: string) {
    this.messages.push(message);
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

export function ok(data: unknown): Response {
  return jsonResponse({ success: true, data });
}

/** Answers by exact URL; anything else is a 404 envelope. */
export function routeFetch(routes: Record<string, () => Response | Promise<Response>>) {
  const calls: { url: string; method: string }[] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, method: init?.method ?? 'GET' });
    const route = routes[url];
    return route ? route() : jsonResponse({ success: false, error: 'endpoint not found' }, 404);
  };
  return { fetch, calls };
}

export function quote(symbol: string, price: number, changePercent: number, extra: Partial<QuoteRecord> = {}): QuoteRecord {
  return {
    symbol,
    name: `${symbol} name`,
    current_price: price,
    change: changePercent,
    change_percent: changePercent,
    ...extra,
  };
}

export function deferred<T>() {
  let resolve: (v: T) => void = () => {};
  let reject: (e: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => { resolve = res; reject = rej; });
  return { promise, resolve, reject };
}

export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
