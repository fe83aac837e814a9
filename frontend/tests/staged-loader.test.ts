import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Api } from '../src/app/services/api.service.js';
import { buildStages } from '../src/config.js';
import { MarketBoard } from '../src/components/market-board.js';
import { RequestTimeoutError, TIMEOUT_MESSAGE } from '../src/modules/fetch.js';
import { StagedLoader } from '../src/services/staged-loader.js';
import { errorHtml, loadingHtml } from '../src/shared/utils/dom-utils.js';
import { SnapshotStore } from '../src/state/snapshot.store.js';
import type { BoardSection, MarketData } from '../src/types/market.types.js';
import { FakeNotifier, FakeSurface, deferred, flush, ok, quote, routeFetch } from './helpers.js';

const STAGE_1 = 'us_indices';
const STAGE_2A = 'us_stocks,tw_markets';
const STAGE_2B = 'international_markets,metals_futures,crypto,ratios';

const responses: Record<string, MarketData> = {
  [STAGE_1]: { us_indices: { '^GSPC': quote('^GSPC', 5000, 0.5) }, timestamp: '2026-03-10T15:00:00.000Z' },
  [STAGE_2A]: { us_stocks: { AAPL: quote('AAPL', 200, 1) }, tw_markets: { '^TWII': quote('^TWII', 20000, -0.3) } },
  [STAGE_2B]: {
    international_markets: {},
    metals_futures: { 'GC=F': quote('GC=F', 2900, 0.2) },
    crypto: { 'BTC-USD': quote('BTC-USD', 80000, 2) },
    ratios: { ratios: [], timestamp: '2026-03-10T15:00:00.000Z' },
  },
};

type Answer = MarketData | Error | Promise<MarketData>;

function setup(answers: Record<string, Answer | Answer[]> = {}) {
  const calls: { sections: string; force: boolean; timeoutMs: number }[] = [];
  const api = {
    async marketData(sections: readonly BoardSection[], force: boolean, timeoutMs: number): Promise<MarketData> {
      const key = sections.join(',');
      calls.push({ sections: key, force, timeoutMs });
      const configured = answers[key];
      const answer = Array.isArray(configured) ? configured.shift() : configured;
      const out = answer ?? responses[key];
      if (out instanceof Error) throw out;
      return out;
    },
  };
  const store = new SnapshotStore();
  const surface = new FakeSurface();
  const board = new MarketBoard(store, surface);
  let renders = 0;
  const notifier = new FakeNotifier();
  const loader = new StagedLoader({
    api,
    store,
    board: { render: () => { renders++; board.render(); } },
    notifier,
    stages: buildStages(90_000, 120_000),
  });
  return { loader, calls, store, surface, notifier, renders: () => renders };
}

describe('StagedLoader', () => {
  it('runs the three stages in order and renders after each', async () => {
    const t = setup();
    const report = await t.loader.load();

    assert.deepStrictEqual(report, { completed: ['1', '2a', '2b'], failed: [], aborted: false });
    assert.deepStrictEqual(t.calls, [
      { sections: STAGE_1, force: false, timeoutMs: 90_000 },
      { sections: STAGE_2A, force: false, timeoutMs: 120_000 },
      { sections: STAGE_2B, force: false, timeoutMs: 120_000 },
    ]);
    assert.strictEqual(t.renders(), 3);
    assert.strictEqual(t.store.get('crypto')?.['BTC-USD'].current_price, 80000);
    assert.deepStrictEqual(t.notifier.messages, []);
  });

  it('stops after a failed first stage and marks every container', async () => {
    const t = setup({ [STAGE_1]: new Error('HTTP 502: Quote provider unavailable: down') });
    const report = await t.loader.load();

    assert.strictEqual(t.calls.length, 1);
    assert.deepStrictEqual(report, {
      completed: [],
      failed: [{ stage: '1', message: 'HTTP 502: Quote provider unavailable: down' }],
      aborted: true,
    });
    for (const id of ['us-indices', 'us-stocks', 'tw-markets', 'international-markets', 'metals-futures', 'crypto-markets', 'ratios-container']) {
      assert.strictEqual(t.surface.get(id), errorHtml('HTTP 502: Quote provider unavailable: down'), id);
    }
    assert.deepStrictEqual(t.notifier.messages, ['Market data (US indices): HTTP 502: Quote provider unavailable: down']);
  });

  it('still runs stage 2b when stage 2a fails', async () => {
    const t = setup({ [STAGE_2A]: new Error('boom') });
    const report = await t.loader.load();

    assert.deepStrictEqual(t.calls.map(c => c.sections), [STAGE_1, STAGE_2A, STAGE_2B]);
    assert.deepStrictEqual(report, { completed: ['1', '2b'], failed: [{ stage: '2a', message: 'boom' }], aborted: false });
    assert.strictEqual(t.surface.get('us-stocks'), errorHtml('boom'));
    assert.strictEqual(t.surface.get('tw-markets'), errorHtml('boom'));
    assert.strictEqual(t.store.errorFor('crypto'), undefined);
    assert.match(t.surface.get('crypto-markets'), /data-symbol="BTC-USD"/);
  });

  it('shows the timeout hint instead of the raw error', async () => {
    const t = setup({ [STAGE_2B]: new RequestTimeoutError('/api/market-data', 120_000) });
    const report = await t.loader.load();
    assert.deepStrictEqual(report.failed, [{ stage: '2b', message: TIMEOUT_MESSAGE }]);
    assert.strictEqual(t.surface.get('ratios-container'), errorHtml(TIMEOUT_MESSAGE));
  });

  it('forwards the refresh flag to every stage', async () => {
    const t = setup();
    await t.loader.load(true);
    assert.deepStrictEqual(t.calls.map(c => c.force), [true, true, true]);
  });

  it('keeps stale data under the error when a refresh stage fails', async () => {
    const t = setup({ [STAGE_2A]: [responses[STAGE_2A], new Error('HTTP 504 Gateway Timeout')] });
    await t.loader.load();
    await t.loader.load(true);

    assert.strictEqual(t.store.get('us_stocks')?.AAPL.current_price, 200);
    const html = t.surface.get('us-stocks');
    assert.ok(html.startsWith(errorHtml('HTTP 504 Gateway Timeout')));
    assert.match(html, /data-symbol="AAPL"/);
  });

  it('shows loading for sections that have not arrived', async () => {
    const gate = deferred<MarketData>();
    const t = setup({ [STAGE_2A]: gate.promise });
    const run = t.loader.load();
    await flush();

    assert.match(t.surface.get('us-indices'), /data-symbol="\^GSPC"/);
    assert.strictEqual(t.surface.get('us-stocks'), loadingHtml());
    gate.resolve(responses[STAGE_2A]);
    await run;
  });

  it('joins a load already in flight', async () => {
    const gate = deferred<MarketData>();
    const t = setup({ [STAGE_1]: gate.promise });
    const first = t.loader.load(true);

    assert.strictEqual(t.loader.load(), first);
    assert.strictEqual(t.loader.load(true), first);
    assert.strictEqual(t.loader.loading, true);
    gate.resolve(responses[STAGE_1]);
    await first;
    assert.strictEqual(t.calls.length, 3);
    assert.strictEqual(t.loader.loading, false);

    await t.loader.load();
    assert.strictEqual(t.calls.length, 6);
  });

  it('runs a refresh after a plain load that is already in flight', async () => {
    const gate = deferred<MarketData>();
    const t = setup({ [STAGE_1]: gate.promise });
    const first = t.loader.load();
    const refresh = t.loader.load(true);

    assert.notStrictEqual(refresh, first);
    assert.strictEqual(t.loader.load(true), refresh);
    gate.resolve(responses[STAGE_1]);
    const report = await refresh;

    assert.deepStrictEqual(report.completed, ['1', '2a', '2b']);
    assert.deepStrictEqual(t.calls.map(c => c.force), [false, false, false, true, true, true]);
    assert.strictEqual(t.loader.loading, false);
  });
});

describe('Api.marketData', () => {
  it('requests the stage sections with the refresh flag', async () => {
    const { fetch, calls } = routeFetch({
      '/api/market-data?sections=us_stocks,tw_markets&refresh=true': () => ok(responses[STAGE_2A]),
    });
    const data = await new Api('', fetch).marketData(['us_stocks', 'tw_markets'], true, 1000);
    assert.deepStrictEqual(calls, [{ url: '/api/market-data?sections=us_stocks,tw_markets&refresh=true', method: 'GET' }]);
    assert.strictEqual(data.us_stocks?.AAPL.current_price, 200);
  });
});
