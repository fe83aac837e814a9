import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ChartModal, MODAL_CANVAS, MODAL_CONTAINER } from '../src/components/chart-modal.js';
import { HttpStatusError } from '../src/modules/fetch.js';
import { ModalStore, modalReducer } from '../src/state/modal.store.js';
import type { ModalState } from '../src/state/modal.store.js';
import type { RatioHistory, StockHistory } from '../src/types/market.types.js';
import { FakeCharts, FakeSurface, deferred } from './helpers.js';

describe('modalReducer', () => {
  const closed: ModalState<number> = { kind: 'closed' };

  it('moves from loading to showing or error for the current token', () => {
    const loading = modalReducer(closed, { type: 'open', title: 'AAPL', token: 1 });
    assert.deepStrictEqual(loading, { kind: 'loading', title: 'AAPL', token: 1 });
    assert.deepStrictEqual(modalReducer(loading, { type: 'loaded', token: 1, data: 7 }), { kind: 'showing', title: 'AAPL', token: 1, data: 7 });
    assert.deepStrictEqual(modalReducer(loading, { type: 'failed', token: 1, message: 'x' }), { kind: 'error', title: 'AAPL', token: 1, message: 'x' });
  });

  it('ignores answers for a stale token or a closed modal', () => {
    const loading = modalReducer(closed, { type: 'open', title: 'MSFT', token: 2 });
    assert.strictEqual(modalReducer(loading, { type: 'loaded', token: 1, data: 7 }), loading);
    assert.strictEqual(modalReducer(closed, { type: 'failed', token: 2, message: 'x' }), closed);
    assert.deepStrictEqual(modalReducer(loading, { type: 'close' }), { kind: 'closed' });
  });
});

describe('ModalStore', () => {
  it('hands out fresh tokens and notifies on change only', () => {
    const store = new ModalStore<string>();
    const kinds: string[] = [];
    store.subscribe(s => kinds.push(s.kind));
    const a = store.open('A');
    const b = store.open('B');
    store.resolve(a, 'late');
    store.resolve(b, 'data');

    assert.notStrictEqual(a, b);
    assert.deepStrictEqual(kinds, ['loading', 'loading', 'showing']);
    assert.deepStrictEqual(store.current, { kind: 'showing', title: 'B', token: b, data: 'data' });
  });
});

const aapl: StockHistory = { symbol: 'AAPL', name: 'Apple', dates: ['2026-03-06', '2026-03-09'], values: [205.12, 208] };

function modalWith(api: { stockHistory?: () => Promise<StockHistory>; ratioHistory?: () => Promise<RatioHistory> }) {
  const surface = new FakeSurface();
  const charts = new FakeCharts();
  const modal = new ChartModal({
    stockHistory: api.stockHistory ?? (() => Promise.reject(new Error('unused'))),
    ratioHistory: api.ratioHistory ?? (() => Promise.reject(new Error('unused'))),
  }, charts, surface);
  return { modal, surface, charts };
}

describe('ChartModal', () => {
  it('draws the stock history once it arrives', async () => {
    const { modal, surface, charts } = modalWith({ stockHistory: async () => aapl });
    await modal.openStock('AAPL', 'Apple');

    assert.match(surface.get(MODAL_CONTAINER), /<h3>Apple \(AAPL\)<\/h3>/);
    assert.match(surface.get(MODAL_CONTAINER), new RegExp(`<canvas id="${MODAL_CANVAS}">`));
    assert.deepStrictEqual(charts.drawn, [{
      kind: 'line', id: MODAL_CANVAS, labels: aapl.dates, series: [{ label: 'AAPL', values: aapl.values }],
    }]);
  });

  it('says there is no history on a 404', async () => {
    const { modal, surface } = modalWith({
      stockHistory: () => Promise.reject(new HttpStatusError(404, 'HTTP 404: history for ZZZZ not found')),
    });
    await modal.openStock('ZZZZ', 'ZZZZ');
    assert.deepStrictEqual(modal.store.current, { kind: 'error', title: 'ZZZZ', token: 1, message: 'No history available' });
    assert.match(surface.get(MODAL_CONTAINER), /<div class="error" role="alert">No history available<\/div>/);
  });

  it('drops a slow answer once another chart was opened', async () => {
    const slow = deferred<StockHistory>();
    const { modal, charts } = modalWith({
      stockHistory: () => slow.promise,
      ratioHistory: async () => ({ name: 'Gold/Silver', period_label: '20y', dates: ['2026-01-31'], values: [2] }),
    });
    const first = modal.openStock('AAPL', 'Apple');
    await modal.openRatio('gold_silver', 'Gold/Silver');
    slow.resolve(aapl);
    await first;

    const state = modal.store.current;
    assert.strictEqual(state.kind, 'showing');
    assert.strictEqual(state.kind === 'showing' ? state.title : '', 'Gold/Silver');
    assert.deepStrictEqual(charts.drawn.map(d => d.series[0].label), ['Gold/Silver']);
  });

  it('lists articles and closes', () => {
    const { modal, surface } = modalWith({});
    modal.openNews({
      symbol: 'MSFT', name: 'Microsoft', count: 1, rank: 1,
      news: [{ title: 'Cloud <deal>', publisher: 'Wire', link: 'https://news.test/cloud', published_at: '2026-03-10T13:05:00.000Z' }],
    });
    assert.match(surface.get(MODAL_CONTAINER), /<a href="https:\/\/news.test\/cloud" target="_blank" rel="noopener">Cloud &lt;deal&gt;<\/a> <span class="muted">Wire · 2026-03-10 13:05<\/span>/);
    modal.close();
    assert.strictEqual(surface.get(MODAL_CONTAINER), '');
  });
});
