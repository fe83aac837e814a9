import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  MarketBoard, earningsHtml, metalsHintHtml, quoteCardHtml, rangePosition, ratioCardHtml, skippedHtml,
} from '../src/components/market-board.js';
import { errorHtml, loadingHtml } from '../src/shared/utils/dom-utils.js';
import { SnapshotStore } from '../src/state/snapshot.store.js';
import type { RatioRecord } from '../src/types/market.types.js';
import { FakeSurface, quote } from './helpers.js';

function order(html: string): string[] {
  return Array.from(html.matchAll(/data-symbol="([^"]+)"/g), m => m[1]);
}

const ratio: RatioRecord = {
  id: 'gold_silver',
  name: 'Gold/Silver',
  description: '',
  unit: 'x',
  current: 3,
  range_high: 4,
  range_low: 2,
  high_date: '2026-02-02',
  low_date: '2026-01-30',
  period_label: '20y',
  error: null,
};

describe('MarketBoard.render', () => {
  it('shows cards for loaded sections and loading for the rest', () => {
    const store = new SnapshotStore();
    const surface = new FakeSurface();
    store.merge({ us_indices: { '^GSPC': quote('^GSPC', 5000, 0.5) } });
    new MarketBoard(store, surface).render();

    assert.deepStrictEqual(order(surface.get('us-indices')), ['^GSPC']);
    assert.strictEqual(surface.get('us-stocks'), loadingHtml());
    assert.strictEqual(surface.get('ratios-container'), loadingHtml());
    assert.strictEqual(surface.get('earnings-upcoming'), loadingHtml());
  });

  it('skips containers missing from the page', () => {
    const store = new SnapshotStore();
    const surface = new FakeSurface(['us-indices']);
    new MarketBoard(store, surface).render();
    assert.deepStrictEqual(Array.from(surface.html.keys()), ['us-indices']);
  });

  it('applies the default sort per section and re-renders on change', () => {
    const store = new SnapshotStore();
    const surface = new FakeSurface();
    store.merge({
      us_indices: { B: quote('B', 30, 1), A: quote('A', 10, 3), C: quote('C', 20, 2) },
      us_stocks: { B: quote('B', 30, 1), A: quote('A', 10, 3), C: quote('C', 20, 2) },
      crypto: { B: quote('B', 30, 1), A: quote('A', 10, 3), C: quote('C', 20, 2) },
    });
    const board = new MarketBoard(store, surface);
    board.render();

    assert.deepStrictEqual(order(surface.get('us-indices')), ['B', 'A', 'C']);
    assert.deepStrictEqual(order(surface.get('us-stocks')), ['A', 'C', 'B']);
    assert.deepStrictEqual(order(surface.get('crypto-markets')), ['A', 'C', 'B']);

    board.setSort('us_stocks', 'priceDesc');
    assert.deepStrictEqual(order(surface.get('us-stocks')), ['B', 'C', 'A']);
    assert.strictEqual(board.sortFor('us_stocks'), 'priceDesc');
  });

  it('puts the error overlay above stale cards', () => {
    const store = new SnapshotStore();
    const surface = new FakeSurface();
    store.merge({ tw_markets: { '^TWII': quote('^TWII', 20000, -0.3) } });
    store.markFailed(['tw_markets'], 'HTTP 502');
    new MarketBoard(store, surface).render();

    const html = surface.get('tw-markets');
    assert.ok(html.startsWith(errorHtml('HTTP 502')));
    assert.deepStrictEqual(order(html), ['^TWII']);
    assert.strictEqual(surface.get('earnings-upcoming-tw'), '');
  });

  it('renders ratios, the earnings strip and the hints', () => {
    const store = new SnapshotStore();
    const surface = new FakeSurface();
    store.merge({
      ratios: { ratios: [ratio], timestamp: '2026-03-10T15:00:00.000Z' },
      earnings_upcoming: [{ symbol: 'AAPL', name: 'Apple', date: '2026-04-20', days_until: 41 }],
      earnings_upcoming_tw: [{ symbol: '2330.TW', name: 'TSMC', date: '2026-04-16', days_until: 37 }],
      metals_session: 'day',
      metals_session_et: '11:00',
      skipped_symbols: [{ symbol: 'MSFT', name: 'Microsoft', section: 'us_stocks' }],
    });
    new MarketBoard(store, surface).render();

    assert.match(surface.get('ratios-container'), /data-ratio="gold_silver"/);
    assert.match(surface.get('earnings-upcoming'), /AAPL 4\/20 <small>41d<\/small>/);
    assert.match(surface.get('earnings-upcoming-tw'), /2330\.TW 4\/16 <small>37d<\/small>/);
    assert.match(surface.get('metals-session-hint'), /COMEX day session \(ET 11:00\)/);
    assert.strictEqual(surface.get('skipped-symbols'), '<div class="hint">Temporarily unavailable: MSFT (Microsoft)</div>');
  });
});

describe('quoteCardHtml', () => {
  it('shows the change with an arrow and the badges', () => {
    const html = quoteCardHtml(quote('AAPL', 1234.5, -0.75, {
      change: -1.5,
      display_name: 'Apple',
      session: 'pre',
      earnings_date: '2026-04-20',
      earnings_days_until: 41,
      open: 1230,
      high: null,
      low: 1200.25,
      volume: 1500000,
    }));
    assert.match(html, /data-symbol="AAPL" data-display-name="Apple"/);
    assert.match(html, /<div class="price">1,234.5<\/div>/);
    assert.match(html, /<div class="change down">↓ -1.50 \(-0.75%\)<\/div>/);
    assert.match(html, /<span class="badge session-pre">Pre-market<\/span>/);
    assert.match(html, /Earnings 4\/20 \(41d\)/);
    assert.match(html, /<div class="ohlc">O 1,230 · H N\/A · L 1,200.25 · Vol 1,500,000<\/div>/);
  });

  it('escapes names', () => {
    const html = quoteCardHtml(quote('X', 1, 0, { name: '<b>&Co' }));
    assert.match(html, /&lt;b&gt;&amp;Co/);
    assert.match(html, /<div class="change flat">→ 0.00 \(0.00%\)<\/div>/);
  });
});

describe('ratio helpers', () => {
  it('places the marker within the range', () => {
    assert.strictEqual(rangePosition(ratio), 50);
    assert.strictEqual(rangePosition({ current: 5, range_high: 4, range_low: 2 }), 100);
    assert.strictEqual(rangePosition({ current: 2, range_high: 2, range_low: 2 }), 50);
    assert.strictEqual(rangePosition({ current: null, range_high: 2, range_low: 1 }), null);
  });

  it('shows the error line for a failed ratio', () => {
    const html = ratioCardHtml({ ...ratio, current: null, error: 'missing price data' });
    assert.match(html, /<div class="error-line">missing price data<\/div>/);
  });
});

describe('board hints', () => {
  it('collapses long skipped lists into one line', () => {
    const many = Array.from({ length: 21 }, (_, i) => ({ symbol: `S${i}`, name: `N${i}`, section: 'us_stocks' }));
    assert.strictEqual(skippedHtml(many), '<div class="hint">21 symbols are temporarily unavailable from the quote provider.</div>');
    assert.strictEqual(skippedHtml([]), '');
  });

  it('omits the metals hint without a session', () => {
    assert.strictEqual(metalsHintHtml({}), '');
    assert.match(metalsHintHtml({ metals_session: 'night' }), /^<div class="hint">COMEX night session\. Day session/);
  });

  it('says when no earnings are coming', () => {
    assert.strictEqual(earningsHtml([]), '<div class="loading">No upcoming earnings</div>');
  });
});
