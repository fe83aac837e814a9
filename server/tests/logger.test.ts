import { afterEach, describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { createApp } from '../src/app.js';
import { logger, setLogLevel } from '../src/utils/logger.js';
import { FakeProvider, NOW, testConfig, universe } from './helpers.js';

function parse(line: unknown): Record<string, unknown> {
  return JSON.parse(String(line));
}

describe('logger', () => {
  afterEach(() => {
    mock.restoreAll();
    setLogLevel('silent');
  });

  it('drops lines below the configured level', () => {
    const log = mock.method(console, 'log', () => {});
    const warn = mock.method(console, 'warn', () => {});
    setLogLevel('warn');
    logger.info('hidden');
    logger.warn({ symbol: 'AAPL' }, 'shown');
    assert.strictEqual(log.mock.callCount(), 0);
    assert.strictEqual(warn.mock.callCount(), 1);
    const { time, ...rest } = parse(warn.mock.calls[0].arguments[0]);
    assert.strictEqual(typeof time, 'string');
    assert.deepStrictEqual(rest, { level: 'warn', symbol: 'AAPL', msg: 'shown' });
  });

  it('normalises errors', () => {
    const error = mock.method(console, 'error', () => {});
    setLogLevel('error');
    logger.error({ err: new TypeError('bad input') }, 'failed');
    const line = parse(error.mock.calls[0].arguments[0]);
    assert.match(JSON.stringify(line.err), /^\{"name":"TypeError","message":"bad input","stack":/);
  });

  it('takes the level from the app config', () => {
    const log = mock.method(console, 'log', () => {});
    createApp({ config: testConfig({ logLevel: 'debug' }), provider: new FakeProvider(), universe, now: () => NOW, bfi82u: null });
    logger.debug('visible');
    const msgs = log.mock.calls.map(c => parse(c.arguments[0]).msg);
    assert.ok(msgs.includes('visible'));
  });
});
