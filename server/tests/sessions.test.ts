import { describe, it } from 'node:test';
import assert from 'node:assert';
import { premarketWindow } from '../src/services/premarket.js';
import { comexSession } from '../src/services/sessions.js';
import { universe } from './helpers.js';

describe('comexSession', () => {
  it('is the day session on weekday mornings in New York', () => {
    assert.deepStrictEqual(comexSession(new Date('2026-03-10T15:00:00Z')), { session: 'day', et: '11:00' });
    assert.deepStrictEqual(comexSession(new Date('2026-03-10T12:20:00Z')), { session: 'day', et: '08:20' });
  });

  it('switches to night at 13:30 ET, in the evening and on weekends', () => {
    assert.deepStrictEqual(comexSession(new Date('2026-03-10T17:30:00Z')), { session: 'night', et: '13:30' });
    assert.deepStrictEqual(comexSession(new Date('2026-03-11T00:00:00Z')), { session: 'night', et: '20:00' });
    assert.strictEqual(comexSession(new Date('2026-03-14T15:00:00Z')).session, 'night');
  });
});

describe('premarketWindow', () => {
  const { us, taiwan } = universe.premarket;

  it('covers the 12 hours before the US open', () => {
    const w = premarketWindow(us, new Date('2026-03-10T12:00:00Z'));
    assert.strictEqual(w.type, 'premarket');
    assert.strictEqual(w.end.toISOString(), '2026-03-10T13:30:00.000Z');
    assert.strictEqual(w.start.toISOString(), '2026-03-10T01:30:00.000Z');
  });

  it('uses Friday on weekends', () => {
    const w = premarketWindow(us, new Date('2026-03-14T15:00:00Z'));
    assert.strictEqual(w.type, 'premarket_friday');
    assert.strictEqual(w.end.toISOString(), '2026-03-13T13:30:00.000Z');
  });

  it('reports today once the Taiwan reference time has passed', () => {
    const w = premarketWindow(taiwan, new Date('2026-03-10T03:00:00Z'));
    assert.strictEqual(w.type, 'premarket_today');
    assert.strictEqual(w.end.toISOString(), '2026-03-10T00:30:00.000Z');
    assert.strictEqual(w.start.toISOString(), '2026-03-09T12:30:00.000Z');
  });
});
