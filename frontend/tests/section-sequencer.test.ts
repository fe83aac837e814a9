import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SectionSequencer } from '../src/services/section-sequencer.js';
import type { SectionTask, SequencerState } from '../src/services/section-sequencer.js';
import { deferred } from './helpers.js';

function recorder() {
  const log: string[] = [];
  const pause = async (ms: number) => { log.push(`pause ${ms}`); };
  const task = (name: string, fail = false): SectionTask => ({
    name,
    async run(force) {
      log.push(`${name}${force ? ' forced' : ''}`);
      if (fail) throw new Error(`${name} failed`);
    },
  });
  return { log, pause, task };
}

describe('SectionSequencer', () => {
  it('runs every task in order with a pause between them', async () => {
    const { log, pause, task } = recorder();
    const seq = new SectionSequencer([task('a'), task('b'), task('c')], 400, pause);
    const result = await seq.run();

    assert.deepStrictEqual(log, ['a', 'pause 400', 'b', 'pause 400', 'c']);
    assert.deepStrictEqual(result, { attempted: 3, failed: [] });
  });

  it('keeps going after a failing task and still resolves', async () => {
    const { log, pause, task } = recorder();
    const seq = new SectionSequencer([task('a'), task('b'), task('c', true), task('d'), task('e')], 400, pause);
    const result = await seq.run(true);

    assert.deepStrictEqual(log.filter(l => !l.startsWith('pause')), ['a forced', 'b forced', 'c forced', 'd forced', 'e forced']);
    assert.strictEqual(log.filter(l => l.startsWith('pause')).length, 4);
    assert.deepStrictEqual(result, { attempted: 5, failed: ['c'] });
    assert.deepStrictEqual(seq.state, { kind: 'done', failed: ['c'] });
  });

  it('never overlaps two tasks', async () => {
    const gate = deferred<void>();
    const started: string[] = [];
    const seq = new SectionSequencer([
      { name: 'slow', run: () => { started.push('slow'); return gate.promise; } },
      { name: 'next', run: async () => { started.push('next'); } },
    ], 0, async () => {});
    const run = seq.run();
    await Promise.resolve();

    assert.deepStrictEqual(started, ['slow']);
    const state: SequencerState = seq.state;
    assert.deepStrictEqual(state, { kind: 'running', index: 0, name: 'slow' });
    gate.resolve();
    await run;
    assert.deepStrictEqual(started, ['slow', 'next']);
  });

  it('joins a run already in flight', async () => {
    const gate = deferred<void>();
    let runs = 0;
    const seq = new SectionSequencer([{ name: 'only', run: () => { runs++; return gate.promise; } }], 0, async () => {});
    assert.deepStrictEqual(seq.state, { kind: 'idle' });

    const first = seq.run();
    const second = seq.run(true);
    assert.strictEqual(first, second);
    gate.resolve();
    await first;
    assert.strictEqual(runs, 1);

    await seq.run();
    assert.strictEqual(runs, 2);
  });
});
