import { emit } from '../lib/events.js';
import { sleep } from '../shared/utils/dom-utils.js';

export interface SectionTask {
  name: string;
  run(force: boolean): Promise<void>;
}

export type SequencerState =
  | { kind: 'idle' }
  | { kind: 'running'; index: number; name: string }
  | { kind: 'done'; failed: string[] };

export interface SequenceResult {
  attempted: number;
  failed: string[];
}

/**
 * Runs background sections one at a time with a pause between them.
 * A failing task is recorded and the next one still runs; the run itself never rejects.
 */
export class SectionSequencer {
  private inFlight: Promise<SequenceResult> | null = null;
  private _state: SequencerState = { kind: 'idle' };

  constructor(
    private tasks: readonly SectionTask[],
    private gapMs: number,
    private pause: (ms: number) => Promise<void> = (ms) => sleep(ms),
  ) {}

  get state(): SequencerState {
    return this._state;
  }

  run(force = false): Promise<SequenceResult> {
    if (this.inFlight) return this.inFlight;
    const run = this.runAll(force).finally(() => { this.inFlight = null; });
    this.inFlight = run;
    return run;
  }

  private async runAll(force: boolean): Promise<SequenceResult> {
    const failed: string[] = [];
    let attempted = 0;
    for (const [index, task] of this.tasks.entries()) {
      if (index > 0) await this.pause(this.gapMs);
      this._state = { kind: 'running', index, name: task.name };
      emit('sequence:task', { index, name: task.name });
      attempted++;
      try {
        await task.run(force);
      } catch (err) {
        console.error(`[sections] ${task.name} failed`, err);
        failed.push(task.name);
      }
    }
    this._state = { kind: 'done', failed: [...failed] };
    emit('sequence:done', { attempted, failed: [...failed] });
    return { attempted, failed };
  }
}
