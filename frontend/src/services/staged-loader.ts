import type { Api } from '../app/services/api.service.js';
import type { StageDefinition, StageId } from '../config.js';
import { emit } from '../lib/events.js';
import { describeLoadError } from '../modules/fetch.js';
import type { SnapshotStore } from '../state/snapshot.store.js';

export interface LoadReport {
  completed: StageId[];
  failed: { stage: StageId; message: string }[];
  /** Stage 1 failed, so later stages were not requested. */
  aborted: boolean;
}

export interface StagedLoaderDeps {
  api: Pick<Api, 'marketData'>;
  store: SnapshotStore;
  board: { render(): void };
  notifier: { show(message: string): void };
  stages: readonly StageDefinition[];
}

/**
 * Fetches the market board in priority stages. The first stage gates the rest;
 * later stages fail independently. A call while a load is running joins it,
 * except a refresh during a plain load, which runs once that load settles.
 */
export class StagedLoader {
  private inFlight: Promise<LoadReport> | null = null;
  private inFlightForce = false;
  private queuedRefresh: Promise<LoadReport> | null = null;

  constructor(private deps: StagedLoaderDeps) {}

  get loading(): boolean {
    return this.inFlight !== null;
  }

  load(force = false): Promise<LoadReport> {
    if (this.inFlight) {
      if (!force || this.inFlightForce) return this.inFlight;
      if (!this.queuedRefresh) {
        const next = () => {
          this.queuedRefresh = null;
          return this.load(true);
        };
        this.queuedRefresh = this.inFlight.then(next, next);
      }
      return this.queuedRefresh;
    }
    this.inFlightForce = force;
    const run = this.run(force).finally(() => { this.inFlight = null; });
    this.inFlight = run;
    return run;
  }

  private async run(force: boolean): Promise<LoadReport> {
    const { api, store, board, notifier, stages } = this.deps;
    const report: LoadReport = { completed: [], failed: [], aborted: false };

    for (const [index, stage] of stages.entries()) {
      emit('stage:start', { stage: stage.id, sections: [...stage.sections] });
      try {
        const data = await api.marketData(stage.sections, force, stage.timeoutMs);
        store.merge(data);
        board.render();
        report.completed.push(stage.id);
        emit('stage:done', { stage: stage.id, ok: true });
      } catch (err) {
        const message = describeLoadError(err);
        console.error(`[stage ${stage.id}] ${stage.label} failed`, err);
        report.failed.push({ stage: stage.id, message });
        emit('stage:done', { stage: stage.id, ok: false, message });
        notifier.show(`Market data (${stage.label}): ${message}`);
        if (index === 0) {
          store.markFailed(stages.flatMap(s => s.sections), message);
          board.render();
          report.aborted = true;
          break;
        }
        store.markFailed(stage.sections, message);
        board.render();
      }
    }

    emit('load:done', { completed: [...report.completed], failed: report.failed.length, aborted: report.aborted });
    return report;
  }
}
