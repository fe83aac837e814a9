import { on } from '../lib/events.js';

export interface TelemetrySink {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

/** Mirrors bus traffic to the console; returns an uninstall function. */
export function installTelemetry(sink: TelemetrySink = console): () => void {
  const offs = [
    on('api:attempt', p => sink.debug(`[api] TRY ${p.url}`)),
    on('api:success', p => sink.debug(`[api] OK  ${p.url} ${p.ms}ms`)),
    on('api:error', p => sink.warn(`[api] ERR ${p.url} ${p.ms}ms :: ${p.error}`)),
    on('stage:done', p => p.ok
      ? sink.debug(`[stage ${p.stage}] done`)
      : sink.warn(`[stage ${p.stage}] failed :: ${p.message ?? ''}`)),
    on('load:done', p => sink.debug(`[load] completed=${p.completed.join(',')} failed=${p.failed}${p.aborted ? ' (aborted)' : ''}`)),
    on('sequence:task', p => sink.debug(`[sections] #${p.index + 1} ${p.name}`)),
    on('sequence:done', p => sink.debug(`[sections] ${p.attempted} run, failed: ${p.failed.join(',') || 'none'}`)),
  ];
  return () => offs.forEach(off => off());
}
