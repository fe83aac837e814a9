// Typed in-page event bus; telemetry subscribes, loaders and the sequencer emit.

export interface EventMap {
  'api:attempt': { url: string };
  'api:success': { url: string; ms: number };
  'api:error': { url: string; ms: number; error: string };
  'stage:start': { stage: string; sections: string[] };
  'stage:done': { stage: string; ok: boolean; message?: string };
  'load:done': { completed: string[]; failed: number; aborted: boolean };
  'sequence:task': { index: number; name: string };
  'sequence:done': { attempted: number; failed: string[] };
}

export type EventName = keyof EventMap;
export type EventHandler<K extends EventName> = (payload: EventMap[K]) => void;

class EventBus {
  private handlers: { [K in EventName]?: Set<EventHandler<K>> } = {};

  on<K extends EventName>(event: K, handler: EventHandler<K>): () => void {
    const handlers: { [P in K]?: Set<EventHandler<P>> } = this.handlers;
    let set = handlers[event];
    if (!set) {
      set = new Set<EventHandler<K>>();
      handlers[event] = set;
    }
    set.add(handler);
    return () => this.off(event, handler);
  }

  off<K extends EventName>(event: K, handler: EventHandler<K>) {
    this.handlers[event]?.delete(handler);
  }

  emit<K extends EventName>(event: K, payload: EventMap[K]) {
    const set = this.handlers[event];
    if (!set) return;
    for (const h of Array.from(set)) {
      try {
        h(payload);
      } catch (err) {
        console.error(`[events] ${event} handler failed`, err);
      }
    }
  }
}

const bus = new EventBus();

export function on<K extends EventName>(event: K, handler: EventHandler<K>) {
  return bus.on(event, handler);
}
export function emit<K extends EventName>(event: K, payload: EventMap[K]) {
  bus.emit(event, payload);
}
