/**
 * Shared DOM utilities for frontend components.
 *
 * Components write through a DomSurface keyed by container id, so rendering
 * logic runs unchanged against the page or an in-memory stand-in.
 */

import { escapeHtml } from '../../lib/format.js';

export interface DomSurface {
  has(id: string): boolean;
  setHtml(id: string, html: string): void;
  setText(id: string, text: string): void;
}

export function documentSurface(doc: Document = document): DomSurface {
  return {
    has: (id) => doc.getElementById(id) !== null,
    setHtml(id, html) {
      const el = doc.getElementById(id);
      if (el) el.innerHTML = html;
    },
    setText(id, text) {
      const el = doc.getElementById(id);
      if (el) el.textContent = text;
    },
  };
}

export function loadingHtml(text = 'Loading...'): string {
  return `<div class="loading" role="status" aria-live="polite">${escapeHtml(text)}</div>`;
}

export function emptyHtml(text: string): string {
  return `<div class="loading">${escapeHtml(text)}</div>`;
}

export function errorHtml(message: string): string {
  return `<div class="error" role="alert">${escapeHtml(message || 'Error')}</div>`;
}

/** Callback-style timer so tests can drive time by hand. Returns a cancel function. */
export interface Timers {
  set(fn: () => void, ms: number): () => void;
}

export const realTimers: Timers = {
  set(fn, ms) {
    const handle = setTimeout(fn, ms);
    return () => clearTimeout(handle);
  },
};

export function sleep(ms: number, timers: Timers = realTimers): Promise<void> {
  return new Promise(resolve => { timers.set(resolve, ms); });
}
