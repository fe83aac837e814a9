import { escapeHtml } from '../lib/format.js';
import { realTimers } from '../shared/utils/dom-utils.js';
import type { DomSurface, Timers } from '../shared/utils/dom-utils.js';

export type BannerKind = 'error' | 'info';

/** One transient banner at a time; a new message replaces the old one and restarts its timer. */
export class Notifier {
  private cancel: (() => void) | null = null;
  private message: string | null = null;

  constructor(
    private surface: DomSurface,
    private lifetimeMs: number,
    private timers: Timers = realTimers,
    private containerId = 'global-banner',
  ) {}

  get current(): string | null {
    return this.message;
  }

  show(message: string, kind: BannerKind = 'error') {
    this.cancel?.();
    this.message = message;
    this.surface.setHtml(this.containerId, `<div class="banner banner-${kind}" role="alert">${escapeHtml(message)}</div>`);
    this.cancel = this.timers.set(() => this.clear(), this.lifetimeMs);
  }

  clear() {
    this.cancel?.();
    this.cancel = null;
    this.message = null;
    this.surface.setHtml(this.containerId, '');
  }
}
