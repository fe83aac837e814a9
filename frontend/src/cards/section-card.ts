import { describeLoadError } from '../modules/fetch.js';
import { errorHtml } from '../shared/utils/dom-utils.js';
import type { CardDeps } from './registry.js';

/**
 * Fetch, render, then run `after` (charts need the canvases in place).
 * Failures land inline in the container and in the banner, then reject for the sequencer.
 */
export async function renderSection<T>(
  deps: Pick<CardDeps, 'surface' | 'notifier'>,
  containerId: string,
  title: string,
  load: () => Promise<T>,
  render: (data: T) => string,
  after?: (data: T) => void,
): Promise<void> {
  try {
    const data = await load();
    deps.surface.setHtml(containerId, render(data));
    after?.(data);
  } catch (err) {
    const message = describeLoadError(err);
    console.error(`[${containerId}] load failed`, err);
    deps.surface.setHtml(containerId, errorHtml(message));
    deps.notifier.show(`${title}: ${message}`);
    throw err;
  }
}

export function localIsoDate(d: Date): string {
  const p = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${p(d.getMonth() + 1)}-${p(d.getDate())}`;
}
