/**
 * ChartManager - one owner for every chart.js instance on the page.
 * Charts are keyed by canvas id; drawing on an id destroys the previous chart first.
 */

import { Chart, registerables } from 'chart.js';
import type { ChartConfiguration } from 'chart.js';

// Register Chart.js components
Chart.register(...registerables);

export interface Series {
  label: string;
  values: number[];
  color?: string;
}

/** What sections and the modal need from a chart backend. */
export interface ChartRenderer {
  line(canvasId: string, labels: string[], series: Series[]): void;
  bar(canvasId: string, labels: string[], series: Series[]): void;
  destroy(canvasId: string): void;
}

class ChartManager implements ChartRenderer {
  private static instance: ChartManager | undefined;
  private charts = new Map<string, { destroy(): void }>();

  private theme = {
    palette: ['#3b82f6', '#10b981', '#f59e0b', '#ef4444', '#8b5cf6', '#0ea5e9'],
    grid: 'rgba(148, 163, 184, 0.2)',
  };

  private constructor() {}

  static getInstance(): ChartManager {
    if (!ChartManager.instance) {
      ChartManager.instance = new ChartManager();
    }
    return ChartManager.instance;
  }

  line(canvasId: string, labels: string[], series: Series[]) {
    const canvas = this.canvas(canvasId);
    if (!canvas) return;
    const config: ChartConfiguration<'line', number[], string> = {
      type: 'line',
      data: {
        labels,
        datasets: series.map((s, i) => ({
          label: s.label,
          data: s.values,
          borderColor: this.color(s, i),
          backgroundColor: this.color(s, i),
          borderWidth: 2,
          pointRadius: 0,
          tension: 0.2,
        })),
      },
      options: {
        responsive: true,
        maintainAspectRatio: false,
        interaction: { mode: 'index', intersect: false },
        plugins: { legend: { display: series.length > 1, position: 'top' } },
        scales: { x: { grid: { color: this.theme.grid } }, y: { grid: { color: this.theme.grid } } },
      },
    };
    this.track(canvasId, () => new Chart(canvas, config));
  }

  bar(canvasId: string, labels: string[], series: Series[]) {
    const canvas = this.canvas(canvasId);
    if (!canvas) return;
    const config: ChartConfiguration<'bar', number[], string> = {
      type: 'bar',
      data: {
        labels,
        datasets: series.map((s, i) => ({
          label: s.label,
          data: s.values,
          backgroundColor: this.color(s, i),
        })),
      },
      options: {
        responsive: true,
        maintainAspectRatio: false,
        interaction: { mode: 'index', intersect: false },
        plugins: { legend: { display: true, position: 'top' } },
        scales: { y: { grid: { color: this.theme.grid } } },
      },
    };
    this.track(canvasId, () => new Chart(canvas, config));
  }

  /** Destroys the chart drawn on `canvasId`, if any. */
  destroy(canvasId: string): void {
    const chart = this.charts.get(canvasId);
    if (chart) {
      chart.destroy();
      this.charts.delete(canvasId);
    }
  }

  private canvas(id: string): HTMLCanvasElement | null {
    const el = document.getElementById(id);
    if (!(el instanceof HTMLCanvasElement)) {
      console.warn(`Canvas with id '${id}' not found`);
      return null;
    }
    return el;
  }

  private color(s: Series, i: number): string {
    return s.color ?? this.theme.palette[i % this.theme.palette.length];
  }

  private track(id: string, create: () => { destroy(): void }) {
    this.destroy(id);
    try {
      this.charts.set(id, create());
    } catch (error) {
      console.error(`Failed to create chart '${id}':`, error);
    }
  }
}

// Export singleton instance
export const chartManager = ChartManager.getInstance();
export default chartManager;
