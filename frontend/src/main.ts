// Browser entry: config, telemetry, then the dashboard on DOMContentLoaded.

import { loadConfig } from './config.js';
import { Dashboard } from './dashboard.js';
import { installTelemetry } from './modules/telemetry.js';
import { chartManager } from './services/ChartManager.js';
import { documentSurface } from './shared/utils/dom-utils.js';

function boot() {
  installTelemetry();
  const dashboard = new Dashboard({ config: loadConfig(), surface: documentSurface(), charts: chartManager });
  dashboard.bind(document);
  dashboard.start();
}

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', boot);
} else {
  boot();
}
