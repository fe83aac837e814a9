import 'dotenv/config';
import type { Server } from 'http';
import type { Express } from 'express';
import { createApp } from './app.js';
import { ConfigError, loadConfig, type ServerConfig } from './config/env.js';
import { logger } from './utils/logger.js';

// Global process-level safety nets
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'unhandled_rejection');
});
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaught_exception');
});

const PORT_AUTOINC = String(process.env.PORT_AUTOINC ?? 'false') === 'true';
const PORT_MAX_TRIES = Number(process.env.PORT_MAX_TRIES || 5);

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (err) {
    logger.error({ err, issues: err instanceof ConfigError ? err.issues : undefined }, 'config_invalid');
    process.exit(1);
  }
}

function listenOnce(app: Express, port: number) {
  return new Promise<Server>((resolve, reject) => {
    const srv = app.listen(port, () => {
      logger.info({ port }, 'server_listening');
      resolve(srv);
    });
    srv.on('error', reject);
  });
}

async function startWithRetry(app: Express, basePort: number) {
  let port = basePort;
  for (let attempt = 0; attempt < Math.max(1, PORT_MAX_TRIES); attempt++) {
    try {
      return await listenOnce(app, port);
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      if (code === 'EADDRINUSE' && PORT_AUTOINC) {
        logger.warn({ port }, 'port_in_use_try_next');
        port += 1;
        continue;
      }
      logger.error({ err, port }, code === 'EADDRINUSE' ? 'port_in_use_exit' : 'server_listen_failed');
      process.exit(1);
    }
  }
  logger.error({ basePort, tries: PORT_MAX_TRIES }, 'port_search_exhausted');
  process.exit(1);
}

const config = readConfig();
startWithRetry(createApp({ config }), config.port).catch((err) => {
  logger.error({ err }, 'server_start_failed');
  process.exit(1);
});
