/**
 * Node entry point: load .env, validate configuration, listen.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { ConfigError, loadConfig, type OrchestratorConfig } from './config';
import { createApp } from './index';
import { safeLog, setLogLevel } from './utils/log-sanitizer';

function readConfig(): OrchestratorConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      safeLog.error('[Startup] Invalid configuration', { issues: error.issues });
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = readConfig();
  setLogLevel(config.logLevel);
  const app = createApp(config);

  const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
    safeLog.info('[Startup] Visual Elements Orchestrator listening', {
      host: info.address,
      port: info.port,
      environment: config.environment,
      services: config.services,
    });
  });

  const shutdown = (signal: string) => {
    safeLog.info('[Shutdown] Closing server', { signal });
    server.close((error) => {
      if (error) {
        safeLog.error('[Shutdown] Server close failed', { error: error.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
