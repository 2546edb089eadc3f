/**
 * Memory service entry point
 *
 * Loads .env, builds the memory runtime and serves the REST API.
 */

import dotenv from 'dotenv';
import { createApp } from './app.js';
import { ConfigError, loadServiceConfig } from './config/serviceConfig.js';
import { buildMemoryRuntime } from './services/memory/runtime.js';

dotenv.config();

process.on('uncaughtException', (error: Error) => {
  console.error('[Fatal] Uncaught Exception:', error);
});

process.on('unhandledRejection', (reason: unknown) => {
  console.error('[Fatal] Unhandled Promise Rejection:', reason);
});

async function main(): Promise<void> {
  const config = loadServiceConfig();
  console.log(
    `[Config] Vector store pgvector at ${config.postgres.host}:${config.postgres.port}/${config.postgres.database}, ` +
      `graph ${config.graph.enabled ? `enabled (${config.graph.url}, heuristic ${config.graph.labelHeuristic})` : 'disabled'}`
  );

  const runtime = await buildMemoryRuntime(config);
  const app = createApp({ engine: runtime.engine, config });

  const server = app.listen(config.port, config.host, () => {
    console.log(`🚀 [Server] Memory service listening on http://${config.host}:${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Server] ${signal} received, shutting down...`);
    server.close(() => {
      runtime
        .close()
        .then(() => {
          console.log('[Server] Shutdown complete');
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('❌ [Server] Error closing graph connection:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`❌ [Config] ${error.message}`);
  } else {
    console.error('❌ [Server] Failed to start:', error);
  }
  process.exit(1);
});
