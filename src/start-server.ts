#!/usr/bin/env node
import 'dotenv/config';
import type { Server } from 'http';
import { ConfigManager } from './config/manager.js';
import type { ConfigSnapshot } from './config/schemas/index.js';
import { buildAuthContext } from './core/context.js';
import { createAuthServer, startHTTPServer } from './http/server.js';
import { PostgresCredentialStore } from './store/postgres-credential-store.js';
import { ConfigError, sanitizeError } from './utils/errors.js';

/**
 * Boot order: configuration → database → services → HTTP.
 * A configuration error exits with status 1 before any port is bound.
 */
async function main() {
  const config = await loadConfigOrExit();
  console.log(`Starting ${config.app.name}...`);
  console.log(`Environment: ${config.app.environment}`);

  const store = new PostgresCredentialStore({
    url: config.database.url,
    minConnections: config.database.minConnections,
    maxConnections: config.database.maxConnections,
    connectTimeoutSecs: config.database.connectTimeoutSecs,
    queryTimeoutMs: config.server.requestTimeoutSecs * 1000,
  });
  await store.ping();
  console.log('[Startup] Database reachable');

  const context = buildAuthContext(config, store);
  const app = createAuthServer(context);
  const server = await startHTTPServer(app, config.server.port, config.server.host);

  const shutdown = (signal: string) => {
    console.log(`\n[Startup] ${signal} received, shutting down...`);
    closeServer(server)
      .then(() => store.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[Startup] Shutdown failed:', sanitizeError(error));
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function loadConfigOrExit(): Promise<ConfigSnapshot> {
  const configManager = new ConfigManager({ secretsDir: process.env.SECRETS_DIR });
  try {
    return await configManager.loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[Startup] ${error.message}`);
      for (const issue of error.issues.slice(1)) {
        console.error(`[Startup]   also: ${issue.field}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

main().catch((error) => {
  console.error('Fatal error:', sanitizeError(error));
  process.exit(1);
});
