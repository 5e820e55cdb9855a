#!/usr/bin/env node
// This is the process entrypoint that loads configuration, registers tools, starts the HTTP server, and handles shutdown.

import { AzureDevOpsClient } from './azuredevops/client.js';
import { ConfigError, loadConfig, loadEnvFile } from './config/env.js';
import { ToolRegistry } from './mcp/tool-registry.js';
import { registerAzureDevOpsTools } from './mcp/tools.js';
import { createServer } from './server.js';
import type { AppConfig } from './types/domain.js';
import { createLogger, errorForLog } from './utils/logger.js';

// This helper loads configuration and treats any problem as a fatal startup error.
function readConfig(): AppConfig {
  try {
    return loadConfig(process.env, process.argv.slice(2));
  } catch (error) {
    createLogger().fatal(
      {
        event: 'config_invalid',
        issues: error instanceof ConfigError ? error.issues : undefined,
        error: errorForLog(error)
      },
      'config_invalid'
    );
    process.exit(1);
  }
}

loadEnvFile();
const config = readConfig();

const registry = new ToolRegistry();
const { app } = createServer({
  registry,
  transport: config.transport,
  logLevel: config.logLevel
});

registerAzureDevOpsTools(registry, new AzureDevOpsClient(config.azureDevOps, app.log));

// This helper performs graceful shutdown so open streams end and in-flight dispatches settle.
async function shutdown(signal: string): Promise<void> {
  app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');
  await app.close();
  app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

const { host, port } = config;
app
  .listen({ host, port })
  .then(() => {
    app.log.info({ event: 'server_started', host, port, tools: registry.size }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
    process.exit(1);
  });
