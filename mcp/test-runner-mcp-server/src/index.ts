#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { createServer, startSseServer } from './server.js';
import { TestRunnerService } from './services/testRunner.js';

// Redirect console.log to console.error to avoid interfering with JSON-RPC over stdout
console.log = console.error;

async function main() {
  const config = loadConfig(process.argv.slice(2), process.env);
  logger.level = config.logLevel;

  const service = new TestRunnerService(config.settings);
  logger.info({ settings: config.settings, transport: config.transport }, 'starting test runner MCP server');

  if (config.transport === 'sse') {
    const sse = await startSseServer(service, config.hostname, config.port);
    const shutdown = () => {
      logger.info('shutting down');
      sse.close().catch((err: unknown) => {
        logger.error({ err }, 'error during shutdown');
        process.exitCode = 1;
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
    return;
  }

  const server = createServer(service);
  const transport = new StdioServerTransport();

  await server.connect(transport);

  // StdioServerTransport keeps the process alive by listening on stdin
}

main().catch((error) => {
  logger.fatal({ err: error }, 'fatal error in MCP server');
  process.exit(1);
});
