import type { Server } from 'http';
import express from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { MESSAGE_PATH, SERVER_NAME, SERVER_VERSION, SSE_PATH } from './constants.js';
import { logger } from './logger.js';
import { registerTestRunnerTools } from './tools/testRunnerTools.js';
import type { TestRunnerService } from './services/testRunner.js';

const INSTRUCTIONS =
  'Test runner server. Tools: run_rspec (run RSpec for a spec file, optionally at line numbers), ' +
  'run_rspec_command (run RSpec with an allowlisted argument list), ' +
  'run_cypress (run a Cypress spec and return its JSON report).';

export function createServer(service: TestRunnerService): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    { instructions: INSTRUCTIONS }
  );

  registerTestRunnerTools(server, service);
  return server;
}

export interface SseServerHandle {
  server: Server;
  port: number;
  close(): Promise<void>;
}

/**
 * Serves MCP over HTTP: clients open an event stream at GET /sse and post
 * their messages to POST /message?sessionId=... . Each stream gets its own
 * McpServer.
 */
export function startSseServer(
  service: TestRunnerService,
  hostname: string,
  port: number
): Promise<SseServerHandle> {
  const log = logger.child({ component: 'http' });
  const transports = new Map<string, SSEServerTransport>();
  const app = express();

  app.get(SSE_PATH, (_req, res) => {
    const transport = new SSEServerTransport(MESSAGE_PATH, res);
    transports.set(transport.sessionId, transport);
    transport.onclose = () => {
      transports.delete(transport.sessionId);
      log.debug({ sessionId: transport.sessionId }, 'session closed');
    };
    log.info({ sessionId: transport.sessionId }, 'session opened');

    createServer(service)
      .connect(transport)
      .catch((err: unknown) => {
        log.error({ err }, 'failed to start session');
        transports.delete(transport.sessionId);
      });
  });

  // No body parser: the transport reads the raw request body itself
  app.post(MESSAGE_PATH, (req, res) => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : '';
    const transport = transports.get(sessionId);
    if (!transport) {
      res.status(400).send('Unknown session');
      return;
    }
    transport.handlePostMessage(req, res).catch((err: unknown) => {
      log.error({ err }, 'failed to handle message');
    });
  });

  app.use((_req, res) => {
    res.status(404).send('Not found');
  });

  return new Promise((resolve, reject) => {
    const httpServer = app.listen(port, hostname, () => {
      httpServer.off('error', reject);
      const address = httpServer.address();
      const boundPort = address !== null && typeof address === 'object' ? address.port : port;
      log.info(`SSE endpoint: http://${hostname}:${boundPort}${SSE_PATH}`);
      log.info(`Message endpoint: http://${hostname}:${boundPort}${MESSAGE_PATH}`);

      // Event streams never end on their own, so sessions are closed first
      const close = async () => {
        await Promise.all([...transports.values()].map((transport) => transport.close()));
        transports.clear();
        httpServer.closeAllConnections();
        await new Promise<void>((done, fail) => {
          httpServer.close((err) => (err ? fail(err) : done()));
        });
      };

      resolve({ server: httpServer, port: boundPort, close });
    });
    httpServer.once('error', reject);
  });
}
