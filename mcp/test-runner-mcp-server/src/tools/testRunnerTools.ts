import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { TestRunOutcome } from '../types.js';
import type { TestRunnerService } from '../services/testRunner.js';
import { ERR_INTERNAL, ERR_INVALID_PARAMS } from '../constants.js';

// Helper to format a service outcome as a tool response
function toToolResult(outcome: TestRunOutcome) {
  switch (outcome.status) {
    case 'success':
      return {
        content: [{ type: 'text' as const, text: outcome.text }],
      };
    case 'invalid-params':
      return {
        content: [{ type: 'text' as const, text: `${ERR_INVALID_PARAMS}: ${outcome.message}` }],
        isError: true,
      };
    case 'internal-error':
      return {
        content: [{ type: 'text' as const, text: `${ERR_INTERNAL}: ${outcome.message}` }],
        isError: true,
      };
  }
}

export function registerTestRunnerTools(server: McpServer, service: TestRunnerService) {
  // run_rspec
  server.tool(
    'run_rspec',
    'Run RSpec tests for one spec file, optionally only the examples at the given line numbers',
    {
      file: z.string().describe('Spec file to run (e.g. "spec/models/user_spec.rb")'),
      line_numbers: z
        .array(z.number().int())
        .optional()
        .describe('Line numbers of examples to run (e.g. [37, 87])'),
    },
    async ({ file, line_numbers }, extra) => {
      const outcome = await service.runRspecFile(file, line_numbers ?? [], { signal: extra.signal });
      return toToolResult(outcome);
    }
  );

  // run_rspec_command
  server.tool(
    'run_rspec_command',
    'Run RSpec with a raw argument list (restricted to an allowlist of flags and spec files)',
    {
      args: z
        .array(z.string())
        .describe('Arguments passed to rspec (e.g. ["--fail-fast", "spec/models/user_spec.rb"])'),
    },
    async ({ args }, extra) => {
      const outcome = await service.runRspecArguments(args, { signal: extra.signal });
      return toToolResult(outcome);
    }
  );

  // run_cypress
  server.tool(
    'run_cypress',
    'Run one Cypress spec file and return its JSON report',
    {
      file: z.string().describe('Cypress spec file to run (e.g. "cypress/e2e/login.cy.js")'),
    },
    async ({ file }, extra) => {
      const outcome = await service.runCypressFile(file, { signal: extra.signal });
      return toToolResult(outcome);
    }
  );
}
