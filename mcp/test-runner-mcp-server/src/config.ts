import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import type { TestRunnerSettings } from './types.js';
import {
  CURRENT_DIRECTORY,
  DEFAULT_CYPRESS_COMMAND,
  DEFAULT_HOSTNAME,
  DEFAULT_LOG_LEVEL,
  DEFAULT_PORT,
  DEFAULT_RSPEC_COMMAND,
  LOG_LEVELS,
  SERVER_NAME,
  SERVER_VERSION,
} from './constants.js';
import { ConfigError } from './services/errors.js';

const nonBlank = (fallback: string) =>
  z
    .string()
    .trim()
    .transform((value) => value || fallback)
    .default(fallback);

const EnvSchema = z.object({
  RSPEC_COMMAND: nonBlank(DEFAULT_RSPEC_COMMAND),
  CYPRESS_COMMAND: nonBlank(DEFAULT_CYPRESS_COMMAND),
  CYPRESS_WORKING_DIR: nonBlank(CURRENT_DIRECTORY),
  LOG_LEVEL: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL),
});

export type TransportKind = 'stdio' | 'sse';

export interface ServerConfig {
  settings: TestRunnerSettings;
  logLevel: string;
  transport: TransportKind;
  hostname: string;
  port: number;
}

export interface CliOptions {
  transport: TransportKind;
  hostname: string;
  port: number;
}

export function loadSettings(env: NodeJS.ProcessEnv): Pick<ServerConfig, 'settings' | 'logLevel'> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${details}`);
  }

  return {
    settings: Object.freeze({
      rspecCommand: parsed.data.RSPEC_COMMAND,
      cypressCommand: parsed.data.CYPRESS_COMMAND,
      cypressWorkingDir: parsed.data.CYPRESS_WORKING_DIR,
    }),
    logLevel: parsed.data.LOG_LEVEL,
  };
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

function parseTransport(value: string): TransportKind {
  if (value !== 'stdio' && value !== 'sse') {
    throw new InvalidArgumentError('Transport must be "stdio" or "sse".');
  }
  return value;
}

export function createCli(): Command {
  return new Command()
    .name(SERVER_NAME)
    .description('Test runner MCP server (RSpec and Cypress) over stdio or HTTP with SSE')
    .version(SERVER_VERSION)
    .option('-t, --transport <kind>', 'transport: stdio or sse', parseTransport, 'stdio')
    .option('-H, --hostname <host>', 'hostname to bind the SSE server to', DEFAULT_HOSTNAME)
    .option('-p, --port <port>', 'port for the SSE server', parsePort, DEFAULT_PORT);
}

export function loadConfig(argv: readonly string[], env: NodeJS.ProcessEnv): ServerConfig {
  const program = createCli();
  program.parse([...argv], { from: 'user' });
  const options = program.opts<CliOptions>();

  return Object.freeze({
    ...loadSettings(env),
    transport: options.transport,
    hostname: options.hostname,
    port: options.port,
  });
}
