import type { FlagSpec, TestFileKind } from './types.js';

export const SERVER_NAME = 'test-runner-mcp-server';
export const SERVER_VERSION = '1.0.0';

export const DEFAULT_HOSTNAME = '127.0.0.1';
export const DEFAULT_PORT = 30301;
export const SSE_PATH = '/sse';
export const MESSAGE_PATH = '/message';

export const DEFAULT_RSPEC_COMMAND = 'bundle exec rspec --format progress';
export const DEFAULT_CYPRESS_COMMAND = 'npx cypress run --quiet --reporter json --spec';
export const CURRENT_DIRECTORY = '.';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export const DEFAULT_LOG_LEVEL = 'info';

export const MAX_ARGUMENTS = 50;
export const MAX_ARGUMENT_LENGTH = 1000;

// Checked in this order; the first one found is reported.
export const DANGEROUS_CHARACTERS = [';', '&', '|', '$', '`', '(', ')', '<', '>', '"', "'"];

export const RSPEC_FILE_KIND: TestFileKind = {
  name: 'RSpec',
  suffixes: ['_spec.rb'],
};

export const CYPRESS_FILE_KIND: TestFileKind = {
  name: 'Cypress',
  suffixes: ['.cy.js', '.cy.ts', '.cy.jsx', '.cy.tsx'],
};

export const ALLOWED_OUTPUT_DIRECTORIES = ['tmp/', 'log/', 'coverage/'];
export const REQUIRE_EXTENSION = '.rb';

export const RSPEC_FLAGS: ReadonlyMap<string, FlagSpec> = new Map<string, FlagSpec>([
  ['--backtrace', { type: 'switch' }],
  ['-b', { type: 'switch' }],
  ['--color', { type: 'switch' }],
  ['--colour', { type: 'switch' }],
  ['--no-color', { type: 'switch' }],
  ['--no-colour', { type: 'switch' }],
  ['--dry-run', { type: 'switch' }],
  ['--fail-fast', { type: 'switch' }],
  ['--no-fail-fast', { type: 'switch' }],
  ['--warnings', { type: 'switch' }],
  ['-w', { type: 'switch' }],
  ['--out', { type: 'value', shape: 'output-path' }],
  ['-o', { type: 'value', shape: 'output-path' }],
  ['--deprecation-out', { type: 'value', shape: 'output-path' }],
  ['--require', { type: 'value', shape: 'require-path' }],
  ['-r', { type: 'value', shape: 'require-path' }],
  ['--seed', { type: 'value', shape: 'non-negative-integer' }],
  ['--format', { type: 'value', shape: 'free' }],
  ['-f', { type: 'value', shape: 'free' }],
  ['--tag', { type: 'value', shape: 'free' }],
  ['-t', { type: 'value', shape: 'free' }],
  ['--example', { type: 'value', shape: 'free' }],
  ['-e', { type: 'value', shape: 'free' }],
  ['--pattern', { type: 'value', shape: 'free' }],
  ['-P', { type: 'value', shape: 'free' }],
  ['--order', { type: 'value', shape: 'free' }],
  ['--profile', { type: 'optional-numeric' }],
  ['-p', { type: 'optional-numeric' }],
]);

export const ERR_INVALID_PARAMS = 'Invalid parameters';
export const ERR_INTERNAL = 'Internal error';
export const ERR_NO_JSON = 'No JSON found in Cypress output';
