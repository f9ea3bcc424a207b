export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * The test command could not be started at all (missing executable, bad
 * working directory, cancelled). A command that starts and exits non-zero is
 * not an error.
 */
export class CommandSpawnError extends Error {
  readonly program: string;
  readonly code?: string;

  constructor(program: string, cause: Error & { code?: string }) {
    super(`Failed to start ${program}: ${cause.message}`);
    this.name = 'CommandSpawnError';
    this.program = program;
    this.code = cause.code;
  }
}
