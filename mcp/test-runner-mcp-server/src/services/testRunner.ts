import type {
  CommandInvocation,
  CommandRunner,
  CommandTemplate,
  ExecuteOptions,
  ExecutionResult,
  TestRunOutcome,
  TestRunnerSettings,
} from '../types.js';
import { CURRENT_DIRECTORY, CYPRESS_FILE_KIND, RSPEC_FILE_KIND } from '../constants.js';
import { logger } from '../logger.js';
import {
  describeLineNumberError,
  describePathError,
  normalizeToWorkingDirectory,
  validateLineNumbers,
  validateTestPath,
} from './pathValidator.js';
import { describeArgumentError, validateArguments } from './argumentSanitizer.js';
import {
  buildArgumentInvocation,
  buildFileInvocation,
  buildShellInvocation,
  formatCommandLine,
  formatFileTarget,
  isShellPipeline,
  parseCommandTemplate,
} from './commandBuilder.js';
import { describePipelineError, processCypressOutput } from './cypressOutput.js';
import { executeCommand } from './executor.js';
import { CommandSpawnError } from './errors.js';

const log = logger.child({ component: 'service' });

/**
 * The three operations exposed to MCP callers. Validation always completes
 * before anything is spawned; each operation spawns at most one process.
 */
export class TestRunnerService {
  private readonly rspec: CommandTemplate;
  private readonly cypress: CommandTemplate;
  private readonly cypressUsesShell: boolean;

  constructor(
    private readonly settings: TestRunnerSettings,
    private readonly runCommand: CommandRunner = executeCommand
  ) {
    this.rspec = parseCommandTemplate(settings.rspecCommand);
    this.cypress = parseCommandTemplate(settings.cypressCommand);
    this.cypressUsesShell = isShellPipeline(settings.cypressCommand);
  }

  async runRspecFile(
    filePath: string,
    lineNumbers: readonly number[] = [],
    options?: ExecuteOptions
  ): Promise<TestRunOutcome> {
    const path = validateTestPath(filePath, RSPEC_FILE_KIND);
    if (!path.ok) return this.reject(describePathError(path.error));

    const lines = validateLineNumbers(lineNumbers);
    if (!lines.ok) return this.reject(describeLineNumberError(lines.error));

    const target = { filePath, lineNumbers: [...lineNumbers] };
    const result = await this.execute(buildFileInvocation(this.rspec, target), options);
    if (!result.ok) return result.outcome;

    return success(
      [
        `RSpec Test Results for: ${formatFileTarget(target)}`,
        `Exit Code: ${formatExitCode(result.value)}`,
        '',
        'Output:',
        result.value.stdout,
        '',
        'Errors:',
        result.value.stderr,
      ].join('\n')
    );
  }

  async runRspecArguments(
    tokens: readonly string[],
    options?: ExecuteOptions
  ): Promise<TestRunOutcome> {
    const checked = validateArguments(tokens);
    if (!checked.ok) return this.reject(describeArgumentError(checked.error));

    const invocation = buildArgumentInvocation(this.rspec, tokens);
    const result = await this.execute(invocation, options);
    if (!result.ok) return result.outcome;

    return success(
      [
        `RSpec Command: ${formatCommandLine(invocation)}`,
        `Exit Code: ${formatExitCode(result.value)}`,
        '',
        'Output:',
        result.value.stdout,
        '',
        'Errors:',
        result.value.stderr,
      ].join('\n')
    );
  }

  async runCypressFile(filePath: string, options?: ExecuteOptions): Promise<TestRunOutcome> {
    const path = validateTestPath(filePath, CYPRESS_FILE_KIND);
    if (!path.ok) return this.reject(describePathError(path.error));

    const { cypressWorkingDir } = this.settings;
    const specPath = normalizeToWorkingDirectory(filePath, cypressWorkingDir);

    // A pipeline command changes directory itself; a plain one is given cwd
    const invocation = this.cypressUsesShell
      ? buildShellInvocation(this.settings.cypressCommand, specPath)
      : buildFileInvocation(
          this.cypress,
          { filePath: specPath, lineNumbers: [] },
          cypressWorkingDir === CURRENT_DIRECTORY ? undefined : cypressWorkingDir
        );

    const result = await this.execute(invocation, options);
    if (!result.ok) return result.outcome;

    const header = [
      `Cypress Test Results for: ${specPath}`,
      `Exit Code: ${formatExitCode(result.value)}`,
      '',
    ];

    const processed = processCypressOutput(result.value.stdout);
    if (!processed.ok) {
      const reason = describePipelineError(processed.error);
      log.warn({ filePath: specPath, stage: processed.error.stage }, reason);
      return success(
        [
          ...header,
          `Could not process Cypress results (${reason})`,
          '',
          'Output:',
          result.value.stdout,
          '',
          'Errors:',
          result.value.stderr,
        ].join('\n')
      );
    }

    return success(
      [...header, 'Results:', processed.text, '', 'Errors:', result.value.stderr].join('\n')
    );
  }

  private reject(message: string): TestRunOutcome {
    log.warn({ reason: message }, 'rejected test request');
    return { status: 'invalid-params', message };
  }

  private async execute(
    invocation: CommandInvocation,
    options?: ExecuteOptions
  ): Promise<{ ok: true; value: ExecutionResult } | { ok: false; outcome: TestRunOutcome }> {
    try {
      return { ok: true, value: await this.runCommand(invocation, options) };
    } catch (err) {
      if (err instanceof CommandSpawnError) {
        return { ok: false, outcome: { status: 'internal-error', message: err.message } };
      }
      throw err;
    }
  }
}

export function formatExitCode(result: ExecutionResult): string {
  if (result.exitCode !== null) return String(result.exitCode);
  return result.signal ? `unknown (terminated by ${result.signal})` : 'unknown';
}

function success(text: string): TestRunOutcome {
  return { status: 'success', text };
}
