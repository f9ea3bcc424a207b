import { spawn, type ChildProcess } from 'child_process';
import type { CommandInvocation, ExecuteOptions, ExecutionResult } from '../types.js';
import { logger } from '../logger.js';
import { CommandSpawnError } from './errors.js';
import { formatCommandLine } from './commandBuilder.js';

const log = logger.child({ component: 'executor' });

/**
 * Runs one test command to completion and buffers everything it writes.
 *
 * Resolves with the exit code whatever it is; rejects with CommandSpawnError
 * only when the process could not be started. There is no timeout: a hung
 * test run is ended by aborting `options.signal`.
 */
export function executeCommand(
  invocation: CommandInvocation,
  options: ExecuteOptions = {}
): Promise<ExecutionResult> {
  const program = invocation.style === 'argv' ? invocation.program : invocation.command;
  log.debug({ style: invocation.style, command: formatCommandLine(invocation) }, 'spawning');

  return new Promise((resolve, reject) => {
    let child: ChildProcess;
    const spawnOptions = {
      cwd: invocation.cwd,
      signal: options.signal,
      env: { ...process.env, NO_COLOR: '1' }, // Ensure clean output
    };

    try {
      child =
        invocation.style === 'argv'
          ? spawn(invocation.program, invocation.args, { ...spawnOptions, shell: false })
          : spawn(invocation.command, { ...spawnOptions, shell: true });
    } catch (err) {
      reject(new CommandSpawnError(program, toError(err)));
      return;
    }

    let stdout = '';
    let stderr = '';
    let settled = false;

    // Decoding per stream keeps multibyte characters split across reads intact
    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });

    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      log.error({ err, program }, 'failed to start test command');
      reject(new CommandSpawnError(program, err));
    });

    child.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      log.info({ program, exitCode: code, signal }, 'test command finished');
      resolve({
        exitCode: code,
        signal,
        stdout,
        stderr,
      });
    });
  });
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
