import type { CommandInvocation, CommandTemplate, FileTarget } from '../types.js';
import { ConfigError } from './errors.js';

const PIPELINE_OPERATORS = /&&|\|\||[|;]/;

export function parseCommandTemplate(command: string): CommandTemplate {
  const [program, ...args] = command.trim().split(/\s+/).filter(Boolean);
  if (!program) {
    throw new ConfigError('Command template is empty');
  }
  return { program, args };
}

/**
 * A configured command that chains several stages (e.g. `cd app && npx ...`)
 * cannot be expressed as program + args and has to go through a shell.
 */
export function isShellPipeline(command: string): boolean {
  return PIPELINE_OPERATORS.test(command);
}

export function formatFileTarget(target: FileTarget): string {
  return [target.filePath, ...target.lineNumbers.map(String)].join(':');
}

export function buildFileInvocation(
  template: CommandTemplate,
  target: FileTarget,
  cwd?: string
): CommandInvocation {
  return withCwd(
    { style: 'argv', program: template.program, args: [...template.args, formatFileTarget(target)] },
    cwd
  );
}

export function buildArgumentInvocation(
  template: CommandTemplate,
  tokens: readonly string[]
): CommandInvocation {
  return { style: 'argv', program: template.program, args: [...template.args, ...tokens] };
}

export function buildShellInvocation(command: string, filePath: string): CommandInvocation {
  return { style: 'shell', command: `${command.trim()} ${quoteForShell(filePath)}` };
}

export function formatCommandLine(invocation: CommandInvocation): string {
  if (invocation.style === 'shell') {
    return invocation.command;
  }
  return [invocation.program, ...invocation.args].join(' ');
}

export function quoteForShell(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function withCwd(invocation: CommandInvocation, cwd?: string): CommandInvocation {
  return cwd ? { ...invocation, cwd } : invocation;
}
