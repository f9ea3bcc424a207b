export interface TestFileKind {
  name: string;
  suffixes: readonly string[];
}

export type ValidationResult<E> = { ok: true } | { ok: false; error: E };

export type PathValidationError =
  | { reason: 'invalid-characters'; path: string }
  | { reason: 'traversal'; path: string }
  | { reason: 'wrong-kind'; path: string; kind: TestFileKind }
  | { reason: 'malformed'; path: string; kind: TestFileKind };

export interface LineNumberError {
  reason: 'non-positive-line-number';
  value: number;
}

export type ValueShape = 'output-path' | 'require-path' | 'non-negative-integer' | 'free';

export type FlagSpec =
  | { type: 'switch' }
  | { type: 'value'; shape: ValueShape }
  | { type: 'optional-numeric' };

export type ArgumentError =
  | { reason: 'too-many-arguments'; count: number; limit: number }
  | { reason: 'invalid-characters'; token: string }
  | { reason: 'argument-too-long'; token: string; limit: number }
  | { reason: 'dangerous-character'; token: string; character: string }
  | { reason: 'disallowed-flag'; flag: string }
  | { reason: 'missing-value'; flag: string }
  | { reason: 'absolute-path'; flag: string; value: string }
  | { reason: 'path-traversal'; flag: string; value: string }
  | { reason: 'output-directory-not-allowed'; flag: string; value: string; allowed: readonly string[] }
  | { reason: 'wrong-extension'; flag: string; value: string; extension: string }
  | { reason: 'not-numeric'; flag: string; value: string }
  | { reason: 'invalid-path'; error: PathValidationError };

export interface FileTarget {
  readonly filePath: string;
  readonly lineNumbers: readonly number[];
}

export interface CommandTemplate {
  readonly program: string;
  readonly args: readonly string[];
}

export type CommandInvocation =
  | { style: 'argv'; program: string; args: string[]; cwd?: string }
  | { style: 'shell'; command: string; cwd?: string };

export interface ExecutionResult {
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export type CommandRunner = (
  invocation: CommandInvocation,
  options?: ExecuteOptions
) => Promise<ExecutionResult>;

export type TestRunOutcome =
  | { status: 'success'; text: string }
  | { status: 'invalid-params'; message: string }
  | { status: 'internal-error'; message: string };

export interface TestRunnerSettings {
  rspecCommand: string;
  cypressCommand: string;
  cypressWorkingDir: string;
}
