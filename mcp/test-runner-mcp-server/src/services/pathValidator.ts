import type {
  LineNumberError,
  PathValidationError,
  TestFileKind,
  ValidationResult,
} from '../types.js';
import { CURRENT_DIRECTORY } from '../constants.js';

/**
 * Checks a caller-supplied test file path against the naming rules of a test
 * kind. Pure string checks, evaluated in a fixed order so that the first
 * violation is the one reported. Nothing is looked up on disk.
 */
export function validateTestPath(
  path: string,
  kind: TestFileKind
): ValidationResult<PathValidationError> {
  if (path.includes('\0') || path.includes('\n')) {
    return { ok: false, error: { reason: 'invalid-characters', path } };
  }

  // Traversal is checked on the raw path, before "./" is stripped
  if (path.includes('../')) {
    return { ok: false, error: { reason: 'traversal', path } };
  }

  const stripped = stripCurrentDirPrefix(path);

  if (!kind.suffixes.some((suffix) => stripped.endsWith(suffix))) {
    return { ok: false, error: { reason: 'wrong-kind', path, kind } };
  }

  if (kind.suffixes.includes(stripped)) {
    return { ok: false, error: { reason: 'malformed', path, kind } };
  }

  return { ok: true };
}

export function validateLineNumbers(
  lineNumbers: readonly number[]
): ValidationResult<LineNumberError> {
  for (const value of lineNumbers) {
    if (!Number.isInteger(value) || value <= 0) {
      return { ok: false, error: { reason: 'non-positive-line-number', value } };
    }
  }
  return { ok: true };
}

/**
 * Rewrites a path given relative to the project root so that it is relative
 * to `workingDir`, the directory the test command runs in.
 *
 * normalizeToWorkingDirectory('cypress/cypress/e2e/t.cy.js', 'cypress')
 *   -> 'cypress/e2e/t.cy.js'
 */
export function normalizeToWorkingDirectory(path: string, workingDir: string): string {
  if (workingDir === CURRENT_DIRECTORY) {
    return path;
  }

  const prefix = `${workingDir.replace(/\/+$/, '')}/`;
  const stripped = stripCurrentDirPrefix(path);

  return stripped.startsWith(prefix) ? stripped.slice(prefix.length) : path;
}

export function describePathError(error: PathValidationError): string {
  switch (error.reason) {
    case 'invalid-characters':
      return `Path contains invalid characters (NUL or newline): ${JSON.stringify(error.path)}`;
    case 'traversal':
      return `Path traversal is not allowed: ${error.path}`;
    case 'wrong-kind':
      return `${error.kind.name} test files must end with ${error.kind.suffixes.join(', ')}: ${error.path}`;
    case 'malformed':
      return `${error.kind.name} test file name is empty: ${error.path}`;
  }
}

export function describeLineNumberError(error: LineNumberError): string {
  return `Line numbers must be positive integers, got ${error.value}`;
}

function stripCurrentDirPrefix(path: string): string {
  return path.startsWith('./') ? path.slice(2) : path;
}
