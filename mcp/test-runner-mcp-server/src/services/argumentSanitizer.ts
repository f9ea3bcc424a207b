import * as path from 'path';
import type { ArgumentError, ValidationResult, ValueShape } from '../types.js';
import {
  ALLOWED_OUTPUT_DIRECTORIES,
  DANGEROUS_CHARACTERS,
  MAX_ARGUMENTS,
  MAX_ARGUMENT_LENGTH,
  REQUIRE_EXTENSION,
  RSPEC_FILE_KIND,
  RSPEC_FLAGS,
} from '../constants.js';
import { describePathError, validateTestPath } from './pathValidator.js';

type Result = ValidationResult<ArgumentError>;

const OK: Result = { ok: true };
const NUMERIC = /^\d+$/;

/**
 * Validates a raw RSpec argument list before it is appended to the command.
 * Flags are default-deny: anything not in RSPEC_FLAGS is rejected, and every
 * token, flag or value, goes through the same character and length check.
 * The whole list fails if any single token does.
 */
export function validateArguments(tokens: readonly string[]): Result {
  if (tokens.length > MAX_ARGUMENTS) {
    return fail({ reason: 'too-many-arguments', count: tokens.length, limit: MAX_ARGUMENTS });
  }

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    const sanitized = sanitizeToken(token);
    if (!sanitized.ok) return sanitized;

    if (!token.startsWith('-')) {
      const checked = validateTestPath(token, RSPEC_FILE_KIND);
      if (!checked.ok) return fail({ reason: 'invalid-path', error: checked.error });
      i += 1;
      continue;
    }

    const spec = RSPEC_FLAGS.get(token);
    if (!spec) {
      return fail({ reason: 'disallowed-flag', flag: token });
    }

    switch (spec.type) {
      case 'switch':
        i += 1;
        break;

      case 'value': {
        const value = tokens[i + 1];
        if (value === undefined) {
          return fail({ reason: 'missing-value', flag: token });
        }
        const valueSanitized = sanitizeToken(value);
        if (!valueSanitized.ok) return valueSanitized;
        const shaped = validateValue(token, value, spec.shape);
        if (!shaped.ok) return shaped;
        i += 2;
        break;
      }

      case 'optional-numeric': {
        const value = tokens[i + 1];
        if (value === undefined || value.startsWith('-')) {
          i += 1;
          break;
        }
        const valueSanitized = sanitizeToken(value);
        if (!valueSanitized.ok) return valueSanitized;
        if (!NUMERIC.test(value)) {
          return fail({ reason: 'not-numeric', flag: token, value });
        }
        i += 2;
        break;
      }
    }
  }

  return OK;
}

export function sanitizeToken(token: string): Result {
  if (token.includes('\0') || token.includes('\n')) {
    return fail({ reason: 'invalid-characters', token });
  }
  if (token.length > MAX_ARGUMENT_LENGTH) {
    return fail({ reason: 'argument-too-long', token, limit: MAX_ARGUMENT_LENGTH });
  }
  const character = DANGEROUS_CHARACTERS.find((c) => token.includes(c));
  if (character !== undefined) {
    return fail({ reason: 'dangerous-character', token, character });
  }
  return OK;
}

function validateValue(flag: string, value: string, shape: ValueShape): Result {
  switch (shape) {
    case 'output-path':
      if (value.includes('..')) return fail({ reason: 'path-traversal', flag, value });
      if (path.isAbsolute(value)) return fail({ reason: 'absolute-path', flag, value });
      if (!ALLOWED_OUTPUT_DIRECTORIES.some((dir) => value.startsWith(dir))) {
        return fail({
          reason: 'output-directory-not-allowed',
          flag,
          value,
          allowed: ALLOWED_OUTPUT_DIRECTORIES,
        });
      }
      return OK;

    case 'require-path':
      if (path.isAbsolute(value)) return fail({ reason: 'absolute-path', flag, value });
      if (value.includes('..')) return fail({ reason: 'path-traversal', flag, value });
      if (!value.endsWith(REQUIRE_EXTENSION)) {
        return fail({ reason: 'wrong-extension', flag, value, extension: REQUIRE_EXTENSION });
      }
      return OK;

    case 'non-negative-integer':
      return NUMERIC.test(value) ? OK : fail({ reason: 'not-numeric', flag, value });

    case 'free':
      return OK;
  }
}

export function describeArgumentError(error: ArgumentError): string {
  switch (error.reason) {
    case 'too-many-arguments':
      return `Too many arguments: ${error.count} (maximum ${error.limit})`;
    case 'invalid-characters':
      return `Argument contains invalid characters (NUL or newline): ${JSON.stringify(error.token)}`;
    case 'argument-too-long':
      return `Argument exceeds ${error.limit} characters: ${error.token.slice(0, 40)}...`;
    case 'dangerous-character':
      return `Argument contains dangerous character '${error.character}': ${error.token}`;
    case 'disallowed-flag':
      return `Flag not allowed: ${error.flag}`;
    case 'missing-value':
      return `Flag ${error.flag} requires a value`;
    case 'absolute-path':
      return `Absolute paths are not allowed for ${error.flag}: ${error.value}`;
    case 'path-traversal':
      return `Path traversal is not allowed for ${error.flag}: ${error.value}`;
    case 'output-directory-not-allowed':
      return `Output for ${error.flag} must be inside ${error.allowed.join(', ')}: ${error.value}`;
    case 'wrong-extension':
      return `Value for ${error.flag} must end with ${error.extension}: ${error.value}`;
    case 'not-numeric':
      return `Value for ${error.flag} must be a non-negative integer: ${error.value}`;
    case 'invalid-path':
      return describePathError(error.error);
  }
}

function fail(error: ArgumentError): Result {
  return { ok: false, error };
}
