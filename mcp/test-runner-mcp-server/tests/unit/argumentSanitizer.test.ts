import { describe, it, expect } from 'vitest';
import {
  describeArgumentError,
  sanitizeToken,
  validateArguments,
} from '../../src/services/argumentSanitizer.js';
import { RSPEC_FILE_KIND, RSPEC_FLAGS } from '../../src/constants.js';

function errorMessage(tokens: string[]): string {
  const result = validateArguments(tokens);
  if (result.ok) throw new Error(`expected ${JSON.stringify(tokens)} to be rejected`);
  return describeArgumentError(result.error);
}

describe('validateArguments', () => {
  it('accepts an empty list', () => {
    expect(validateArguments([])).toEqual({ ok: true });
  });

  it('has 28 allowlisted flags', () => {
    expect(RSPEC_FLAGS.size).toBe(28);
  });

  it('accepts a typical run', () => {
    expect(
      validateArguments([
        '--fail-fast',
        '--format',
        'documentation',
        '--seed',
        '1234',
        '--out',
        'tmp/rspec.txt',
        '--require',
        'spec/support/helpers.rb',
        '--profile',
        '10',
        'spec/models/user_spec.rb',
      ])
    ).toEqual({ ok: true });
  });

  it('rejects more than 50 arguments', () => {
    const tokens = Array.from({ length: 51 }, () => '--dry-run');
    expect(validateArguments(tokens)).toEqual({
      ok: false,
      error: { reason: 'too-many-arguments', count: 51, limit: 50 },
    });
    expect(validateArguments(tokens.slice(1))).toEqual({ ok: true });
  });

  it('names the dangerous character in a flag value', () => {
    expect(validateArguments(['--format', 'json; rm -rf /'])).toEqual({
      ok: false,
      error: { reason: 'dangerous-character', token: 'json; rm -rf /', character: ';' },
    });
    expect(errorMessage(['--format', 'json; rm -rf /'])).toBe(
      "Argument contains dangerous character ';': json; rm -rf /"
    );
  });

  it('rejects every shell metacharacter', () => {
    for (const character of [';', '&', '|', '$', '`', '(', ')', '<', '>', '"', "'"]) {
      const result = validateArguments(['--tag', `fast${character}`]);
      expect(result).toEqual({
        ok: false,
        error: { reason: 'dangerous-character', token: `fast${character}`, character },
      });
    }
  });

  it('rejects NUL and newline in flag values before anything is spawned', () => {
    expect(validateArguments(['--example', 'a\0b'])).toEqual({
      ok: false,
      error: { reason: 'invalid-characters', token: 'a\0b' },
    });
    expect(validateArguments(['--tag', 'fast\nslow'])).toEqual({
      ok: false,
      error: { reason: 'invalid-characters', token: 'fast\nslow' },
    });
    expect(errorMessage(['--example', 'a\0b'])).toBe(
      'Argument contains invalid characters (NUL or newline): "a\\u0000b"'
    );
  });

  it('rejects NUL in a flag itself', () => {
    const result = validateArguments(['--dry-run\0']);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('invalid-characters');
  });

  it('rejects overlong tokens', () => {
    const long = 'a'.repeat(1001);
    const result = validateArguments(['--example', long]);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('argument-too-long');
    expect(validateArguments(['--example', 'a'.repeat(1000)])).toEqual({ ok: true });
  });

  it('rejects flags outside the allowlist', () => {
    expect(validateArguments(['--exec', 'ls'])).toEqual({
      ok: false,
      error: { reason: 'disallowed-flag', flag: '--exec' },
    });
    expect(errorMessage(['-X'])).toBe('Flag not allowed: -X');
  });

  it('requires a value for value flags', () => {
    expect(validateArguments(['spec/a_spec.rb', '--seed'])).toEqual({
      ok: false,
      error: { reason: 'missing-value', flag: '--seed' },
    });
  });

  it('restricts output paths', () => {
    expect(validateArguments(['--out', '/tmp/x.txt'])).toEqual({
      ok: false,
      error: { reason: 'absolute-path', flag: '--out', value: '/tmp/x.txt' },
    });
    expect(validateArguments(['-o', 'tmp/../x.txt'])).toEqual({
      ok: false,
      error: { reason: 'path-traversal', flag: '-o', value: 'tmp/../x.txt' },
    });
    expect(errorMessage(['--deprecation-out', 'spec/out.txt'])).toBe(
      'Output for --deprecation-out must be inside tmp/, log/, coverage/: spec/out.txt'
    );
    expect(validateArguments(['--out', 'coverage/rspec.json'])).toEqual({ ok: true });
  });

  it('restricts require paths', () => {
    expect(validateArguments(['-r', '/etc/evil.rb'])).toEqual({
      ok: false,
      error: { reason: 'absolute-path', flag: '-r', value: '/etc/evil.rb' },
    });
    expect(validateArguments(['--require', '../evil.rb'])).toEqual({
      ok: false,
      error: { reason: 'path-traversal', flag: '--require', value: '../evil.rb' },
    });
    expect(errorMessage(['--require', 'spec/support/helpers.py'])).toBe(
      'Value for --require must end with .rb: spec/support/helpers.py'
    );
  });

  it('requires a numeric seed', () => {
    expect(validateArguments(['--seed', 'abc'])).toEqual({
      ok: false,
      error: { reason: 'not-numeric', flag: '--seed', value: 'abc' },
    });
    expect(validateArguments(['--seed', '-1']).ok).toBe(false);
    expect(validateArguments(['--seed', '0'])).toEqual({ ok: true });
  });

  it('lets --profile stand alone or take a number', () => {
    expect(validateArguments(['--profile'])).toEqual({ ok: true });
    expect(validateArguments(['-p', '--fail-fast'])).toEqual({ ok: true });
    expect(validateArguments(['--profile', '5', 'spec/a_spec.rb'])).toEqual({ ok: true });
    expect(validateArguments(['--profile', 'spec/a_spec.rb'])).toEqual({
      ok: false,
      error: { reason: 'not-numeric', flag: '--profile', value: 'spec/a_spec.rb' },
    });
  });

  it('fails the whole list when one file is not a spec', () => {
    expect(validateArguments(['spec/x_spec.rb', 'spec/y.rb'])).toEqual({
      ok: false,
      error: {
        reason: 'invalid-path',
        error: { reason: 'wrong-kind', path: 'spec/y.rb', kind: RSPEC_FILE_KIND },
      },
    });
    expect(errorMessage(['spec/x_spec.rb', 'spec/y.rb'])).toBe(
      'RSpec test files must end with _spec.rb: spec/y.rb'
    );
  });

  it('rejects traversal in bare file paths', () => {
    expect(errorMessage(['../secrets/a_spec.rb'])).toBe(
      'Path traversal is not allowed: ../secrets/a_spec.rb'
    );
  });
});

describe('sanitizeToken', () => {
  it('passes ordinary tokens', () => {
    expect(sanitizeToken('spec/models/user_spec.rb')).toEqual({ ok: true });
    expect(sanitizeToken('~slow')).toEqual({ ok: true });
  });

  it('reports the first dangerous character in check order', () => {
    expect(sanitizeToken('a|b;c')).toEqual({
      ok: false,
      error: { reason: 'dangerous-character', token: 'a|b;c', character: ';' },
    });
  });
});
