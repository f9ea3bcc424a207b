import { describe, it, expect } from 'vitest';
import { executeCommand } from '../../src/services/executor.js';
import { CommandSpawnError } from '../../src/services/errors.js';

// Runs short scripts in a child node process; nothing leaves the machine.
const node = process.execPath;

describe('executeCommand', () => {
  it('captures stdout, stderr and the exit code', async () => {
    const result = await executeCommand({
      style: 'argv',
      program: node,
      args: ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exitCode = 3'],
    });

    expect(result).toEqual({ exitCode: 3, signal: null, stdout: 'out', stderr: 'err' });
  });

  it('keeps multibyte characters split across reads', async () => {
    const script = [
      'process.stdout.write(Buffer.from([0xc3]));',
      'setTimeout(() => process.stdout.write(Buffer.from([0xa9])), 200);',
    ].join(' ');
    const result = await executeCommand({ style: 'argv', program: node, args: ['-e', script] });

    expect(result.stdout).toBe('é');
  });

  it('passes arguments without a shell', async () => {
    const result = await executeCommand({
      style: 'argv',
      program: node,
      args: ['-e', 'process.stdout.write(process.argv[1])', 'a; echo injected'],
    });

    expect(result.stdout).toBe('a; echo injected');
    expect(result.exitCode).toBe(0);
  });

  it('runs in the requested working directory', async () => {
    const result = await executeCommand({
      style: 'argv',
      program: node,
      args: ['-e', 'process.stdout.write(process.cwd())'],
      cwd: '/',
    });

    expect(result.stdout).toBe('/');
  });

  it('runs shell commands through sh', async () => {
    const result = await executeCommand({
      style: 'shell',
      command: `"${node}" -e "process.stdout.write('a')" && echo b`,
    });

    expect(result.stdout).toBe('ab\n');
    expect(result.exitCode).toBe(0);
  });

  it('rejects with CommandSpawnError when the program is missing', async () => {
    await expect(
      executeCommand({ style: 'argv', program: 'definitely-not-a-test-runner', args: [] })
    ).rejects.toBeInstanceOf(CommandSpawnError);
  });

  it('rejects when the run is aborted', async () => {
    const controller = new AbortController();
    const pending = executeCommand(
      { style: 'argv', program: node, args: ['-e', 'setTimeout(() => {}, 10000)'] },
      { signal: controller.signal }
    );
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CommandSpawnError);
  });
});
