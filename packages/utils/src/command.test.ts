import { describe, it, expect } from 'vitest';
import { executeCommand, lastNonEmptyLine } from './command.js';

describe('executeCommand', () => {
  it('should capture output and exit code', async () => {
    const result = await executeCommand(process.execPath, [
      '-e',
      'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)',
    ]);

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
    expect(result.timedOut).toBe(false);
  });

  it('should kill the command and flag a timeout', async () => {
    const result = await executeCommand(
      process.execPath,
      ['-e', 'setTimeout(() => {}, 60000)'],
      { timeout: 200, killGraceMs: 500 }
    );

    expect(result.timedOut).toBe(true);
    expect(result.duration).toBeLessThan(10000);
  });

  it('should reject when the executable does not exist', async () => {
    await expect(executeCommand('/nonexistent/reelkeeper-binary', [])).rejects.toThrow();
  });
});

describe('lastNonEmptyLine', () => {
  it('should skip trailing blank lines', () => {
    expect(lastNonEmptyLine('first\nsecond\n\n  \n')).toBe('second');
  });

  it('should return an empty string when there is no output', () => {
    expect(lastNonEmptyLine('')).toBe('');
  });
});
