import { describe, it, expect } from 'vitest';
import { runCommand } from './process-runner';

const nodeEval = (script: string): string => `${JSON.stringify(process.execPath)} -e ${JSON.stringify(script)}`;

describe('runCommand', () => {
  it('should capture output of a successful command', async () => {
    const result = await runCommand(nodeEval("process.stdout.write('hi')"));
    expect(result).toMatchObject({ success: true, exitCode: 0, stdout: 'hi', output: 'hi', timedOut: false });
  });

  it('should resolve failures with the exit code', async () => {
    const result = await runCommand(nodeEval("process.stderr.write('bad'); process.exit(3)"));
    expect(result).toMatchObject({ success: false, exitCode: 3, stdout: '', stderr: 'bad', output: 'bad', timedOut: false });
  });

  it('should report timeouts', async () => {
    const result = await runCommand(nodeEval('setTimeout(() => {}, 2000)'), { timeoutMs: 100 });
    expect(result.success).toBe(false);
    expect(result.timedOut).toBe(true);
  }, 10_000);
});
