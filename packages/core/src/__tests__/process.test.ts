import { describe, it, expect } from 'vitest';

import { execute, ProcessExecutionError } from '../git/process.js';

describe('execute', () => {
  it('rejects with ProcessExecutionError when the binary does not exist', async () => {
    const error = await execute('anchorbot-no-such-binary', ['--version']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessExecutionError);
    if (error instanceof ProcessExecutionError) {
      expect(error.exitCode).toBe(127);
      expect(error.command).toBe('anchorbot-no-such-binary --version');
      expect(error.name).toBe('ProcessExecutionError');
    }
  });
});
