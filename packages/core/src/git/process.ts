/**
 * Child-process execution for CLI wrappers (`gh`, `git`).
 *
 * Collects stdout/stderr as text, optionally feeds `input` on stdin, and
 * either rejects on a non-zero exit (default) or resolves with the exit code
 * when `reject: false`.
 */

import { spawn } from 'child_process';

export interface ExecuteOptions {
  cwd?: string;
  /** Milliseconds before the process is killed */
  timeout?: number;
  /** Reject on non-zero exit codes (default: true) */
  reject?: boolean;
  /** Written to stdin, which is then closed */
  input?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ExecuteResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export class ProcessExecutionError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = 'ProcessExecutionError';
  }
}

export function execute(
  command: string,
  args: string[],
  options: ExecuteOptions = {},
): Promise<ExecuteResult> {
  const { cwd, timeout, reject = true, input, env } = options;
  const commandLine = [command, ...args].join(' ');

  return new Promise<ExecuteResult>((resolve, rejectPromise) => {
    const child = spawn(command, args, {
      cwd,
      env: env ?? process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timer = timeout
      ? setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
        }, timeout)
      : null;

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => { stdout += chunk; });
    child.stderr.on('data', (chunk: string) => { stderr += chunk; });

    child.on('error', (err) => {
      if (timer) clearTimeout(timer);
      rejectPromise(new ProcessExecutionError(
        `Failed to start "${commandLine}": ${err.message}`,
        commandLine,
        127,
        stderr,
      ));
    });

    child.on('close', (code) => {
      if (timer) clearTimeout(timer);

      if (timedOut) {
        rejectPromise(new ProcessExecutionError(
          `"${commandLine}" timed out after ${timeout}ms`,
          commandLine,
          code ?? -1,
          stderr,
        ));
        return;
      }

      const exitCode = code ?? -1;
      if (exitCode !== 0 && reject) {
        rejectPromise(new ProcessExecutionError(
          `"${commandLine}" exited with code ${exitCode}`,
          commandLine,
          exitCode,
          stderr,
        ));
        return;
      }

      resolve({ stdout, stderr, exitCode });
    });

    // EPIPE when the process exits before reading its input; surfaced via stderr
    child.stdin.on('error', (err) => {
      stderr += `[stdin] ${err.message}\n`;
    });

    if (input !== undefined) {
      child.stdin.end(input);
    } else {
      child.stdin.end();
    }
  });
}
