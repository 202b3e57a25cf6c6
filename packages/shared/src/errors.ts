// ─── Domain Errors ──────────────────────────────────────

export type DomainError =
  | { type: 'NOT_FOUND'; message: string }
  | { type: 'BAD_REQUEST'; message: string }
  | { type: 'VALIDATION'; message: string }
  | { type: 'PROCESS_ERROR'; message: string; exitCode?: number; stderr?: string }
  | { type: 'INTERNAL'; message: string };

export type DomainErrorType = DomainError['type'];

// ─── Factory helpers ────────────────────────────────────

export const notFound = (message: string): DomainError => ({ type: 'NOT_FOUND', message });
export const badRequest = (message: string): DomainError => ({ type: 'BAD_REQUEST', message });
export const validationErr = (message: string): DomainError => ({ type: 'VALIDATION', message });
export const processError = (message: string, exitCode?: number, stderr?: string): DomainError => ({
  type: 'PROCESS_ERROR',
  message,
  exitCode,
  stderr,
});
export const internal = (message: string): DomainError => ({ type: 'INTERNAL', message });

/** Render a DomainError for logs and rethrown exceptions. */
export function describeError(error: DomainError): string {
  if (error.type === 'PROCESS_ERROR' && error.stderr) {
    return `${error.message} (exit ${error.exitCode ?? '?'}): ${error.stderr.trim()}`;
  }
  return error.message;
}
