import type { ZodError } from 'zod';

// ── Invocation ──────────────────────────────────────────────

/** Bad arguments, unreadable inputs, invalid config or profile. */
export class InvocationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvocationError';
  }
}

// ── Connection ──────────────────────────────────────────────

/** The browser runtime could not be started. Always fatal. */
export class ConnectionError extends Error {
  readonly browser: string;

  constructor(browser: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not start ${browser}: ${reason}`, options);
    this.name = 'ConnectionError';
    this.browser = browser;
  }
}

// ── Helpers ─────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** One line per issue: `path.to.field: message`. */
export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('\n');
}
