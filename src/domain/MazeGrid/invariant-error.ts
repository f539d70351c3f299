/**
 * Raised when the grid no longer satisfies what the algorithms rely on, e.g. a solver runs out of
 * cells before reaching the destination. A maze in this state has to be regenerated.
 */
export class MazeInvariantError extends Error {
  readonly code: string;
  readonly retryable: false;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(code: string, message: string, context: Readonly<Record<string, unknown>> = {}) {
    super(`[maze] ${message}`);
    this.name = 'MazeInvariantError';
    this.code = code;
    this.retryable = false;
    this.context = context;
  }
}
