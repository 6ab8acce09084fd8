/**
 * Error taxonomy for a healing cycle.
 *
 *   TransientIOError   metrics / predictor / webhook / store I/O failed
 *   ActuatorError      the platform rejected or failed a remediation action
 *   StateConflictError the healing state changed since it was read
 *   PermissionError    the platform refused us (401/403)
 */

export class HealingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientIOError extends HealingError {
  /** Whether a second attempt may succeed (network error, timeout, 5xx, 429) */
  readonly retryable: boolean;
  readonly status?: number;

  constructor(message: string, opts: { retryable?: boolean; status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.retryable = opts.retryable ?? true;
    this.status = opts.status;
  }
}

export class ActuatorError extends HealingError {}

export class StateConflictError extends HealingError {}

export class PermissionError extends HealingError {}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
