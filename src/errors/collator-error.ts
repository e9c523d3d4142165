/**
 * Collator error codes and factory.
 *
 * Every failure the engine raises is deterministic for a given input, so
 * errors carry a stable code rather than a retry hint.
 *
 * @module errors/collator-error
 */

export const ERROR_CODES = {
  INVALID_INPUT: 'COLLATOR_INVALID_INPUT',
  CONFIGURATION: 'COLLATOR_CONFIGURATION_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class CollatorError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CollatorError';
    this.code = code;
    this.details = details;
  }
}

export function createCollatorError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): CollatorError {
  return new CollatorError(code, `[${code}] ${message}`, details);
}

/**
 * Narrow an unknown thrown value, optionally to a specific code.
 */
export function isCollatorError(error: unknown, code?: ErrorCode): error is CollatorError {
  if (!(error instanceof CollatorError)) return false;
  return code === undefined || error.code === code;
}
