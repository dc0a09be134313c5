/**
 * Error codes
 */
export const ErrorCodes = {
  INVALID_INPUT_TYPE: 'INVALID_INPUT_TYPE',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Base error class for spantag errors
 */
export class SpantagError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SpantagError';
  }
}

/**
 * A text was neither a string nor a list of characters. `index` is the
 * position in the batch (0 for single-text calls, -1 when the batch itself
 * is not a list).
 */
export class InvalidInputTypeError extends SpantagError {
  constructor(
    public readonly index: number,
    public readonly received: string
  ) {
    super(
      index < 0
        ? `Expected a list of texts, received ${received}`
        : `Text at index ${index} must be a string or a list of characters, received ${received}`,
      ErrorCodes.INVALID_INPUT_TYPE,
      { index, received }
    );
    this.name = 'InvalidInputTypeError';
  }
}

export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
