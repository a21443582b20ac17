/** Error codes carried by every error the engine throws. */
export const ErrorCodes = {
  MISSING_FIELD: 'MISSING_FIELD',
  INVALID_TIMESTAMP: 'INVALID_TIMESTAMP',
  CATEGORY_OUT_OF_DOMAIN: 'CATEGORY_OUT_OF_DOMAIN',
  DEGENERATE_PAIR: 'DEGENERATE_PAIR',
  DUPLICATE_PERIOD: 'DUPLICATE_PERIOD',
  OUT_OF_ORDER: 'OUT_OF_ORDER',
  STREAM_CLOSED: 'STREAM_CLOSED',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class for engine errors.
 * The code is stable and meant for programmatic handling; the message is for people.
 */
export class SeqLensError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'SeqLensError';
  }
}

export interface ValidationErrorDetails {
  /** Position of the offending record in the input batch */
  recordIndex?: number;
  /** Field that failed validation */
  field?: string;
}

/**
 * A malformed input record: missing required field, category outside the
 * declared domain, or a degenerate self-pair.
 */
export class ValidationError extends SeqLensError {
  /** Message without the record and field suffix */
  readonly reason: string;
  readonly recordIndex?: number;
  readonly field?: string;

  constructor(code: ErrorCode, message: string, details: ValidationErrorDetails = {}) {
    super(code, formatLocation(message, details));
    this.name = 'ValidationError';
    this.reason = message;
    this.recordIndex = details.recordIndex;
    this.field = details.field;
  }
}

/** Options or a descriptor that do not match their JSON schema. */
export class ConfigurationError extends SeqLensError {
  readonly schema: string;
  readonly problems: readonly string[];

  constructor(schema: string, problems: readonly string[]) {
    super(ErrorCodes.INVALID_CONFIG, `Invalid ${schema}: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.schema = schema;
    this.problems = problems;
  }
}

function formatLocation(message: string, details: ValidationErrorDetails): string {
  const parts: string[] = [];
  if (details.recordIndex !== undefined) parts.push(`record ${details.recordIndex}`);
  if (details.field !== undefined) parts.push(`field '${details.field}'`);
  return parts.length > 0 ? `${message} (${parts.join(', ')})` : message;
}

export function isSeqLensError(error: unknown): error is SeqLensError {
  return error instanceof SeqLensError;
}
