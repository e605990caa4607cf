/**
 * Error taxonomy for the pricing services.
 *
 * The evaluation engine itself never throws for well-formed input: data
 * quality findings travel as `problems` and parse issues. These errors cover
 * caller mistakes at the service boundary.
 */

export type JsonObject = Record<string, unknown>;

export type PricingErrorCode =
  | 'VALIDATION_FAILED'
  | 'JUSTIFICATION_REQUIRED'
  | 'NOTHING_TO_ANALYZE'
  | 'UNKNOWN';

export const ERROR_CONFIG: Record<PricingErrorCode, { retryable: boolean; userFacing: boolean }> = {
  VALIDATION_FAILED: { retryable: false, userFacing: true },
  JUSTIFICATION_REQUIRED: { retryable: true, userFacing: true },
  NOTHING_TO_ANALYZE: { retryable: false, userFacing: true },
  UNKNOWN: { retryable: false, userFacing: false },
};

export class PricingError extends Error {
  readonly code: PricingErrorCode;
  readonly meta?: JsonObject;

  constructor(code: PricingErrorCode, message: string, meta?: JsonObject) {
    super(message);
    this.name = 'PricingError';
    this.code = code;
    this.meta = meta;
  }

  get retryable(): boolean {
    return ERROR_CONFIG[this.code].retryable;
  }
}

export function isPricingError(err: unknown): err is PricingError {
  return err instanceof PricingError;
}

export interface ErrorPayload {
  code: PricingErrorCode;
  message: string;
  retryable: boolean;
  meta?: JsonObject;
}

/**
 * Normalize any thrown value into a serializable payload.
 * Messages of unexpected errors are not exposed.
 */
export function toErrorPayload(err: unknown): ErrorPayload {
  if (isPricingError(err)) {
    const config = ERROR_CONFIG[err.code];
    return {
      code: err.code,
      message: config.userFacing ? err.message : 'Unexpected error',
      retryable: config.retryable,
      ...(err.meta && Object.keys(err.meta).length > 0 ? { meta: err.meta } : {}),
    };
  }
  return {
    code: 'UNKNOWN',
    message: 'Unexpected error',
    retryable: ERROR_CONFIG.UNKNOWN.retryable,
  };
}
