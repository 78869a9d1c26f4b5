/**
 * Stable error codes surfaced by every gateway operation
 */
export type GatewayErrorCode =
  | "not_found"
  | "already_exists"
  | "invalid_request"
  | "invalid_pattern"
  | "pattern_too_long"
  | "rate_limited"
  | "unavailable"
  | "connection_error"
  | "timeout"
  | "cancelled"
  | "remote_error";

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: GatewayErrorCode,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "GatewayError";
    this.code = code;
    this.details = options?.details;
  }
}

export type ErrorBody = {
  code: GatewayErrorCode;
  message: string;
  details?: Record<string, unknown>;
};

export type Envelope<T> =
  | { success: true; data: T }
  | { success: false; error: ErrorBody };

export function ok<T>(data: T): Envelope<T> {
  return { success: true, data };
}

export function fail<T = never>(
  code: GatewayErrorCode,
  message: string,
  details?: Record<string, unknown>
): Envelope<T> {
  return {
    success: false,
    error: details ? { code, message, details } : { code, message },
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isGatewayError(error: unknown, code?: GatewayErrorCode): error is GatewayError {
  return error instanceof GatewayError && (code === undefined || error.code === code);
}

/**
 * Convert any thrown value into a failed envelope.
 * Unknown errors become "unavailable"; internal connection errors are
 * reported as "unavailable" as well.
 */
export function toEnvelope<T = never>(error: unknown): Envelope<T> {
  if (error instanceof GatewayError) {
    const code = error.code === "connection_error" ? "unavailable" : error.code;
    return fail(code, error.message, error.details);
  }
  return fail("unavailable", errorMessage(error));
}

/**
 * Run an operation and wrap its outcome in an envelope
 */
export async function envelope<T>(operation: () => Promise<T>): Promise<Envelope<T>> {
  try {
    return ok(await operation());
  } catch (error) {
    return toEnvelope(error);
  }
}
