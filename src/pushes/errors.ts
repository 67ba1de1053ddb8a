export type PushDashboardErrorCode =
  | "E_PUSH_FILTER_INVALID"
  | "E_PUSH_WINDOW_INVALID"
  | "E_PUSH_NOT_FOUND"
  | "E_PUSH_BACKEND_UNAVAILABLE"
  | "E_PUSH_ID_INVALID"
  | "E_NEWPUSH_INVALID";

const HTTP_STATUS_BY_CODE: Record<PushDashboardErrorCode, number> = {
  E_PUSH_FILTER_INVALID: 400,
  E_PUSH_WINDOW_INVALID: 400,
  E_PUSH_NOT_FOUND: 404,
  E_PUSH_BACKEND_UNAVAILABLE: 503,
  E_PUSH_ID_INVALID: 400,
  E_NEWPUSH_INVALID: 400
};

export class PushDashboardError extends Error {
  readonly code: PushDashboardErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: PushDashboardErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(`${code}: ${message}`);
    this.name = "PushDashboardError";
    this.code = code;
    this.details = details;
  }

  get httpStatus(): number {
    return HTTP_STATUS_BY_CODE[this.code];
  }
}

export function invalidFilter(message: string, details?: Record<string, unknown>): PushDashboardError {
  return new PushDashboardError("E_PUSH_FILTER_INVALID", message, details);
}

export function invalidWindow(message: string, details?: Record<string, unknown>): PushDashboardError {
  return new PushDashboardError("E_PUSH_WINDOW_INVALID", message, details);
}

export function pushNotFound(pushId: number): PushDashboardError {
  return new PushDashboardError("E_PUSH_NOT_FOUND", `push ${pushId} does not exist`, { pushId });
}

/**
 * Wraps a storage or transport failure. Domain errors pass through untouched so
 * that a `PushNotFound` raised inside a store call keeps its meaning.
 */
export function backendUnavailable(cause: unknown): PushDashboardError {
  if (cause instanceof PushDashboardError) {
    return cause;
  }

  const message = cause instanceof Error ? cause.message : String(cause);
  return new PushDashboardError("E_PUSH_BACKEND_UNAVAILABLE", message.slice(0, 220));
}

export function isPushDashboardError(error: unknown): error is PushDashboardError {
  return error instanceof PushDashboardError;
}
