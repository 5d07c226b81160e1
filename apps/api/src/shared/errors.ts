// apps/api/src/shared/errors.ts

export type PickemErrorCode =
  | "not_found"
  | "validation"
  | "locked"
  | "forbidden"
  | "conflict";

export interface PickemErrorShape {
  error: PickemErrorCode | "internal";
  message: string;
  details?: Record<string, unknown>;
}

export class PickemError extends Error {
  public code: PickemErrorCode;
  public details?: Record<string, unknown>;

  constructor(
    code: PickemErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "PickemError";
    this.code = code;
    this.details = details;
  }
}

export function createPickemError(
  code: PickemErrorCode,
  message: string,
  details?: Record<string, unknown>
): PickemError {
  return new PickemError(code, message, details);
}

/**
 * Flatten anything thrown into a shape that can be logged or collected in
 * an operation summary.
 */
export function toErrorSummary(err: unknown): PickemErrorShape {
  if (err instanceof PickemError) {
    return {
      error: err.code,
      message: err.message,
      ...(err.details ? { details: err.details } : {})
    };
  }

  if (err instanceof Error) {
    return {
      error: "internal",
      message: err.message || "Internal error"
    };
  }

  return {
    error: "internal",
    message: String(err)
  };
}
