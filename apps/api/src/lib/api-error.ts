import type { Response } from "express";

/**
 * Standardized API error codes.
 * Every error response from the API should include one of these codes.
 */
export const ErrorCode = {
  VALIDATION_FAILED: "VALIDATION_FAILED",
  NOT_FOUND: "NOT_FOUND",
  BAD_REQUEST: "BAD_REQUEST",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorBody = { error: string; code: ErrorCodeType; details?: object };

/**
 * Standard error response shape:
 *   { error: string, code: string, details?: object }
 */
export function errorBody(error: string, code: ErrorCodeType = ErrorCode.BAD_REQUEST, details?: object): ErrorBody {
  const body: ErrorBody = { error, code };
  if (details) body.details = details;
  return body;
}

export function sendError(
  res: Response,
  status: number,
  error: string,
  code: ErrorCodeType = ErrorCode.BAD_REQUEST,
  details?: object,
): void {
  res.status(status).json(errorBody(error, code, details));
}
