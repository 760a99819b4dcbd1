import type { Response } from "express";

export const ErrorCode = {
  VALIDATION_FAILED: "VALIDATION_FAILED",
  NOT_FOUND: "NOT_FOUND",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorBody = { error: string; code: ErrorCodeType; details?: object };

/** Every non-2xx JSON body goes through here. */
export function sendError(
  res: Response,
  status: number,
  error: string,
  code: ErrorCodeType = ErrorCode.VALIDATION_FAILED,
  details?: object,
): void {
  const body: ErrorBody = { error, code };
  if (details) body.details = details;
  res.status(status).json(body);
}

export function send400(res: Response, message: string, details?: object): void {
  sendError(res, 400, message, ErrorCode.VALIDATION_FAILED, details);
}

export function send404(res: Response, entity: string): void {
  sendError(res, 404, `${entity} not found`, ErrorCode.NOT_FOUND);
}
