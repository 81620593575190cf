import { Response } from "express";
import { SettlementError } from "../engine/errors";

export interface FieldError {
  field: string;
  message: string;
}

/**
 * Standard error response helper
 */
export function sendError(
  res: Response,
  statusCode: number,
  message: string,
  details?: FieldError[] | { field: string }
): void {
  res.status(statusCode).send({
    error: message,
    ...(details ? { details } : {}),
  });
}

/**
 * Standard success response helper
 */
export function sendSuccess<T>(
  res: Response,
  data: T,
  statusCode: number = 200
): void {
  res.status(statusCode).send(data);
}

/**
 * Validation error helper
 */
export function sendValidationError(
  res: Response,
  message: string,
  field?: string
): void {
  sendError(res, 400, message, field ? { field } : undefined);
}

/**
 * Answer with the status of a settlement rejection. Anything else is logged
 * in full and reported as a generic 500.
 */
export function sendFailure(
  res: Response,
  error: unknown,
  context: string
): void {
  if (error instanceof SettlementError) {
    console.warn(`[${context}] ${error.name}: ${error.message}`);
    sendError(res, error.statusCode, error.message);
    return;
  }

  console.error(`[${context}] Error:`, {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  sendError(res, 500, "An error occurred. Please try again later.");
}
