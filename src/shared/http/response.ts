import { Response } from "express";
import { ZodError } from "zod";
import { AppError, ErrorCode } from "../errors/AppError";
import { logger } from "../logger";

/**
 * Envelope shared by every JSON response the service sends.
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    message: string;
    code: string;
    details?: unknown;
  };
}

export interface ValidationIssue {
  field: string;
  message: string;
}

export function sendSuccess<T>(res: Response, statusCode: number, data: T): void {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };
  res.status(statusCode).json(response);
}

/**
 * Translate any thrown value into the error envelope. Only AppError and
 * validation failures expose their message; everything else is a generic 500.
 */
export function sendError(res: Response, error: unknown): void {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.logError(error, { code: error.code });
    }
    writeError(res, error.statusCode, error.message, error.code, error.details);
    return;
  }

  if (error instanceof ZodError) {
    const details: ValidationIssue[] = error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    }));
    writeError(res, 400, "Validation failed", ErrorCode.VALIDATION_ERROR, details);
    return;
  }

  if (isMalformedBody(error)) {
    writeError(res, 400, "Malformed JSON body", ErrorCode.VALIDATION_ERROR);
    return;
  }

  if (error instanceof Error) {
    logger.logError(error, { code: ErrorCode.INTERNAL_SERVER_ERROR });
  } else {
    logger.error("Non-error value thrown", { value: String(error) });
  }
  writeError(
    res,
    500,
    "An unexpected error occurred",
    ErrorCode.INTERNAL_SERVER_ERROR,
  );
}

function writeError(
  res: Response,
  statusCode: number,
  message: string,
  code: string,
  details?: unknown,
): void {
  const response: ApiResponse = {
    success: false,
    error: {
      message,
      code,
      ...(details !== undefined && { details }),
    },
  };
  res.status(statusCode).json(response);
}

// express.json() rejects unparsable bodies with a SyntaxError tagged by
// body-parser.
function isMalformedBody(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}
