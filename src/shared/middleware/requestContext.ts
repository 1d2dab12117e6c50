import * as crypto from "crypto";
import { Request, Response, NextFunction } from "express";
import { logger } from "../logger";

export const CORRELATION_HEADER = "x-correlation-id";

function headerValue(req: Request, name: string): string | undefined {
  const value = req.get(name);
  return value && value.length > 0 ? value : undefined;
}

/**
 * Tag every request with a correlation id, echoed back in the response
 * header and attached to the request log line.
 */
export const correlationId = (
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  const id =
    headerValue(req, CORRELATION_HEADER) ??
    headerValue(req, "x-request-id") ??
    crypto.randomUUID();

  res.locals.correlationId = id;
  res.setHeader(CORRELATION_HEADER, id);
  next();
};

export function getCorrelationId(res: Response): string | undefined {
  const id: unknown = res.locals.correlationId;
  return typeof id === "string" ? id : undefined;
}

export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  const startTime = Date.now();

  res.on("finish", () => {
    logger.logRequest(
      {
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        ip: req.ip,
        userAgent: req.get("User-Agent"),
        correlationId: getCorrelationId(res),
      },
      Date.now() - startTime,
    );
  });

  next();
};
