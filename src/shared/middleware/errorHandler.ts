import { Request, Response, NextFunction } from "express";
import { AppError, ErrorCode } from "../errors/AppError";
import { sendError } from "../http/response";

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  if (res.headersSent) {
    next(error);
    return;
  }
  sendError(res, error);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  sendError(
    res,
    AppError.fromErrorCode(
      ErrorCode.ROUTE_NOT_FOUND,
      `Route ${req.method} ${req.path} not found`,
    ),
  );
};
