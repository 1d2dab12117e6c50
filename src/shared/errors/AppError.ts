export enum ErrorCode {
  // Validation errors
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INVALID_EMAIL = "INVALID_EMAIL",
  INVALID_PASSWORD = "INVALID_PASSWORD",
  INVALID_ORGANIZATION_NAME = "INVALID_ORGANIZATION_NAME",
  INVALID_PARTITION_ID = "INVALID_PARTITION_ID",

  // Registry errors
  DUPLICATE_NAME = "DUPLICATE_NAME",
  DUPLICATE_EMAIL = "DUPLICATE_EMAIL",
  ORGANIZATION_NOT_FOUND = "ORGANIZATION_NOT_FOUND",

  // Authentication errors
  INVALID_CREDENTIALS = "INVALID_CREDENTIALS",
  UNAUTHORIZED = "UNAUTHORIZED",
  TOKEN_INVALID = "TOKEN_INVALID",
  TOKEN_EXPIRED = "TOKEN_EXPIRED",

  // Partition errors
  PARTITION_EXISTS = "PARTITION_EXISTS",
  PARTITION_SOURCE_MISSING = "PARTITION_SOURCE_MISSING",
  PARTITION_TARGET_EXISTS = "PARTITION_TARGET_EXISTS",
  PARTITION_OPERATION_FAILED = "PARTITION_OPERATION_FAILED",

  // System errors
  ROUTE_NOT_FOUND = "ROUTE_NOT_FOUND",
  DATABASE_ERROR = "DATABASE_ERROR",
  INTERNAL_SERVER_ERROR = "INTERNAL_SERVER_ERROR",
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: unknown,
  ) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  static fromErrorCode(
    code: ErrorCode,
    message?: string,
    details?: unknown,
  ): AppError {
    const errorConfig = ERROR_STATUS_MAP[code];
    return new AppError(
      code,
      message || errorConfig.defaultMessage,
      errorConfig.statusCode,
      true,
      details,
    );
  }

  static is(error: unknown, ...codes: ErrorCode[]): error is AppError {
    return error instanceof AppError && codes.includes(error.code);
  }
}

// Status code mapping for error codes
const ERROR_STATUS_MAP: Record<
  ErrorCode,
  { statusCode: number; defaultMessage: string }
> = {
  // Validation errors (400)
  [ErrorCode.VALIDATION_ERROR]: {
    statusCode: 400,
    defaultMessage: "Validation failed",
  },
  [ErrorCode.INVALID_EMAIL]: {
    statusCode: 400,
    defaultMessage: "Invalid email format",
  },
  [ErrorCode.INVALID_PASSWORD]: {
    statusCode: 400,
    defaultMessage: "Invalid password",
  },
  [ErrorCode.INVALID_ORGANIZATION_NAME]: {
    statusCode: 400,
    defaultMessage:
      "Organization name must be 3-50 characters of letters, digits, '_' or '-', starting with a letter or digit",
  },
  [ErrorCode.INVALID_PARTITION_ID]: {
    statusCode: 400,
    defaultMessage: "Invalid partition identifier",
  },

  // Registry errors (400, 404)
  [ErrorCode.DUPLICATE_NAME]: {
    statusCode: 400,
    defaultMessage: "Organization already exists",
  },
  [ErrorCode.DUPLICATE_EMAIL]: {
    statusCode: 400,
    defaultMessage: "Email is already registered",
  },
  [ErrorCode.ORGANIZATION_NOT_FOUND]: {
    statusCode: 404,
    defaultMessage: "Organization not found",
  },

  // Authentication errors (401)
  [ErrorCode.INVALID_CREDENTIALS]: {
    statusCode: 401,
    defaultMessage: "Invalid email or password",
  },
  [ErrorCode.UNAUTHORIZED]: {
    statusCode: 401,
    defaultMessage: "Authentication required",
  },
  [ErrorCode.TOKEN_INVALID]: {
    statusCode: 401,
    defaultMessage: "Invalid token provided",
  },
  [ErrorCode.TOKEN_EXPIRED]: {
    statusCode: 401,
    defaultMessage: "Token has expired",
  },

  // Partition errors (409, 500)
  [ErrorCode.PARTITION_EXISTS]: {
    statusCode: 409,
    defaultMessage: "Partition already exists",
  },
  [ErrorCode.PARTITION_SOURCE_MISSING]: {
    statusCode: 500,
    defaultMessage: "Source partition does not exist",
  },
  [ErrorCode.PARTITION_TARGET_EXISTS]: {
    statusCode: 409,
    defaultMessage: "Target partition already exists",
  },
  [ErrorCode.PARTITION_OPERATION_FAILED]: {
    statusCode: 500,
    defaultMessage: "Partition operation failed",
  },

  // System errors (404, 500)
  [ErrorCode.ROUTE_NOT_FOUND]: {
    statusCode: 404,
    defaultMessage: "Route not found",
  },
  [ErrorCode.DATABASE_ERROR]: {
    statusCode: 500,
    defaultMessage: "Database error occurred",
  },
  [ErrorCode.INTERNAL_SERVER_ERROR]: {
    statusCode: 500,
    defaultMessage: "Internal server error",
  },
};

export { ERROR_STATUS_MAP };
