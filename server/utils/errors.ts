export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string = 'Bad request', code: string = 'BAD_REQUEST', details?: Record<string, unknown>) {
    super(message, 400, code, true, details);
  }
}

/**
 * The request path holds a malformed percent escape, or its escapes
 * decode to bytes that are not valid UTF-8.
 */
export class DecodeError extends BadRequestError {
  constructor(path: string) {
    super(`Malformed percent-encoding or invalid UTF-8 in path '${path}'`, 'DECODE_ERROR', { path });
  }
}

/**
 * The decoded path contains a component that could leave the root
 * directory (parent marker, root, drive or UNC prefix).
 */
export class UnsafePathError extends BadRequestError {
  constructor(path: string) {
    super(`The path '${path}' was denied access.`, 'PATH_DENIED', { path });
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 500, 'CONFIG_ERROR', false, details);
  }
}

export const isOperationalError = (error: Error): boolean => {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
};

export const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};
