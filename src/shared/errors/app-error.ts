import { ErrorCodes, type ErrorCode } from './error-codes.js';

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public isOperational: boolean = true,
    public code?: ErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function notFound(message: string): AppError {
  return new AppError(message, 404, true, ErrorCodes.NOT_FOUND);
}
