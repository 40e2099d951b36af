import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { RecordFormatError } from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Zod validation errors (query string, request body)
  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
    res.status(400).json(response);
    return;
  }

  // Malformed CSV or record shape -> 400
  if (err instanceof RecordFormatError) {
    const response: ErrorResponse = {
      code: err.code,
      message: err.message,
      details: {
        record: err.recordNumber,
        issues: err.issues,
      },
    };
    res.status(400).json(response);
    return;
  }

  // body-parser rejects oversized bodies with status 413
  if ('status' in err && err.status === 413) {
    const response: ErrorResponse = {
      code: 'PAYLOAD_TOO_LARGE',
      message: 'Request body too large',
    };
    res.status(413).json(response);
    return;
  }

  console.error('Error:', err);

  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
