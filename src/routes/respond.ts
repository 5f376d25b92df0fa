import type { Response } from 'express';
import type { ZodError } from 'zod';

export interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export function sendError(
  res: Response,
  status: number,
  code: string,
  message: string,
  details?: unknown
): void {
  const body: ErrorBody = { success: false, error: { code, message } };
  if (details !== undefined) {
    body.error.details = details;
  }
  res.status(status).json(body);
}

export function sendValidationError(res: Response, error: ZodError): void {
  sendError(
    res,
    400,
    'VALIDATION_ERROR',
    'Request body is invalid',
    error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
  );
}
