import { NextFunction, Request, Response } from 'express';

import { CustomError } from 'App/errors/CustomError';
import { validationErrorType } from 'App/types/errorType';
// --------------------------------------------------------------

/** Body-parser failures carry an HTTP status of their own (e.g. 400 for bad JSON). */
const clientStatusOf = (err: Error): number | null => {
  if (!('status' in err)) return null;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
};

/**
 * Global error handling middleware.
 * Logs the failure and answers with `{ code, message, details }`.
 */
function errorHandler(
  err: CustomError | Error,
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    // a streaming response already started; all we can do is drop it
    console.error('[Error] Failure after headers were sent:', err.message);
    next(err);
    return;
  }

  const clientStatus = err instanceof CustomError ? null : clientStatusOf(err);
  const statusCode: number =
    err instanceof CustomError ? err.statusCode : (clientStatus ?? 500);
  const code: string =
    err instanceof CustomError
      ? err.code
      : clientStatus !== null
        ? 'BAD_REQUEST'
        : 'INTERNAL_SERVER_ERROR';
  const message: string =
    err instanceof CustomError || clientStatus !== null
      ? err.message
      : 'An unexpected error occurred';
  const details: validationErrorType[] | undefined =
    err instanceof CustomError ? err.details : undefined;

  const log = statusCode >= 500 ? console.error : console.warn;
  log('[Error] Request failed', {
    statusCode,
    code,
    message: err.message,
    method: req.method,
    url: req.originalUrl,
    ip: req.ip,
    stack: statusCode >= 500 ? err.stack : undefined,
  });

  res.status(statusCode).json({
    code,
    message,
    details,
  });
}

export default errorHandler;
