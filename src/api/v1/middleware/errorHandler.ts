import { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError } from '../utils/AppError';
import logger from '../utils/logger';
import { sendError } from '../utils/response';

const isMalformedJson = (err: unknown): boolean =>
  err instanceof SyntaxError && Reflect.get(err, 'type') === 'entity.parse.failed';

// http-errors shape raised by the body parser (413 entity.too.large, 415 charset, ...)
const exposedClientError = (err: unknown): { statusCode: number; message: string } | null => {
  if (!(err instanceof Error)) return null;
  const statusCode: unknown = Reflect.get(err, 'statusCode') ?? Reflect.get(err, 'status');
  if (typeof statusCode !== 'number' || statusCode < 400 || statusCode >= 500) return null;
  return Reflect.get(err, 'expose') === true ? { statusCode, message: err.message } : null;
};

export const notFoundHandler = (req: Request, res: Response) => {
  sendError(res, 404, 'Route not found');
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // express recognises error middleware by its four parameters
  next: NextFunction
) => {
  if (isMalformedJson(err)) {
    sendError(res, 400, 'Malformed JSON body');
    return;
  }

  if (err instanceof AppError && err.isOperational) {
    const meta = err instanceof ValidationError ? { field: err.field } : {};
    logger.warn(err.message, { statusCode: err.statusCode, method: req.method, path: req.originalUrl, ...meta });
    sendError(res, err.statusCode, err.message);
    return;
  }

  const clientError = exposedClientError(err);
  if (clientError) {
    logger.warn(clientError.message, { statusCode: clientError.statusCode, method: req.method, path: req.originalUrl });
    sendError(res, clientError.statusCode, clientError.message);
    return;
  }

  // Full detail stays in the log; the caller only sees a generic message
  logger.error('Unhandled error', {
    method: req.method,
    path: req.originalUrl,
    error: err instanceof Error ? { message: err.message, stack: err.stack, cause: err.cause } : err,
  });
  sendError(res, 500, 'Internal Server Error');
};
