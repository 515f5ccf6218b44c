import { ErrorRequestHandler } from 'express';
import { HttpError } from '../utils/httpError.js';
import { logger } from '../utils/logger.js';

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof HttpError) {
    res.status(err.status).json({ status: 'error', code: err.code, message: err.message });
    return;
  }

  logger.error({ err, method: req.method, url: req.originalUrl }, 'Unhandled error');
  res.status(500).json({ status: 'error', code: 'INTERNAL_ERROR', message: 'Internal server error' });
};
