import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { AppError, logger } from '../utils';
import { env } from '../config';

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error | AppError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  // Default error values
  let statusCode = 500;
  let message = 'Internal Server Error';
  let isOperational = false;

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.message;
    isOperational = err.isOperational;
  } else if (err instanceof multer.MulterError) {
    // Upload rejected before reaching the route (size limit, unexpected field)
    statusCode = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    message = err.message;
    isOperational = true;
  }

  // Log error
  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  // Send response
  res.status(statusCode).json({
    success: false,
    error: message,
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
