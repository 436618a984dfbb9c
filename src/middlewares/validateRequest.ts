import { Request, Response, NextFunction } from 'express';
import { z, ZodError, ZodSchema, ZodTypeAny } from 'zod';
import { AppError } from '../utils';

interface ValidationSchemas {
  params?: ZodSchema;
}

const toValidationError = (error: ZodError): AppError => {
  const errorMessages = error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));
  return AppError.badRequest(`Validation failed: ${JSON.stringify(errorMessages)}`);
};

/**
 * Middleware to validate route params using Zod schemas
 */
export const validateRequest = (schemas: ValidationSchemas) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      if (schemas.params) {
        req.params = await schemas.params.parseAsync(req.params);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        next(toValidationError(error));
      } else {
        next(error);
      }
    }
  };
};

/**
 * Parses a request body inside a handler, where the typed result is needed.
 *
 * @throws AppError (400) listing every invalid field
 */
export const parseBody = <T extends ZodTypeAny>(schema: T, body: unknown): z.infer<T> => {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
};

// Common validation schemas
export const commonSchemas = {
  sessionId: z.object({
    sessionId: z.string().uuid('Invalid session ID format'),
  }),
  searchId: z.object({
    searchId: z.string().uuid('Invalid search ID format'),
  }),
};

export default validateRequest;
