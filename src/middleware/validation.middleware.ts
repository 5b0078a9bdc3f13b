import type { Request, Response, NextFunction } from 'express';
import type { ZodError, ZodSchema } from 'zod';
import { HttpStatus } from '../types/api.types';

export interface FieldError {
  field: string;
  message: string;
  type: string;
}

export const formatZodErrors = (error: ZodError): FieldError[] => {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    type: err.code,
  }));
};

export const validateZod = (
  schema: ZodSchema,
  property: 'body' | 'query' | 'params' = 'body'
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[property]);

    if (!result.success) {
      const errors = formatZodErrors(result.error);
      res.status(HttpStatus.BAD_REQUEST).json({
        success: false,
        error: errors.map(err => (err.field ? `${err.field}: ${err.message}` : err.message)).join('; '),
        errors,
      });
      return;
    }

    req[property] = result.data;
    next();
  };
};
