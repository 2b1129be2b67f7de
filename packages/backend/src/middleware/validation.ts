import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../errors/httpError';

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Parse the `:id` route segment. Anything but a base-10 integer is a 400.
 */
export function parseProjectId(raw: string): number {
  if (!INTEGER_PATTERN.test(raw)) {
    throw new ValidationError('Invalid id: must be an integer');
  }
  const id = Number(raw);
  if (!Number.isSafeInteger(id)) {
    throw new ValidationError('Invalid id: must be an integer');
  }
  return id;
}

/**
 * Middleware to validate a project body: `name` is required and must be a string.
 */
export function validateProjectBody(req: Request, res: Response, next: NextFunction) {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return next(new ValidationError('Request body must be a JSON object'));
  }

  const name = 'name' in body ? body.name : undefined;
  if (typeof name !== 'string') {
    return next(new ValidationError('Name is required'));
  }

  req.body = { name };
  next();
}
