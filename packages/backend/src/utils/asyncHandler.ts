import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Wrap an async route handler so rejections reach the error middleware.
 *
 * Express swaps `req.params` back out once the router is left, so the
 * params of the failing route are kept on `res.locals` for the error
 * reporter to look at.
 */
export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch((error: unknown) => {
      res.locals.routeParams = { ...req.params };
      next(error);
    });
  };
}

export function getRouteParams(res: Response): Record<string, string> {
  const params: unknown = res.locals.routeParams;
  if (typeof params !== 'object' || params === null) {
    return {};
  }
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === 'string') {
      result[key] = value;
    }
  }
  return result;
}
