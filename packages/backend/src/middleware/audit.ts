import { Request, Response, NextFunction } from 'express';

const AUDITED_METHODS = new Set(['POST', 'PUT', 'DELETE']);

/**
 * Logs every mutation of TestProjects once its response has gone out.
 */
export function auditLog(req: Request, res: Response, next: NextFunction) {
  if (!AUDITED_METHODS.has(req.method)) {
    return next();
  }

  const startedAt = Date.now();
  const { method, originalUrl } = req;
  const ip = req.ip || req.socket.remoteAddress;

  res.on('finish', () => {
    const elapsed = Date.now() - startedAt;
    console.log(`[AUDIT] ${new Date().toISOString()} - ${method} ${originalUrl} ${res.statusCode} (${elapsed}ms) - IP: ${ip}`);
  });

  next();
}
