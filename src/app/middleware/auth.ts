import type { Request, Response, NextFunction, RequestHandler } from 'express';

export function hasValidBearer(req: Request, expectedToken: string): boolean {
  // If no token is configured, allow (useful for local dev).
  if (!expectedToken) return true;
  return (req.header('authorization') || '') === `Bearer ${expectedToken}`;
}

export function makeBearerAuth(expectedToken: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!hasValidBearer(req, expectedToken)) {
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    next();
  };
}
