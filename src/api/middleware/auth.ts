import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * API key authentication: `x-api-key` header or `Authorization: Bearer <key>`.
 */
export function requireAuth(expectedKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers['authorization'];
    const apiKey = req.headers['x-api-key'];

    const providedKey = typeof apiKey === 'string'
      ? apiKey
      : (authHeader?.startsWith('Bearer ') ? authHeader.substring(7) : authHeader);

    if (!providedKey || providedKey !== expectedKey) {
      res.status(401).json({ status: 'error', code: 'unauthorized', message: 'Unauthorized' });
      return;
    }

    next();
  };
}
