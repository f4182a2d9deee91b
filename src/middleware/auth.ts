import { Request, Response, NextFunction, RequestHandler } from 'express';
import { createLogger } from '../logging';

const log = createLogger('Auth');

export const API_KEY_HEADER = 'x-api-key';

/**
 * Reject requests whose X-API-Key header does not match the expected key.
 * The key is resolved per request so tests and restarts can change it.
 */
export function requireApiKey(resolveKey: () => string | undefined = () => process.env.API_KEY): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const expectedApiKey = resolveKey();
    const apiKey = req.headers[API_KEY_HEADER];

    if (!expectedApiKey) {
      log.error('API_KEY not configured in environment variables');
      res.status(500).json({ error: 'Server configuration error' });
      return;
    }

    if (!apiKey) {
      res.status(401).json({ error: 'Missing X-API-Key header' });
      return;
    }

    if (apiKey !== expectedApiKey) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}
