import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ControllerResponse } from '@/controllers/catalog.controller';

/**
 * Adapts a controller call to an Express handler: sends its status and body,
 * and forwards rejections to the error middleware.
 */
export function respond<T>(
  action: (req: Request) => Promise<ControllerResponse<T>>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    action(req)
      .then((result) => {
        // the request timeout may already have answered
        if (res.headersSent) return;
        res.status(result.status).json(result.body);
      })
      .catch(next);
  };
}
