// src/routes/asyncRoute.ts

import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Forward rejected handler promises to the error middleware
 */
export function asyncRoute(
    handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}
