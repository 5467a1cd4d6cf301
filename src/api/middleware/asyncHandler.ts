import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Async handler wrapper for express route handlers
 * Rejections are forwarded to the error handler
 */
export const asyncHandler = (fn: (req: Request, res: Response) => Promise<void>): RequestHandler => (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
};
