import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Forward rejections of an async route handler to the Express error chain.
 */
export function asyncHandler(
	handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
	return (req, res, next) => {
		handler(req, res, next).catch(next);
	};
}
