import type { NextFunction, Request, RequestHandler, Response } from 'express';

type AsyncRouteHandler<P, ReqBody> = (
  req: Request<P, unknown, ReqBody>,
  res: Response,
  next: NextFunction
) => Promise<void>;

/**
 * Adapts an async route handler so a rejected promise reaches the error
 * handler instead of going unobserved.
 */
export function asyncHandler<P = Record<string, string>, ReqBody = unknown>(
  handler: AsyncRouteHandler<P, ReqBody>
): RequestHandler<P, unknown, ReqBody> {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
