import { RequestHandler, Request, Response } from "express";

/**
 * Adapts a handler written against one of the request interfaces in
 * ./requests to a plain RequestHandler. The middleware in front of the
 * handler (authenticateToken, validateBody) is what makes the narrower
 * request type hold; rejected promises go to Express's error handler.
 *
 * @example
 * router.post("/:id/claim", authenticateToken, typedHandler(claim));
 */
export function typedHandler<TRequest extends Request = Request>(
  handler: (req: TRequest, res: Response) => Promise<void> | void
): RequestHandler {
  return (req: Request, res: Response, next) => {
    Promise.resolve(handler(req as TRequest, res)).catch(next);
  };
}
