import type { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncHandler = (req: Request, res: Response, next: NextFunction) => unknown;

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

/**
 * Routes sync throws and async rejections of a handler into `next(err)`.
 */
export function wrap(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    let result: unknown;
    try {
      result = handler(req, res, next);
    } catch (err) {
      next(err);
      return;
    }

    if (isPromiseLike(result)) {
      Promise.resolve(result).catch(next);
    }
  };
}
