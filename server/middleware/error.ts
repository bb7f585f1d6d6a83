import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { HttpError, isHttpError } from '../core/httpError.js';
import { errorMessage } from '../core/errors.js';

// Express only treats 4-arg functions as error middleware.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  void _next;
  const normalized = normalizeError(err);
  if (res.headersSent) {
    res.end();
    return;
  }
  const details =
    normalized.details ??
    (process.env.NODE_ENV === 'development' && err instanceof Error ? err.stack : undefined);
  res.status(normalized.status).json({
    ok: false,
    requestId: req.id,
    error: {
      code: normalized.code,
      message: normalized.message,
      details,
    },
  });
}

function field(err: object, key: string): unknown {
  return key in err ? Reflect.get(err, key) : undefined;
}

function normalizeError(err: unknown): HttpError {
  if (isHttpError(err)) return err;
  if (err instanceof ZodError) {
    return new HttpError(400, 'INVALID_BODY', err.issues[0]?.message ?? 'Invalid request body', err.issues);
  }
  if (typeof err === 'object' && err !== null) {
    // body-parser reports oversized and unparsable bodies with `status` and `type`
    const status = field(err, 'status');
    const type = field(err, 'type');
    if (type === 'entity.too.large') {
      return new HttpError(413, 'PAYLOAD_TOO_LARGE', 'Payload exceeds the configured maximum size');
    }
    if (type === 'entity.parse.failed') {
      return new HttpError(400, 'INVALID_BODY', 'Malformed JSON body');
    }
    const code = field(err, 'code');
    if (typeof status === 'number') {
      return new HttpError(status, typeof code === 'string' ? code : 'INTERNAL_ERROR', errorMessage(err));
    }
  }
  return new HttpError(500, 'INTERNAL_ERROR', err instanceof Error && err.message ? err.message : 'Unexpected server error');
}
