import type { RejectionReason } from './errors.js';

export class HttpError extends Error {
  status: number;
  code: string;
  details?: unknown;

  constructor(status: number, code: string, message?: string, details?: unknown) {
    super(message || code);
    this.status = Number.isInteger(status) ? status : 500;
    this.code = code || 'INTERNAL_ERROR';
    this.details = details;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

const REJECTION_STATUS: Record<RejectionReason, number> = {
  invalid_format: 400,
  payload_too_large: 413,
  unsupported_conversion: 422,
};

export function rejectionToHttp(reason: RejectionReason, message: string): HttpError {
  return new HttpError(REJECTION_STATUS[reason], reason.toUpperCase(), message);
}
