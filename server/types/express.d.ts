declare global {
  namespace Express {
    interface Request {
      /** Set by requestLogger from `x-request-id` or a fresh UUID. */
      id?: string;
      traceparent?: string;
      /** Trace id taken from a well-formed `traceparent` header. */
      traceId?: string;
    }
  }
}

export {};
