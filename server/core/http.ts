import type { Response } from 'express';

/**
 * Set no-cache headers (HTTP/1.0 and HTTP/1.1 compatible)
 */
export const setNoStore = (res: Response): void => {
  res.setHeader('Cache-Control', 'no-store');
  res.setHeader('Pragma', 'no-cache');
};

export const setSseHeaders = (res: Response): void => {
  res.setHeader('Content-Type', 'text/event-stream');
  setNoStore(res);
  res.setHeader('X-Accel-Buffering', 'no');
  res.setHeader('Connection', 'keep-alive');
};

/**
 * Set download headers with RFC 5987 filename* encoding for Unicode support
 */
export const setDownloadHeaders = (res: Response, filename: string, contentType: string, size: number): void => {
  const asciiSafe = filename.replace(/[^\x20-\x7E]/g, '_');
  const utf8Encoded = encodeURIComponent(filename);
  res.setHeader('Content-Type', contentType);
  res.setHeader('Content-Disposition', `attachment; filename="${asciiSafe}"; filename*=UTF-8''${utf8Encoded}`);
  res.setHeader('Content-Length', String(size));
  setNoStore(res);
};

/**
 * Append value to Vary header
 */
export const appendVary = (res: Response, value: string): void => {
  const existing = res.getHeader('Vary');
  if (!existing) {
    res.setHeader('Vary', value);
    return;
  }
  const parts = String(existing)
    .split(',')
    .map((s) => s.trim().toLowerCase());
  const lower = value.toLowerCase();
  if (!parts.includes(lower)) {
    parts.push(lower);
    res.setHeader('Vary', parts.join(', '));
  }
};
