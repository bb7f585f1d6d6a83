/**
 * Server-Sent Events route
 * GET /api/events streams every lifecycle event to the connected client
 */

import type { Express, Request, Response } from 'express';
import type { Logger } from '../core/logger.js';
import type { EventBroadcaster, LifecycleEvent, Subscription } from '../core/EventBroadcaster.js';
import { errorMessage } from '../core/errors.js';
import { setSseHeaders } from '../core/http.js';

export function formatSseFrame(event: LifecycleEvent): string {
  return `id: ${event.seq}\nevent: ${event.kind}\ndata: ${JSON.stringify(event)}\n\n`;
}

export function formatGapFrame(dropped: number): string {
  return `event: gap\ndata: ${JSON.stringify({ dropped })}\n\n`;
}

/**
 * The part of a response the stream writer needs.
 */
export interface SseSink {
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
  write(chunk: string): boolean;
  end(): unknown;
  on(event: 'drain' | 'close', listener: () => void): unknown;
  off(event: 'drain' | 'close', listener: () => void): unknown;
}

function isGone(res: SseSink) {
  return res.writableEnded || res.destroyed;
}

// a stalled peer never drains, so closing the subscription also wakes the writer
function drained(res: SseSink, sub: Subscription): Promise<void> {
  return new Promise((resolve) => {
    let stopWatching: () => void = () => undefined;
    const done = () => {
      res.off('drain', done);
      res.off('close', done);
      stopWatching();
      resolve();
    };
    res.on('drain', done);
    res.on('close', done);
    stopWatching = sub.onClose(done);
  });
}

/**
 * Writes a subscription to the response until either side closes, then ends
 * the response. A gap frame precedes the first event delivered after the
 * buffer dropped events.
 */
export async function pipeSubscription(sub: Subscription, res: SseSink): Promise<void> {
  try {
    for await (const event of sub) {
      if (isGone(res)) break;
      let chunk = formatSseFrame(event);
      if (sub.takeGap()) chunk = formatGapFrame(sub.droppedCount) + chunk;
      if (!res.write(chunk)) await drained(res, sub);
    }
    if (sub.closeReason && sub.closeReason !== 'unsubscribed' && !isGone(res)) {
      res.write(`event: end\ndata: ${JSON.stringify({ reason: sub.closeReason })}\n\n`);
    }
  } finally {
    if (!isGone(res)) res.end();
  }
}

export function setupEventRoutes(app: Express, log: Logger, broadcaster: EventBroadcaster) {
  app.get('/api/events', (req: Request, res: Response) => {
    setSseHeaders(res);
    res.flushHeaders();
    res.write('retry: 5000\n\n');

    const sub = broadcaster.subscribe();
    const cleanup = () => {
      broadcaster.unsubscribe(sub);
    };
    req.on('close', cleanup);
    res.on('error', (err: Error) => {
      if (!/aborted|socket hang up|ECONNRESET|ERR_STREAM_PREMATURE_CLOSE/i.test(err.message)) {
        log.warn('sse_stream_error', { id: sub.id, error: err.message });
      }
      cleanup();
    });

    pipeSubscription(sub, res).catch((err: unknown) => {
      log.warn('sse_pipe_failed', { id: sub.id, error: errorMessage(err) });
      cleanup();
    });
  });
}
