import express, { type Express, type Request, type RequestHandler, type Response } from 'express';
import type { AppConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { pathFormats, type JobEngine, type SubmitResult } from '../core/JobEngine.js';
import { isTerminal } from '../core/JobStore.js';
import { rejectionToHttp } from '../core/httpError.js';
import { ConvertBody, RawConvertQuery, decodeContent, isWaitRequested } from '../core/validate.js';
import { wrap } from '../core/wrap.js';
import { parseFormat } from '../core/formats.js';
import { labelConversion } from '../middleware/httpMetrics.js';

export type ConvertDeps = {
  cfg: AppConfig;
  log: Logger;
  engine: JobEngine;
  convertRateLimit: RequestHandler;
};

// base64 inflates by 4/3, plus the JSON envelope
const jsonLimit = (maxPayloadBytes: number) => Math.ceil(maxPayloadBytes * 1.4) + 64 * 1024;

async function respond(res: Response, engine: JobEngine, submitted: SubmitResult, wait: boolean, waitMs: number) {
  if (!submitted.ok) throw rejectionToHttp(submitted.reason, submitted.message);

  const { jobId, path } = submitted;
  if (wait) {
    const view = await engine.waitForCompletion(jobId, waitMs);
    if (view && isTerminal(view.status)) {
      res.status(200).json(view);
      return;
    }
  }
  res
    .status(202)
    .location(`/api/jobs/${jobId}`)
    .json({ jobId, status: engine.status(jobId)?.status ?? 'queued', path: pathFormats(path) });
}

export function setupConvertRoutes(app: Express, deps: ConvertDeps) {
  const { cfg, log, engine, convertRateLimit } = deps;

  app.get('/api/formats', (_req: Request, res: Response) => {
    res.json({ formats: engine.listFormats(), conversions: engine.conversions() });
  });

  // ========================
  // POST /api/convert (JSON body, text or base64 content)
  // ========================
  app.post(
    '/api/convert',
    convertRateLimit,
    express.json({ limit: jsonLimit(cfg.maxPayloadBytes) }),
    wrap(async (req: Request, res: Response) => {
      const body = ConvertBody.parse(req.body);
      labelConversion(res, parseFormat(body.sourceFormat), parseFormat(body.targetFormat));
      const payload = decodeContent(body);
      const submitted = engine.submit(body.sourceFormat, body.targetFormat, payload);
      if (submitted.ok) log.debug('convert_submitted', { id: submitted.jobId, requestId: req.id, traceId: req.traceId });
      await respond(res, engine, submitted, isWaitRequested(req.query.wait), cfg.syncWaitMs);
    })
  );

  // ========================
  // POST /api/convert/raw?from=&to= (request body is the document)
  // ========================
  app.post(
    '/api/convert/raw',
    convertRateLimit,
    express.raw({ type: () => true, limit: cfg.maxPayloadBytes }),
    wrap(async (req: Request, res: Response) => {
      const query = RawConvertQuery.parse(req.query);
      labelConversion(res, parseFormat(query.from), parseFormat(query.to));
      const payload: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const submitted = engine.submit(query.from, query.to, payload);
      if (submitted.ok) log.debug('convert_submitted', { id: submitted.jobId, requestId: req.id, traceId: req.traceId, raw: true });
      await respond(res, engine, submitted, isWaitRequested(query.wait), cfg.syncWaitMs);
    })
  );
}
