import type { Express, Request, Response } from 'express';
import type { JobEngine } from '../core/JobEngine.js';
import { HttpError } from '../core/httpError.js';
import { setDownloadHeaders } from '../core/http.js';
import { extensionOf } from '../core/formats.js';

export function setupJobRoutes(app: Express, engine: JobEngine) {
  app.get('/api/jobs/:id', (req: Request, res: Response) => {
    const view = engine.status(req.params.id);
    if (!view) throw new HttpError(404, 'NOT_FOUND', 'Job not found');
    res.json(view);
  });

  app.get('/api/jobs/:id/result', (req: Request, res: Response) => {
    const id = req.params.id;
    const view = engine.status(id);
    if (!view) throw new HttpError(404, 'NOT_FOUND', 'Job not found');
    const result = engine.getResult(id);
    if (view.status !== 'completed' || !result) {
      throw new HttpError(409, 'NOT_READY', `Job is ${view.status}`, view.error);
    }
    setDownloadHeaders(res, `${id}.${extensionOf(result.format)}`, result.contentType, result.data.length);
    res.status(200).end(result.data);
  });
}
