import fs from 'node:fs';
import path from 'node:path';
import express, { type Express, type Request, type RequestHandler, type Response } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import type { JobEngine } from '../core/JobEngine.js';
import type { EventBroadcaster } from '../core/EventBroadcaster.js';
import { HttpError } from '../core/httpError.js';

export type SystemDeps = {
  cfg: AppConfig;
  log: Logger;
  engine: JobEngine;
  broadcaster: EventBroadcaster;
  settingsRateLimit: RequestHandler;
};

const PackageInfo = z.object({ name: z.string(), version: z.string() }).partial();

const SettingsBody = z.object({
  maxConcurrent: z.coerce.number().int().min(1).max(64),
});

let packageCache: z.infer<typeof PackageInfo> | undefined;

function readPackageInfo(log: Logger) {
  if (packageCache) return packageCache;
  packageCache = {};
  try {
    const p = path.join(process.cwd(), 'package.json');
    if (fs.existsSync(p)) {
      const parsed = PackageInfo.safeParse(JSON.parse(fs.readFileSync(p, 'utf8')));
      if (parsed.success) packageCache = parsed.data;
    }
  } catch (err) {
    log.warn('package_info_unreadable', { error: String(err) });
  }
  return packageCache;
}

export function formatDuration(totalSeconds: number): string {
  const s = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  const sec = s % 60;
  if (h > 0) return `${h}h ${m}m`;
  if (m > 0) return `${m}m ${sec}s`;
  return `${sec}s`;
}

export function setupSystemRoutes(app: Express, deps: SystemDeps) {
  const { cfg, log, engine, broadcaster, settingsRateLimit } = deps;

  app.get('/health', (_req: Request, res: Response) => res.json({ ok: true }));
  app.get('/ready', (_req: Request, res: Response) => res.json({ ok: true }));

  app.get('/api/version', (_req: Request, res: Response) => {
    const pkg = readPackageInfo(log);
    const stats = engine.getStats();
    res.json({
      name: pkg.name || 'docshift',
      version: pkg.version || '0.0.0',
      node: process.version,
      platform: `${process.platform} ${process.arch}`,
      port: cfg.port,
      formats: engine.listFormats(),
      settings: {
        maxConcurrent: engine.getMaxConcurrent(),
        maxPayloadBytes: cfg.maxPayloadBytes,
        jobTimeoutSec: Math.floor(cfg.jobTimeoutMs / 1000),
        jobRetentionSec: Math.floor(cfg.jobRetentionMs / 1000),
      },
      uptimeSeconds: Math.floor(process.uptime()),
      uptimeLabel: formatDuration(process.uptime()),
      queues: {
        totalJobs: stats.total,
        running: stats.active,
        waiting: stats.waiting,
      },
    });
  });

  app.get('/api/stats', (_req: Request, res: Response) => {
    res.json({
      jobs: engine.getStats(),
      queue: engine.getQueueInfo(),
      events: broadcaster.getStats(),
    });
  });

  app.post('/api/settings', settingsRateLimit, express.json({ limit: '16kb' }), (req: Request, res: Response) => {
    if (!cfg.settingsApiEnabled) {
      throw new HttpError(403, 'SETTINGS_DISABLED', 'Runtime settings are disabled on this server');
    }
    const body = SettingsBody.parse(req.body);
    log.info('settings_updated', { requestId: req.id, ip: req.ip, maxConcurrent: body.maxConcurrent });
    engine.setMaxConcurrent(body.maxConcurrent);
    res.json({ ok: true, maxConcurrent: engine.getMaxConcurrent() });
  });
}
