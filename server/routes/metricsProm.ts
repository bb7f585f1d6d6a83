import type { Express, Request, Response } from 'express';
import type { MetricsRegistry } from '../core/metrics.js';
import type { JobEngine } from '../core/JobEngine.js';
import type { EventBroadcaster } from '../core/EventBroadcaster.js';
import { histogramLines } from '../core/metrics.js';
import { prometheusRegister } from '../middleware/httpMetrics.js';
import { wrap } from '../core/wrap.js';

function labelledLines(name: string, label: string, entries: Map<string, number>): string[] {
  if (entries.size === 0) return [`${name}{${label}="none"} 0`];
  return Array.from(entries, ([key, count]) => `${name}{${label}="${key}"} ${count}`);
}

export function renderEngineMetrics(registry: MetricsRegistry, engine: JobEngine, broadcaster: EventBroadcaster): string {
  const stats = engine.getStats();
  const events = broadcaster.getStats();
  const c = registry.conversions;
  return [
    '# HELP docshift_jobs_running Number of running jobs',
    '# TYPE docshift_jobs_running gauge',
    `docshift_jobs_running ${stats.active}`,
    '# HELP docshift_jobs_waiting Number of queued jobs',
    '# TYPE docshift_jobs_waiting gauge',
    `docshift_jobs_waiting ${stats.waiting}`,
    '# HELP docshift_jobs_total Jobs held in the store',
    '# TYPE docshift_jobs_total gauge',
    `docshift_jobs_total ${stats.total}`,
    '# HELP docshift_sse_subscribers Connected event subscribers',
    '# TYPE docshift_sse_subscribers gauge',
    `docshift_sse_subscribers ${events.subscribers}`,
    '# HELP docshift_sse_dropped_total Events dropped from full subscriber buffers',
    '# TYPE docshift_sse_dropped_total counter',
    `docshift_sse_dropped_total ${events.dropped}`,
    '# HELP docshift_conversions_submitted_total Accepted conversion requests',
    '# TYPE docshift_conversions_submitted_total counter',
    `docshift_conversions_submitted_total ${c.submitted}`,
    '# HELP docshift_conversions_completed_total Completed conversions',
    '# TYPE docshift_conversions_completed_total counter',
    `docshift_conversions_completed_total ${c.completed}`,
    '# HELP docshift_conversions_rejected_total Rejected requests grouped by reason',
    '# TYPE docshift_conversions_rejected_total counter',
    ...labelledLines('docshift_conversions_rejected_total', 'reason', c.rejected),
    '# HELP docshift_conversions_failed_total Failed conversions grouped by kind',
    '# TYPE docshift_conversions_failed_total counter',
    ...labelledLines('docshift_conversions_failed_total', 'kind', c.failed),
    '# HELP docshift_conversion_bytes_in_total Input bytes accepted',
    '# TYPE docshift_conversion_bytes_in_total counter',
    `docshift_conversion_bytes_in_total ${c.bytesIn}`,
    '# HELP docshift_conversion_bytes_out_total Output bytes produced',
    '# TYPE docshift_conversion_bytes_out_total counter',
    `docshift_conversion_bytes_out_total ${c.bytesOut}`,
    '# HELP docshift_conversion_duration_seconds Conversion duration histogram',
    '# TYPE docshift_conversion_duration_seconds histogram',
    ...histogramLines('docshift_conversion_duration_seconds', c.duration),
    '# HELP docshift_conversion_input_bytes Conversion input size histogram (bytes)',
    '# TYPE docshift_conversion_input_bytes histogram',
    ...histogramLines('docshift_conversion_input_bytes', c.size),
    '# HELP docshift_reaper_jobs_evicted_total Jobs evicted by the retention reaper',
    '# TYPE docshift_reaper_jobs_evicted_total counter',
    `docshift_reaper_jobs_evicted_total ${registry.reaper.jobsEvicted}`,
    '# HELP docshift_reaper_last_run_timestamp_seconds Unix timestamp of last reaper run',
    '# TYPE docshift_reaper_last_run_timestamp_seconds gauge',
    `docshift_reaper_last_run_timestamp_seconds ${registry.reaper.lastRunTimestamp}`,
  ].join('\n');
}

export function mountPromMetrics(app: Express, registry: MetricsRegistry, engine: JobEngine, broadcaster: EventBroadcaster) {
  app.get(
    '/metrics.prom',
    wrap(async (_req: Request, res: Response) => {
      const prometheusBody = await prometheusRegister.metrics();
      res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
      res.end([renderEngineMetrics(registry, engine, broadcaster), '', prometheusBody].join('\n'));
    })
  );
}
