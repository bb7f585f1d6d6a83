import type { ConversionFailureKind, RejectionReason } from './errors.js';

export type HistogramBuckets = {
  readonly bounds: number[];
  counts: number[];
  sum: number;
  count: number;
};

export type ConversionMetrics = {
  submitted: number;
  completed: number;
  bytesIn: number;
  bytesOut: number;
  rejected: Map<RejectionReason, number>;
  failed: Map<ConversionFailureKind, number>;
  duration: HistogramBuckets;
  size: HistogramBuckets;
};

export type MetricsRegistry = {
  conversions: ConversionMetrics;
  reaper: {
    lastRunTimestamp: number;
    jobsEvicted: number;
  };
};

function createHistogram(bounds: number[]): HistogramBuckets {
  return {
    bounds: bounds.slice().sort((a, b) => a - b),
    counts: new Array<number>(bounds.length + 1).fill(0),
    sum: 0,
    count: 0,
  };
}

export function observeHistogram(hist: HistogramBuckets, value: number) {
  if (!Number.isFinite(value) || value < 0) return;
  hist.sum += value;
  hist.count += 1;
  for (let i = 0; i < hist.bounds.length; i += 1) {
    if (value <= hist.bounds[i]) {
      hist.counts[i] += 1;
      return;
    }
  }
  hist.counts[hist.counts.length - 1] += 1;
}

export function createMetricsRegistry(): MetricsRegistry {
  const MB = 1024 * 1024;
  return {
    conversions: {
      submitted: 0,
      completed: 0,
      bytesIn: 0,
      bytesOut: 0,
      rejected: new Map(),
      failed: new Map(),
      duration: createHistogram([0.01, 0.05, 0.1, 0.5, 1, 5, 30, 120]),
      size: createHistogram([1024, 64 * 1024, 1 * MB, 5 * MB, 20 * MB, 50 * MB]),
    },
    reaper: {
      lastRunTimestamp: 0,
      jobsEvicted: 0,
    },
  };
}

function bump<K>(map: Map<K, number>, key: K) {
  map.set(key, (map.get(key) ?? 0) + 1);
}

export function recordRejection(metrics: MetricsRegistry, reason: RejectionReason) {
  bump(metrics.conversions.rejected, reason);
}

export function recordSubmission(metrics: MetricsRegistry, bytes: number) {
  metrics.conversions.submitted += 1;
  metrics.conversions.bytesIn += bytes;
  observeHistogram(metrics.conversions.size, bytes);
}

export function recordOutcome(
  metrics: MetricsRegistry,
  outcome: { ok: true; bytes: number } | { ok: false; kind: ConversionFailureKind },
  durationMs: number
) {
  const c = metrics.conversions;
  observeHistogram(c.duration, durationMs / 1000);
  if (outcome.ok) {
    c.completed += 1;
    c.bytesOut += outcome.bytes;
  } else {
    bump(c.failed, outcome.kind);
  }
}

export function resetMetrics(registry: MetricsRegistry) {
  const c = registry.conversions;
  c.submitted = 0;
  c.completed = 0;
  c.bytesIn = 0;
  c.bytesOut = 0;
  c.rejected.clear();
  c.failed.clear();
  resetHistogram(c.duration);
  resetHistogram(c.size);
  registry.reaper.lastRunTimestamp = 0;
  registry.reaper.jobsEvicted = 0;
}

function resetHistogram(hist: HistogramBuckets) {
  hist.sum = 0;
  hist.count = 0;
  hist.counts.fill(0);
}

export function histogramLines(name: string, hist: HistogramBuckets): string[] {
  const lines: string[] = [];
  let cumulative = 0;
  for (let i = 0; i < hist.bounds.length; i += 1) {
    cumulative += hist.counts[i];
    lines.push(`${name}_bucket{le="${hist.bounds[i]}"} ${cumulative}`);
  }
  cumulative += hist.counts[hist.counts.length - 1];
  lines.push(`${name}_bucket{le="+Inf"} ${cumulative}`);
  lines.push(`${name}_sum ${hist.sum}`);
  lines.push(`${name}_count ${hist.count}`);
  return lines;
}
