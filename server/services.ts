import type { AppConfig } from './core/config.js';
import { getLogger, type Logger } from './core/logger.js';
import { FormatGraph } from './core/FormatGraph.js';
import { JobStore } from './core/JobStore.js';
import { JobEngine } from './core/JobEngine.js';
import { EventBroadcaster } from './core/EventBroadcaster.js';
import { createMetricsRegistry, type MetricsRegistry } from './core/metrics.js';
import type { ConverterRegistry } from './core/ConverterRegistry.js';
import { createDefaultRegistry } from './converters/index.js';

export type Services = {
  cfg: AppConfig;
  log: Logger;
  store: JobStore;
  graph: FormatGraph;
  registry: ConverterRegistry;
  broadcaster: EventBroadcaster;
  engine: JobEngine;
  metrics: MetricsRegistry;
};

export type ServiceOverrides = {
  log?: Logger;
  graph?: FormatGraph;
  registry?: ConverterRegistry;
  now?: () => number;
};

/**
 * Wires the conversion core. Both transports (REST and MCP) build on the same
 * set so they observe the same jobs and events.
 */
export function createServices(cfg: AppConfig, overrides: ServiceOverrides = {}): Services {
  const log = overrides.log ?? getLogger('engine');
  const metrics = createMetricsRegistry();
  const graph = overrides.graph ?? new FormatGraph();
  const registry = overrides.registry ?? createDefaultRegistry();
  const store = new JobStore({ retentionMs: cfg.jobRetentionMs, now: overrides.now });
  const broadcaster = new EventBroadcaster(log, {
    bufferCapacity: cfg.subscriberBufferCapacity,
    maxConsecutiveDrops: cfg.maxConsecutiveDrops,
    heartbeatIntervalMs: cfg.heartbeatIntervalMs,
    inactivityTimeoutMs: cfg.subscriberTimeoutMs,
    now: overrides.now,
  });
  const engine = new JobEngine(
    { log, store, graph, registry, broadcaster, metrics },
    { maxPayloadBytes: cfg.maxPayloadBytes, maxConcurrent: cfg.maxConcurrent, jobTimeoutMs: cfg.jobTimeoutMs }
  );
  return { cfg, log, store, graph, registry, broadcaster, engine, metrics };
}

/**
 * Starts the heartbeat and the retention reaper. Returns a stop function.
 */
export function startBackground(services: Services): () => void {
  const { cfg, log, engine, broadcaster } = services;
  broadcaster.start();
  const reaper = setInterval(() => {
    try {
      engine.evictExpired();
    } catch (err) {
      log.error('reaper_error', { error: String(err) });
    }
  }, cfg.reaperIntervalMs);
  reaper.unref();
  return () => {
    clearInterval(reaper);
    broadcaster.stop();
  };
}
