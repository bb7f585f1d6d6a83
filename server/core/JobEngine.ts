import type { Logger } from './logger.js';
import type { EventBroadcaster, LifecycleEventKind } from './EventBroadcaster.js';
import type { ConverterRegistry } from './ConverterRegistry.js';
import type { ConversionPath, FormatGraph, FormatPair } from './FormatGraph.js';
import {
  isInvalidTransition,
  isTerminal,
  type ConversionJob,
  type JobResult,
  type JobStatus,
  type JobStore,
  type TerminalStatus,
  type TransitionPatch,
} from './JobStore.js';
import { contentTypeOf, isBinaryFormat, parseFormat, type Format } from './formats.js';
import { rejectionMessage, type ConversionFailure, type RejectionReason } from './errors.js';
import { recordOutcome, recordRejection, recordSubmission, type MetricsRegistry } from './metrics.js';

export type SubmitResult =
  | { ok: true; jobId: string; path: ConversionPath }
  | { ok: false; reason: RejectionReason; message: string };

export type JobResultView = {
  contentType: string;
  encoding: 'utf8' | 'base64';
  content: string;
  bytes: number;
};

/**
 * What transports see of a job. Result bytes are inlined as UTF-8 for text
 * formats and base64 for binary ones.
 */
export type JobView = {
  id: string;
  status: JobStatus;
  sourceFormat: Format;
  targetFormat: Format;
  path: Format[];
  createdAt: number;
  updatedAt: number;
  startedAt?: number;
  finishedAt?: number;
  result?: JobResultView;
  error?: ConversionFailure;
};

export type JobEngineOptions = {
  maxPayloadBytes: number;
  maxConcurrent: number;
  jobTimeoutMs: number;
};

export type JobEngineDeps = {
  log: Logger;
  store: JobStore;
  graph: FormatGraph;
  registry: ConverterRegistry;
  broadcaster: EventBroadcaster;
  metrics?: MetricsRegistry;
};

type HopOutcome =
  | { ok: true; output: Buffer }
  | { ok: false; failure: ConversionFailure; hop: FormatPair };

type Deferred = { promise: Promise<void>; resolve: () => void };

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function pathFormats(path: ConversionPath): Format[] {
  return [path.from, ...path.hops.map((h) => h.to)];
}

export function toJobView(job: ConversionJob): JobView {
  const view: JobView = {
    id: job.id,
    status: job.status,
    sourceFormat: job.sourceFormat,
    targetFormat: job.targetFormat,
    path: pathFormats(job.path),
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
  };
  if (job.startedAt !== undefined) view.startedAt = job.startedAt;
  if (job.finishedAt !== undefined) view.finishedAt = job.finishedAt;
  if (job.result) {
    const binary = isBinaryFormat(job.result.format);
    view.result = {
      contentType: job.result.contentType,
      encoding: binary ? 'base64' : 'utf8',
      content: job.result.data.toString(binary ? 'base64' : 'utf8'),
      bytes: job.result.data.length,
    };
  }
  if (job.error) view.error = { ...job.error };
  return view;
}

/**
 * Job Engine - accepts conversion requests and drives them to a terminal state.
 *
 * Requests are validated and routed synchronously; execution happens on
 * detached promises, at most `maxConcurrent` at a time, FIFO beyond that.
 * Every lifecycle event is published after the matching store transition has
 * been applied.
 */
export class JobEngine {
  private readonly log: Logger;
  private readonly store: JobStore;
  private readonly graph: FormatGraph;
  private readonly registry: ConverterRegistry;
  private readonly broadcaster: EventBroadcaster;
  private readonly metrics?: MetricsRegistry;
  private readonly maxPayloadBytes: number;
  private readonly jobTimeoutMs: number;
  private maxConcurrent: number;

  private readonly waiting: string[] = [];
  private readonly running = new Map<string, AbortController>();
  private readonly settled = new Map<string, Deferred>();
  private stopped = false;

  constructor(deps: JobEngineDeps, options: JobEngineOptions) {
    this.log = deps.log;
    this.store = deps.store;
    this.graph = deps.graph;
    this.registry = deps.registry;
    this.broadcaster = deps.broadcaster;
    this.metrics = deps.metrics;
    this.maxPayloadBytes = options.maxPayloadBytes;
    this.jobTimeoutMs = options.jobTimeoutMs;
    this.maxConcurrent = Math.max(1, Math.floor(options.maxConcurrent));

    for (const { from, to } of this.graph.edges()) {
      if (!this.registry.has(from, to)) this.log.warn('converter_missing', { from, to });
    }
  }

  submit(sourceFormat: unknown, targetFormat: unknown, payload: Buffer): SubmitResult {
    if (this.stopped) throw new Error('Job engine is shut down');

    const from = parseFormat(sourceFormat);
    const to = parseFormat(targetFormat);
    if (!from || !to) {
      return this.reject('invalid_format', { sourceFormat: String(sourceFormat), targetFormat: String(targetFormat) });
    }
    if (payload.length > this.maxPayloadBytes) {
      return this.reject('payload_too_large', { bytes: payload.length, max: this.maxPayloadBytes });
    }
    const path = this.graph.resolve(from, to);
    if (!path) return this.reject('unsupported_conversion', { from, to });

    const job = this.store.create({ sourceFormat: from, targetFormat: to, path, payload });
    this.settled.set(job.id, deferred());
    if (this.metrics) recordSubmission(this.metrics, payload.length);
    this.log.info('job_created', { id: job.id, from, to, hops: path.hops.length, bytes: payload.length });

    this.publish('job_queued', job.id, {
      sourceFormat: from,
      targetFormat: to,
      path: pathFormats(path),
      bytes: payload.length,
    });

    this.waiting.push(job.id);
    this.schedule();
    return { ok: true, jobId: job.id, path };
  }

  status(id: string): JobView | undefined {
    const job = this.store.get(id);
    return job ? toJobView(job) : undefined;
  }

  getResult(id: string): JobResult | undefined {
    return this.store.get(id)?.result;
  }

  /**
   * Resolves with the job view once the job is terminal or `timeoutMs` elapsed,
   * whichever comes first.
   */
  async waitForCompletion(id: string, timeoutMs: number): Promise<JobView | undefined> {
    const job = this.store.get(id);
    if (!job) return undefined;
    const pending = this.settled.get(id);
    if (isTerminal(job.status) || !pending) return toJobView(job);

    await new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, Math.max(0, timeoutMs));
      pending.promise.then(() => {
        clearTimeout(timer);
        resolve();
      }, resolve);
    });
    return this.status(id);
  }

  listFormats(): Format[] {
    return this.graph.formats();
  }

  conversions(): FormatPair[] {
    return this.graph.edges();
  }

  evictExpired(now = Date.now()): number {
    const removed = this.store.evictExpired(now);
    if (removed > 0) this.log.info('jobs_evicted', { removed, remaining: this.store.size });
    if (this.metrics) {
      this.metrics.reaper.lastRunTimestamp = Math.floor(now / 1000);
      this.metrics.reaper.jobsEvicted += removed;
    }
    return removed;
  }

  /**
   * Starts queued jobs until the concurrency limit is reached.
   */
  schedule(): void {
    while (!this.stopped && this.running.size < this.maxConcurrent && this.waiting.length > 0) {
      const id = this.waiting.shift();
      if (id === undefined) break;
      const controller = new AbortController();
      this.running.set(id, controller);
      this.execute(id, controller).catch((err: unknown) => {
        this.log.error('job_execution_crashed', { id, error: String(err) });
        this.release(id);
      });
    }
  }

  setMaxConcurrent(max: number): void {
    this.maxConcurrent = Math.max(1, Math.min(Math.floor(max), 64));
    this.log.info('max_concurrent_updated', { maxConcurrent: this.maxConcurrent });
    this.schedule();
  }

  getMaxConcurrent(): number {
    return this.maxConcurrent;
  }

  getStats() {
    return {
      ...this.store.counts(),
      total: this.store.size,
      active: this.running.size,
      waiting: this.waiting.length,
      maxConcurrent: this.maxConcurrent,
    };
  }

  getQueueInfo(now = Date.now()) {
    return {
      running: Array.from(this.running.keys()).flatMap((id) => {
        const job = this.store.get(id);
        if (!job) return [];
        return [{ id, from: job.sourceFormat, to: job.targetFormat, duration: now - (job.startedAt ?? job.createdAt) }];
      }),
      waiting: this.waiting.flatMap((id) => {
        const job = this.store.get(id);
        if (!job) return [];
        return [{ id, from: job.sourceFormat, to: job.targetFormat, waitTime: now - job.createdAt }];
      }),
    };
  }

  /**
   * Stops scheduling, fails queued jobs and abandons running ones. Queued jobs
   * still pass through `running` so every job sees the same event order.
   */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    const error: ConversionFailure = { kind: 'internal_error', message: 'Job engine shutting down' };
    const queued = this.waiting.splice(0);
    const active = Array.from(this.running.entries());
    for (const [, controller] of active) controller.abort(new Error('shutdown'));
    await Promise.all([
      ...queued.map((id) => this.failQueued(id, error)),
      ...active.map(([id]) => this.finish(id, 'failed', { error })),
    ]);
    this.running.clear();
    this.log.info('engine_shutdown', { queued: queued.length, running: active.length });
  }

  private async failQueued(id: string, error: ConversionFailure): Promise<void> {
    let job: ConversionJob;
    try {
      job = await this.store.transition(id, 'running');
    } catch (err) {
      if (isInvalidTransition(err)) {
        this.log.debug('job_transition_rejected', { id, status: 'running', error: err.message });
        return;
      }
      throw err;
    }
    this.publish('job_running', id, { hops: job.path.hops.length, progress: 0 });
    await this.finish(id, 'failed', { error });
  }

  private async execute(id: string, controller: AbortController): Promise<void> {
    const payload = this.store.takePayload(id) ?? Buffer.alloc(0);
    let job: ConversionJob;
    try {
      job = await this.store.transition(id, 'running');
    } catch (err) {
      this.log.warn('job_start_rejected', { id, error: String(err) });
      this.release(id);
      return;
    }

    this.log.info('job_started', { id, waitTime: (job.startedAt ?? job.updatedAt) - job.createdAt });
    this.publish('job_running', id, { hops: job.path.hops.length, progress: 0 });

    const timer = setTimeout(() => {
      this.expire(id, controller).catch((err: unknown) => {
        this.log.error('job_timeout_failed', { id, error: String(err) });
      });
    }, this.jobTimeoutMs);

    try {
      const outcome = await this.runHops(job.path, payload, controller.signal);
      if (controller.signal.aborted) {
        this.log.debug('job_result_discarded', { id });
        return;
      }
      if (outcome.ok) {
        await this.finish(id, 'completed', {
          result: {
            format: job.targetFormat,
            contentType: contentTypeOf(job.targetFormat),
            data: outcome.output,
          },
        });
      } else {
        await this.finish(id, 'failed', { error: outcome.failure }, { hop: `${outcome.hop.from}->${outcome.hop.to}` });
      }
    } finally {
      clearTimeout(timer);
      this.release(id);
    }
  }

  private async runHops(path: ConversionPath, payload: Buffer, signal: AbortSignal): Promise<HopOutcome> {
    if (path.hops.length === 0) return { ok: true, output: Buffer.from(payload) };
    let current = payload;
    for (const hop of path.hops) {
      const outcome = await this.registry.convert(hop, current, { signal });
      if (!outcome.ok) {
        return { ok: false, failure: { kind: outcome.kind, message: outcome.message }, hop };
      }
      current = outcome.output;
    }
    return { ok: true, output: current };
  }

  private async expire(id: string, controller: AbortController): Promise<void> {
    if (!this.running.has(id)) return;
    controller.abort(new Error('timeout'));
    this.log.warn('job_timeout', { id, timeoutMs: this.jobTimeoutMs });
    await this.finish(id, 'failed', {
      error: { kind: 'timeout', message: `Conversion exceeded ${this.jobTimeoutMs} ms` },
    });
    this.release(id);
  }

  private async finish(
    id: string,
    status: TerminalStatus,
    patch: TransitionPatch,
    extra: Record<string, unknown> = {}
  ): Promise<void> {
    let job: ConversionJob;
    try {
      job = await this.store.transition(id, status, patch);
    } catch (err) {
      if (isInvalidTransition(err)) {
        this.log.debug('job_transition_rejected', { id, status, error: err.message });
        return;
      }
      throw err;
    }

    const duration = (job.finishedAt ?? job.updatedAt) - (job.startedAt ?? job.createdAt);
    if (status === 'completed' && job.result) {
      const bytes = job.result.data.length;
      this.log.info('job_completed', { id, duration, bytes });
      if (this.metrics) recordOutcome(this.metrics, { ok: true, bytes }, duration);
      this.publish('job_completed', id, { bytes, contentType: job.result.contentType, duration });
    } else if (job.error) {
      this.log.error('job_failed', { id, kind: job.error.kind, error: job.error.message, ...extra });
      if (this.metrics) recordOutcome(this.metrics, { ok: false, kind: job.error.kind }, duration);
      this.publish('job_failed', id, { kind: job.error.kind, message: job.error.message, ...extra });
    }

    const pending = this.settled.get(id);
    this.settled.delete(id);
    pending?.resolve();
  }

  private release(id: string) {
    if (this.running.delete(id)) this.schedule();
  }

  private publish(kind: LifecycleEventKind, jobId: string, payload: Record<string, unknown>) {
    this.broadcaster.publish({ kind, jobId, payload });
  }

  private reject(reason: RejectionReason, detail: Record<string, unknown>): SubmitResult {
    if (this.metrics) recordRejection(this.metrics, reason);
    this.log.info('job_rejected', { reason, ...detail });
    return { ok: false, reason, message: rejectionMessage(reason) };
  }
}
