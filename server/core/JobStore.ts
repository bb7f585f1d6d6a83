import { randomUUID } from 'node:crypto';
import type { Format } from './formats.js';
import type { ConversionPath } from './FormatGraph.js';
import type { ConversionFailure } from './errors.js';
import { KeyedMutex } from './keyedMutex.js';

/**
 * Job states during lifecycle
 */
export type JobStatus = 'queued' | 'running' | 'completed' | 'failed';

export type TerminalStatus = Extract<JobStatus, 'completed' | 'failed'>;

export type JobResult = {
  format: Format;
  contentType: string;
  data: Buffer;
};

export interface ConversionJob {
  id: string;
  sourceFormat: Format;
  targetFormat: Format;
  path: ConversionPath;
  /** Input bytes; released once the job is terminal. */
  payload?: Buffer;
  status: JobStatus;
  result?: JobResult;
  error?: ConversionFailure;
  createdAt: number;
  updatedAt: number;
  startedAt?: number;
  finishedAt?: number;
}

export type CreateJobRequest = {
  sourceFormat: Format;
  targetFormat: Format;
  path: ConversionPath;
  payload: Buffer;
};

export type TransitionPatch = {
  result?: JobResult;
  error?: ConversionFailure;
};

const ALLOWED: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return status === 'completed' || status === 'failed';
}

export class JobStoreError extends Error {
  readonly code: 'not_found' | 'invalid_transition';

  constructor(code: JobStoreError['code'], message: string) {
    super(message);
    this.name = 'JobStoreError';
    this.code = code;
  }
}

export class JobNotFoundError extends JobStoreError {
  constructor(id: string) {
    super('not_found', `Job ${id} not found`);
    this.name = 'JobNotFoundError';
  }
}

export class InvalidTransitionError extends JobStoreError {
  readonly from: JobStatus;
  readonly to: JobStatus;

  constructor(id: string, from: JobStatus, to: JobStatus, detail?: string) {
    super('invalid_transition', `Job ${id}: ${from} -> ${to} not allowed${detail ? ` (${detail})` : ''}`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

export function isInvalidTransition(error: unknown): error is InvalidTransitionError {
  return error instanceof InvalidTransitionError;
}

function snapshot(job: ConversionJob): ConversionJob {
  return { ...job, path: { ...job.path, hops: job.path.hops.map((h) => ({ ...h })) } };
}

export type JobStoreOptions = {
  retentionMs: number;
  now?: () => number;
};

/**
 * Job Store - in-memory table of conversion jobs.
 *
 * The only writer of job state. Every status change goes through `transition`,
 * which serialises per job id and rejects anything that is not a forward step of
 * queued -> running -> completed | failed.
 */
export class JobStore {
  private readonly jobs = new Map<string, ConversionJob>();
  private readonly locks = new KeyedMutex();
  private readonly retentionMs: number;
  private readonly now: () => number;

  constructor(options: JobStoreOptions) {
    this.retentionMs = options.retentionMs;
    this.now = options.now ?? Date.now;
  }

  create(request: CreateJobRequest): ConversionJob {
    const ts = this.now();
    const job: ConversionJob = {
      id: randomUUID(),
      sourceFormat: request.sourceFormat,
      targetFormat: request.targetFormat,
      path: request.path,
      payload: request.payload,
      status: 'queued',
      createdAt: ts,
      updatedAt: ts,
    };
    this.jobs.set(job.id, job);
    return snapshot(job);
  }

  get(id: string): ConversionJob | undefined {
    const job = this.jobs.get(id);
    return job ? snapshot(job) : undefined;
  }

  /**
   * Payload of a job that has not reached a terminal state yet.
   */
  takePayload(id: string): Buffer | undefined {
    return this.jobs.get(id)?.payload;
  }

  transition(id: string, next: JobStatus, patch: TransitionPatch = {}): Promise<ConversionJob> {
    return this.locks.run(id, () => {
      const job = this.jobs.get(id);
      if (!job) throw new JobNotFoundError(id);
      if (!ALLOWED[job.status].includes(next)) {
        throw new InvalidTransitionError(id, job.status, next);
      }
      if (next === 'completed' && !patch.result) {
        throw new InvalidTransitionError(id, job.status, next, 'result required');
      }
      if (next === 'failed' && !patch.error) {
        throw new InvalidTransitionError(id, job.status, next, 'error required');
      }

      const ts = this.now();
      job.status = next;
      job.updatedAt = ts;
      if (next === 'running') job.startedAt = ts;
      if (next === 'completed') job.result = patch.result;
      if (next === 'failed') job.error = patch.error;
      if (isTerminal(next)) {
        job.finishedAt = ts;
        job.payload = undefined;
      }
      return snapshot(job);
    });
  }

  /**
   * Drops terminal jobs whose last transition is older than the retention
   * window. Queued and running jobs are never evicted.
   */
  evictExpired(now = this.now()): number {
    let removed = 0;
    for (const [id, job] of this.jobs) {
      if (!isTerminal(job.status)) continue;
      if (now - job.updatedAt <= this.retentionMs) continue;
      if (this.locks.isLocked(id)) continue;
      this.jobs.delete(id);
      removed += 1;
    }
    return removed;
  }

  list(): ConversionJob[] {
    return Array.from(this.jobs.values(), snapshot);
  }

  counts(): Record<JobStatus, number> {
    const counts: Record<JobStatus, number> = { queued: 0, running: 0, completed: 0, failed: 0 };
    for (const job of this.jobs.values()) counts[job.status] += 1;
    return counts;
  }

  get size(): number {
    return this.jobs.size;
  }
}
