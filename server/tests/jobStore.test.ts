import { beforeEach, describe, expect, it } from 'vitest';
import { InvalidTransitionError, JobNotFoundError, JobStore, type CreateJobRequest } from '../core/JobStore.js';

const request: CreateJobRequest = {
  sourceFormat: 'markdown',
  targetFormat: 'html',
  path: { from: 'markdown', to: 'html', hops: [{ from: 'markdown', to: 'html' }] },
  payload: Buffer.from('# Hi'),
};

const result = { format: 'html' as const, contentType: 'text/html; charset=utf-8', data: Buffer.from('<h1>Hi</h1>') };

describe('JobStore', () => {
  let clock: number;
  let store: JobStore;

  beforeEach(() => {
    clock = 1_000;
    store = new JobStore({ retentionMs: 1_000, now: () => clock });
  });

  it('creates queued jobs with a uuid', () => {
    const job = store.create(request);
    expect(job.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(job).toMatchObject({ status: 'queued', createdAt: 1_000, updatedAt: 1_000 });
    expect(store.get(job.id)?.status).toBe('queued');
  });

  it('walks queued -> running -> completed and stamps times', async () => {
    const { id } = store.create(request);
    clock = 1_500;
    const running = await store.transition(id, 'running');
    expect(running).toMatchObject({ status: 'running', startedAt: 1_500, updatedAt: 1_500 });
    clock = 2_000;
    const done = await store.transition(id, 'completed', { result });
    expect(done).toMatchObject({ status: 'completed', finishedAt: 2_000, updatedAt: 2_000 });
    expect(done.result?.data.toString()).toBe('<h1>Hi</h1>');
    expect(store.takePayload(id)).toBeUndefined();
  });

  it('rejects backwards and skipping transitions without mutating', async () => {
    const { id } = store.create(request);
    await expect(store.transition(id, 'completed', { result })).rejects.toBeInstanceOf(InvalidTransitionError);
    await store.transition(id, 'running');
    await store.transition(id, 'failed', { error: { kind: 'internal_error', message: 'x' } });
    await expect(store.transition(id, 'running')).rejects.toMatchObject({ code: 'invalid_transition' });
    expect(store.get(id)?.status).toBe('failed');
  });

  it('requires a result to complete and an error to fail', async () => {
    const { id } = store.create(request);
    await store.transition(id, 'running');
    await expect(store.transition(id, 'completed')).rejects.toThrow('result required');
    await expect(store.transition(id, 'failed')).rejects.toThrow('error required');
    expect(store.get(id)?.status).toBe('running');
  });

  it('refuses to fail a job that never started', async () => {
    const { id } = store.create(request);
    await expect(
      store.transition(id, 'failed', { error: { kind: 'internal_error', message: 'stopped' } })
    ).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(store.get(id)?.status).toBe('queued');
  });

  it('throws for unknown ids', async () => {
    await expect(store.transition('missing', 'running')).rejects.toBeInstanceOf(JobNotFoundError);
  });

  it('lets only the first of two racing terminal transitions win', async () => {
    const { id } = store.create(request);
    await store.transition(id, 'running');
    const [first, second] = await Promise.allSettled([
      store.transition(id, 'completed', { result }),
      store.transition(id, 'failed', { error: { kind: 'timeout', message: 'late' } }),
    ]);
    expect(first.status).toBe('fulfilled');
    expect(second.status).toBe('rejected');
    expect(store.get(id)?.status).toBe('completed');
  });

  it('hands out snapshots', () => {
    const job = store.create(request);
    job.status = 'failed';
    job.path.hops.push({ from: 'html', to: 'text' });
    const stored = store.get(job.id);
    expect(stored?.status).toBe('queued');
    expect(stored?.path.hops).toHaveLength(1);
  });

  it('evicts only terminal jobs past the retention window', async () => {
    const done = store.create(request);
    const active = store.create(request);
    await store.transition(done.id, 'running');
    await store.transition(done.id, 'completed', { result });
    await store.transition(active.id, 'running');

    expect(store.evictExpired(2_000)).toBe(0);
    expect(store.evictExpired(2_001)).toBe(1);
    expect(store.get(done.id)).toBeUndefined();
    expect(store.evictExpired(1_000_000)).toBe(0);
    expect(store.get(active.id)?.status).toBe('running');
  });

  it('counts jobs by status', async () => {
    const a = store.create(request);
    store.create(request);
    await store.transition(a.id, 'running');
    expect(store.counts()).toEqual({ queued: 1, running: 1, completed: 0, failed: 0 });
    expect(store.size).toBe(2);
    expect(store.list()).toHaveLength(2);
  });
});
