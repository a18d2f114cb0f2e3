import { EventEmitter } from 'eventemitter3';
import { InvalidJobOperationError, NoSuchJobError } from './errors';
import { JobBackend } from './JobBackend';
import { newJobId } from './jobId';
import { DEFAULT_QUEUE_NAME, MAX_JOB_TIMEOUT_MS } from './config';
import { EnqueueData, JobId, JobMetadata, JobRecord, isTerminalStatus } from './types';

export interface InMemoryBackendEvents {
  'job:queued': (job: JobRecord) => void;
  'job:started': (job: JobRecord) => void;
  'job:finished': (job: JobRecord) => void;
  'job:failed': (job: JobRecord) => void;
  'job:canceled': (job: JobRecord) => void;
}

/**
 * Process-local backend with the same contract as the Redis one.
 *
 * Nothing runs jobs here: the `startJob` / `completeJob` / `failJob` /
 * `setMeta` controls stand in for the worker process, which lets tests and
 * local tooling drive a job through its lifecycle by hand.
 */
export class InMemoryJobBackend extends EventEmitter<InMemoryBackendEvents> implements JobBackend {
  readonly queueName: string;
  private jobs = new Map<JobId, JobRecord>();
  private pending: JobId[] = [];
  private timeoutRefs = new Map<JobId, NodeJS.Timeout>();
  private closed = false;

  constructor(queueName: string = DEFAULT_QUEUE_NAME) {
    super();
    this.queueName = queueName;
  }

  async enqueue(data: EnqueueData): Promise<JobRecord> {
    // startJob arms a timer with this value
    if (data.timeoutMs > MAX_JOB_TIMEOUT_MS) {
      throw new InvalidJobOperationError(`timeout must not exceed ${MAX_JOB_TIMEOUT_MS} ms, got ${data.timeoutMs}`);
    }

    const now = Date.now();
    const job: JobRecord = {
      id: newJobId(),
      functionRef: data.functionRef,
      args: [...data.args],
      kwargs: { ...data.kwargs },
      status: 'queued',
      meta: { ...data.meta },
      timeoutMs: data.timeoutMs,
      origin: this.queueName,
      description: data.description,
      createdAt: now,
      enqueuedAt: now,
    };

    // Store and add to the end of the queue
    this.jobs.set(job.id, job);
    this.pending.push(job.id);
    this.emit('job:queued', this.snapshot(job));
    return this.snapshot(job);
  }

  async fetch(id: JobId): Promise<JobRecord> {
    return this.snapshot(this.getJob(id));
  }

  async cancel(id: JobId): Promise<JobRecord> {
    const job = this.getJob(id);
    if (isTerminalStatus(job.status)) {
      throw new InvalidJobOperationError(`Cannot cancel job ${id} in status ${job.status}`);
    }

    // Stop the timeout and drop it from the queue
    this.clearJobTimeout(id);
    this.removePending(id);
    job.status = 'canceled';
    job.endedAt = Date.now();
    this.emit('job:canceled', this.snapshot(job));
    return this.snapshot(job);
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const timeout of this.timeoutRefs.values()) {
      clearTimeout(timeout);
    }
    this.timeoutRefs.clear();
  }

  /**
   * Takes the oldest queued job, like a worker would
   */
  dequeue(): JobRecord | null {
    const id = this.pending[0];
    if (id === undefined) return null;
    return this.startJob(id);
  }

  startJob(id: JobId): JobRecord {
    const job = this.getJob(id);
    if (job.status !== 'queued') {
      throw new InvalidJobOperationError(`Cannot start job ${id} in status ${job.status}`);
    }

    this.removePending(id);
    job.status = 'started';
    job.startedAt = Date.now();

    // Set timeout for the job
    if (!this.closed) {
      const timeout = setTimeout(() => {
        this.handleJobTimeout(id);
      }, job.timeoutMs);
      this.timeoutRefs.set(id, timeout);
    }

    this.emit('job:started', this.snapshot(job));
    return this.snapshot(job);
  }

  completeJob(id: JobId, result: unknown): JobRecord {
    const job = this.requireStarted(id, 'complete');
    // Clear timeout if exists
    this.clearJobTimeout(id);
    job.status = 'finished';
    job.result = result;
    job.endedAt = Date.now();
    this.emit('job:finished', this.snapshot(job));
    return this.snapshot(job);
  }

  failJob(id: JobId, error?: Error | string): JobRecord {
    const job = this.requireStarted(id, 'fail');
    this.clearJobTimeout(id);
    this.markFailed(job, error instanceof Error ? error.message : error ?? 'Job failed without specific error');
    return this.snapshot(job);
  }

  /**
   * Merges into the job's metadata, the way a worker reports progress
   */
  setMeta(id: JobId, meta: JobMetadata): JobRecord {
    const job = this.getJob(id);
    job.meta = { ...job.meta, ...meta };
    return this.snapshot(job);
  }

  get length(): number {
    return this.pending.length;
  }

  private handleJobTimeout(id: JobId) {
    this.timeoutRefs.delete(id);
    const job = this.jobs.get(id);
    if (!job || job.status !== 'started') return;
    this.markFailed(job, `Job exceeded maximum timeout value (${job.timeoutMs} ms)`);
  }

  private markFailed(job: JobRecord, message: string) {
    job.status = 'failed';
    job.error = message;
    job.endedAt = Date.now();
    this.emit('job:failed', this.snapshot(job));
  }

  private requireStarted(id: JobId, action: string): JobRecord {
    const job = this.getJob(id);
    if (job.status !== 'started') {
      throw new InvalidJobOperationError(`Cannot ${action} job ${id} in status ${job.status}`);
    }
    return job;
  }

  private getJob(id: JobId): JobRecord {
    const job = this.jobs.get(id);
    if (!job) throw new NoSuchJobError(id);
    return job;
  }

  private removePending(id: JobId) {
    const index = this.pending.indexOf(id);
    if (index !== -1) {
      this.pending.splice(index, 1);
    }
  }

  private clearJobTimeout(id: JobId) {
    const timeout = this.timeoutRefs.get(id);
    if (timeout) {
      clearTimeout(timeout);
      this.timeoutRefs.delete(id);
    }
  }

  // Stored records never leave the backend; callers get copies.
  private snapshot(job: JobRecord): JobRecord {
    return { ...job, args: [...job.args], kwargs: { ...job.kwargs }, meta: { ...job.meta } };
  }
}
