import { EventEmitter } from 'eventemitter3';
import { DEFAULT_JOB_TIMEOUT_MS, Env, MAX_JOB_TIMEOUT_MS, resolveClientConfig } from './config';
import { InvalidJobIdError, InvalidJobOperationError, describeError, reasonOf } from './errors';
import { JobBackend } from './JobBackend';
import { toJobId } from './jobId';
import { RedisJobBackend } from './RedisJobBackend';
import { FailureReason, Result, err, ok } from './result';
import { ClientOptions, EnqueueOptions, JobId, JobMetadata, JobStatus, Logger } from './types';

export type ClientOperation = 'enqueue' | 'status' | 'metadata' | 'cancel' | 'result';

export interface OperationFailure {
  operation: ClientOperation;
  error: string;
  reason: FailureReason;
}

export interface JobQueueClientEvents {
  'job:enqueued': (event: { jobId: JobId; functionRef: string }) => void;
  'job:canceled': (event: { jobId: JobId }) => void;
  'operation:failed': (failure: OperationFailure) => void;
}

export interface JobQueueClientOptions {
  defaultTimeoutMs?: number;
  logger?: Logger;
}

const FAILURE_LABELS: Record<ClientOperation, string> = {
  enqueue: 'Failed to enqueue job',
  status: 'Failed to get job status',
  metadata: 'Failed to get job metadata',
  cancel: 'Failed to cancel job',
  result: 'Failed to get job result',
};

/**
 * Submits deferred work to a queue backend and reads it back by id.
 *
 * Apart from `connect`, nothing here rejects: every backend failure comes
 * back as an `Err` carrying a message and a reason. Each call is one
 * round trip and the client keeps no job state of its own.
 *
 * @example
 * ```ts
 * const client = await JobQueueClient.connect({ url: 'redis://localhost:6379/0' });
 * const enqueued = await client.enqueue('reports.tasks.build', { args: [2024] });
 * if (enqueued.ok) {
 *   const status = await client.status(enqueued.value);
 * }
 * await client.close();
 * ```
 */
export class JobQueueClient extends EventEmitter<JobQueueClientEvents> {
  private readonly backend: JobBackend;
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;
  private closed = false;

  constructor(backend: JobBackend, options: JobQueueClientOptions = {}) {
    super();
    this.backend = backend;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_JOB_TIMEOUT_MS;
    this.logger = options.logger ?? console;
  }

  /**
   * Resolves the backend address (option, then REDIS_URL, then localhost)
   * and connects. Rejects when no connection can be made.
   */
  static async connect(options: ClientOptions = {}, env: Env = process.env): Promise<JobQueueClient> {
    const config = resolveClientConfig(options, env);
    const backend = await RedisJobBackend.connect(config.url, {
      queueName: config.queueName,
      connectTimeoutMs: config.connectTimeoutMs,
      logger: options.logger,
    });

    return new JobQueueClient(backend, {
      defaultTimeoutMs: config.defaultTimeoutMs,
      logger: options.logger,
    });
  }

  get queueName(): string {
    return this.backend.queueName;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @param functionRef dotted name the worker resolves, e.g. `app.tasks.send_report`
   */
  async enqueue(functionRef: string, options: EnqueueOptions = {}): Promise<Result<JobId>> {
    const enqueued = await this.run('enqueue', async () => {
      if (functionRef.trim() === '') {
        throw new InvalidJobOperationError('function reference is empty');
      }

      const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
      if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        throw new InvalidJobOperationError(`timeout must be a positive integer, got ${timeoutMs}`);
      }
      if (timeoutMs > MAX_JOB_TIMEOUT_MS) {
        throw new InvalidJobOperationError(`timeout must not exceed ${MAX_JOB_TIMEOUT_MS} ms, got ${timeoutMs}`);
      }

      const job = await this.backend.enqueue({
        functionRef,
        args: options.args ?? [],
        kwargs: options.kwargs ?? {},
        timeoutMs,
        description: options.description,
        meta: options.meta ?? {},
      });

      if (job.id.length === 0) {
        return err(`${FAILURE_LABELS.enqueue}: backend returned an empty job id`, 'backend');
      }
      return ok(job.id);
    });

    if (enqueued.ok) {
      this.notify('job:enqueued', () => this.emit('job:enqueued', { jobId: enqueued.value, functionRef }));
    }
    return enqueued;
  }

  async status(jobId: string): Promise<Result<JobStatus>> {
    return this.run('status', async () => {
      const job = await this.backend.fetch(this.requireJobId(jobId));
      return ok(job.status);
    });
  }

  async metadata(jobId: string): Promise<Result<JobMetadata>> {
    return this.run('metadata', async () => {
      const job = await this.backend.fetch(this.requireJobId(jobId));
      return ok(job.meta);
    });
  }

  async cancel(jobId: string): Promise<Result<void>> {
    const canceled = await this.run('cancel', async () => {
      const job = await this.backend.cancel(this.requireJobId(jobId));
      return ok(job.id);
    });
    if (!canceled.ok) return canceled;

    this.notify('job:canceled', () => this.emit('job:canceled', { jobId: canceled.value }));
    return ok(undefined);
  }

  /**
   * Only a `finished` job has a result. Any other status comes back as an
   * `Err` with reason `not_finished` and the status it was seen in.
   */
  async result(jobId: string): Promise<Result<unknown>> {
    return this.run('result', async () => {
      const job = await this.backend.fetch(this.requireJobId(jobId));
      if (job.status === 'finished') {
        return ok(job.result);
      }
      return err(`Job is not finished yet (status: ${job.status})`, 'not_finished', job.status);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.backend.close();
  }

  private requireJobId(raw: string): JobId {
    const parsed = toJobId(raw);
    if (!parsed.ok) {
      throw new InvalidJobIdError(parsed.error);
    }
    return parsed.value;
  }

  private async run<T>(operation: ClientOperation, fn: () => Promise<Result<T>>): Promise<Result<T>> {
    let result: Result<T>;
    if (this.closed) {
      result = err(`${FAILURE_LABELS[operation]}: Client is closed`, 'connection');
    } else {
      try {
        result = await fn();
      } catch (error) {
        result = err(`${FAILURE_LABELS[operation]}: ${describeError(error)}`, reasonOf(error));
      }
    }

    if (!result.ok) {
      if (result.reason === 'not_finished') {
        this.logger.debug(`[JobQueueClient] ${result.error}`);
      } else {
        this.logger.warn(`[JobQueueClient] ${result.error}`);
      }
      const failure: OperationFailure = { operation, error: result.error, reason: result.reason };
      this.notify('operation:failed', () => this.emit('operation:failed', failure));
    }

    return result;
  }

  // Listener errors are logged; they never change an operation's Result
  private notify(event: keyof JobQueueClientEvents, emit: () => void): void {
    try {
      emit();
    } catch (error) {
      this.logger.error(`[JobQueueClient] Listener for ${event} threw: ${describeError(error)}`);
    }
  }
}
