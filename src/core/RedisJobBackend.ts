import Redis, { ChainableCommander } from 'ioredis';
import { DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_QUEUE_NAME, parseBackendUrl } from './config';
import { ConnectionError, InvalidJobOperationError, JobQueueError, NoSuchJobError, describeError } from './errors';
import { JobBackend } from './JobBackend';
import { newJobId } from './jobId';
import { EnqueueData, JobId, JobRecord, Logger, isJobStatus, isTerminalStatus } from './types';

const KEY_PREFIX = 'rq:';
const QUEUES_KEY = `${KEY_PREFIX}queues`;

export interface RedisBackendOptions {
  queueName?: string;
  connectTimeoutMs?: number;
  logger?: Logger;
}

// Status check and cancel writes, applied atomically. Returns '' for a
// missing job, the status for a terminal one, otherwise 'canceled'.
const CANCEL_SCRIPT = `
local status = redis.call('HGET', KEYS[1], 'status')
if not status then
  return ''
end
if status == 'finished' or status == 'failed' or status == 'canceled' then
  return status
end
redis.call('LREM', KEYS[2], 0, ARGV[1])
redis.call('HSET', KEYS[1], 'status', 'canceled', 'ended_at', ARGV[2])
redis.call('ZADD', KEYS[3], ARGV[2], ARGV[1])
return 'canceled'
`;

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND']);

function isConnectionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'MaxRetriesPerRequestError' || error.message === 'Connection is closed.') return true;
  return 'code' in error && typeof error.code === 'string' && CONNECTION_ERROR_CODES.has(error.code);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Job storage on Redis.
 *
 * Each job is a hash under `rq:job:<id>`; queued ids sit in the
 * `rq:queue:<name>` list in FIFO order and canceled ones are recorded in
 * the `rq:wip:<name>:canceled` sorted set, scored by cancel time.
 */
export class RedisJobBackend implements JobBackend {
  readonly queueName: string;
  private readonly redis: Redis;
  private readonly logger: Logger;
  private closed = false;

  constructor(redis: Redis, options: RedisBackendOptions = {}) {
    this.redis = redis;
    this.queueName = options.queueName ?? DEFAULT_QUEUE_NAME;
    this.logger = options.logger ?? console;
  }

  /**
   * Opens a connection and checks it with a PING before handing the backend out
   *
   * @throws ConfigurationError for an unusable URL
   * @throws ConnectionError when the server can't be reached
   */
  static async connect(url: string, options: RedisBackendOptions = {}): Promise<RedisJobBackend> {
    const address = parseBackendUrl(url);
    const logger = options.logger ?? console;

    const redis = new Redis({
      host: address.host,
      port: address.port,
      db: address.db,
      username: address.username,
      password: address.password,
      tls: address.tls ? {} : undefined,
      lazyConnect: true,
      connectTimeout: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      maxRetriesPerRequest: 1,
    });

    // ioredis reports the socket error here and rejects connect() with a generic message
    let lastError: Error | undefined;
    redis.on('error', (error: Error) => {
      lastError = error;
      logger.error('[RedisJobBackend] Connection error:', error.message);
    });

    try {
      await redis.connect();
      await redis.ping();
    } catch (error) {
      redis.disconnect();
      const detail = lastError ? lastError.message : describeError(error);
      throw new ConnectionError(`Failed to connect to Redis: ${detail}`, { cause: lastError ?? error });
    }

    logger.info(`[RedisJobBackend] Connected to ${address.host}:${address.port}/${address.db}`);
    return new RedisJobBackend(redis, options);
  }

  private jobKey(id: string): string {
    return `${KEY_PREFIX}job:${id}`;
  }

  private queueKey(name: string = this.queueName): string {
    return `${KEY_PREFIX}queue:${name}`;
  }

  private canceledKey(name: string): string {
    return `${KEY_PREFIX}wip:${name}:canceled`;
  }

  async enqueue(data: EnqueueData): Promise<JobRecord> {
    const now = Date.now();
    const job: JobRecord = {
      id: newJobId(),
      functionRef: data.functionRef,
      args: data.args,
      kwargs: data.kwargs,
      status: 'queued',
      meta: data.meta,
      timeoutMs: data.timeoutMs,
      origin: this.queueName,
      description: data.description,
      createdAt: now,
      enqueuedAt: now,
    };

    // Store the hash and push the id onto its queue together
    await this.execute(
      this.redis
        .multi()
        .hset(this.jobKey(job.id), this.serializeJob(job))
        .rpush(this.queueKey(), job.id)
        .sadd(QUEUES_KEY, this.queueKey()),
    );

    this.logger.debug(`[RedisJobBackend] Enqueued ${job.functionRef} as ${job.id} on ${this.queueName}`);
    return job;
  }

  async fetch(id: JobId): Promise<JobRecord> {
    const hash = await this.call(() => this.redis.hgetall(this.jobKey(id)));
    if (Object.keys(hash).length === 0) {
      throw new NoSuchJobError(id);
    }
    return this.deserializeJob(id, hash);
  }

  async cancel(id: JobId): Promise<JobRecord> {
    // Read first for the origin queue and the record we hand back
    const job = await this.fetch(id);
    if (isTerminalStatus(job.status)) {
      throw new InvalidJobOperationError(`Cannot cancel job ${id} in status ${job.status}`);
    }

    const endedAt = Date.now();
    const outcome = await this.call(() =>
      this.redis.eval(
        CANCEL_SCRIPT,
        3,
        this.jobKey(id),
        this.queueKey(job.origin),
        this.canceledKey(job.origin),
        id,
        String(endedAt),
      ),
    );

    // The job may have moved on since the read
    if (outcome === '') {
      throw new NoSuchJobError(id);
    }
    if (outcome !== 'canceled') {
      throw new InvalidJobOperationError(`Cannot cancel job ${id} in status ${String(outcome)}`);
    }

    this.logger.debug(`[RedisJobBackend] Canceled ${id} on ${job.origin}`);
    return { ...job, status: 'canceled', endedAt };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.redis.quit();
  }

  /**
   * Transport failures become ConnectionError; anything else passes through.
   */
  private async call<T>(command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      if (isConnectionFailure(error)) {
        throw new ConnectionError(`Redis connection failed: ${describeError(error)}`, { cause: error });
      }
      throw error;
    }
  }

  private async execute(transaction: ChainableCommander): Promise<void> {
    const results = await this.call(() => transaction.exec());
    if (results === null) {
      throw new JobQueueError('Redis transaction was discarded');
    }
    // A failed command inside MULTI doesn't reject exec(); surface the first one
    for (const [error] of results) {
      if (error) throw new JobQueueError(`Redis command failed: ${error.message}`, 'backend', { cause: error });
    }
  }

  private serializeJob(job: JobRecord): Record<string, string> {
    const hash: Record<string, string> = {
      status: job.status,
      func_name: job.functionRef,
      args: JSON.stringify(job.args),
      kwargs: JSON.stringify(job.kwargs),
      meta: JSON.stringify(job.meta),
      timeout: String(job.timeoutMs),
      origin: job.origin,
      created_at: String(job.createdAt),
      enqueued_at: String(job.enqueuedAt),
    };

    if (job.description !== undefined) hash.description = job.description;
    if (job.result !== undefined) hash.result = JSON.stringify(job.result);
    if (job.error !== undefined) hash.exc_info = job.error;
    if (job.startedAt !== undefined) hash.started_at = String(job.startedAt);
    if (job.endedAt !== undefined) hash.ended_at = String(job.endedAt);

    return hash;
  }

  private deserializeJob(id: JobId, hash: Record<string, string>): JobRecord {
    const status = hash.status;
    if (!isJobStatus(status)) {
      throw new JobQueueError(`Job ${id} has unknown status "${status ?? ''}"`);
    }

    const args = this.parseField(id, hash, 'args', []);
    const kwargs = this.parseField(id, hash, 'kwargs', {});
    const meta = this.parseField(id, hash, 'meta', {});
    if (!Array.isArray(args) || !isRecord(kwargs) || !isRecord(meta)) {
      throw new JobQueueError(`Job ${id} has malformed data`);
    }

    const job: JobRecord = {
      id,
      functionRef: hash.func_name ?? '',
      args,
      kwargs,
      status,
      meta,
      timeoutMs: Number(hash.timeout),
      origin: hash.origin ?? this.queueName,
      description: hash.description,
      createdAt: Number(hash.created_at),
      enqueuedAt: Number(hash.enqueued_at),
    };

    if (hash.result !== undefined) job.result = this.parseField(id, hash, 'result', null);
    if (hash.exc_info !== undefined) job.error = hash.exc_info;
    if (hash.started_at !== undefined) job.startedAt = Number(hash.started_at);
    if (hash.ended_at !== undefined) job.endedAt = Number(hash.ended_at);

    return job;
  }

  private parseField(id: JobId, hash: Record<string, string>, field: string, fallback: unknown): unknown {
    const raw = hash[field];
    if (raw === undefined) return fallback;
    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new JobQueueError(`Job ${id} has malformed ${field}: ${describeError(error)}`, 'backend', { cause: error });
    }
  }
}
