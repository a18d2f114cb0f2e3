import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Redis from 'ioredis';
import RedisMock from 'ioredis-mock';
import { RedisJobBackend } from './RedisJobBackend';
import { ConnectionError, InvalidJobOperationError, JobQueueError, NoSuchJobError } from './errors';
import { EnqueueData, JobId, Logger } from './types';

const silentLogger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

function enqueueData(overrides: Partial<EnqueueData> = {}): EnqueueData {
  return {
    functionRef: 'app.commands.send_report',
    args: ['weekly', 3],
    kwargs: { notify: true },
    timeoutMs: 3_600_000,
    meta: {},
    ...overrides,
  };
}

describe('RedisJobBackend', () => {
  let redis: Redis;
  let backend: RedisJobBackend;

  beforeEach(async () => {
    redis = new RedisMock();
    await redis.flushall();
    backend = new RedisJobBackend(redis, { queueName: 'reports', logger: silentLogger });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('enqueue', () => {
    it('should store the job hash and push the id onto the queue', async () => {
      const job = await backend.enqueue(enqueueData({ description: 'weekly report' }));

      expect(job.status).toBe('queued');
      expect(job.origin).toBe('reports');

      const hash = await redis.hgetall(`rq:job:${job.id}`);
      expect(hash.status).toBe('queued');
      expect(hash.func_name).toBe('app.commands.send_report');
      expect(hash.args).toBe('["weekly",3]');
      expect(hash.kwargs).toBe('{"notify":true}');
      expect(hash.meta).toBe('{}');
      expect(hash.timeout).toBe('3600000');
      expect(hash.origin).toBe('reports');
      expect(hash.description).toBe('weekly report');
      expect(hash.result).toBeUndefined();

      expect(await redis.lrange('rq:queue:reports', 0, -1)).toEqual([job.id]);
      expect(await redis.smembers('rq:queues')).toEqual(['rq:queue:reports']);
    });

    it('should keep queue order', async () => {
      const first = await backend.enqueue(enqueueData());
      const second = await backend.enqueue(enqueueData());

      expect(await redis.lrange('rq:queue:reports', 0, -1)).toEqual([first.id, second.id]);
    });

    it('should report a transport failure during the transaction as ConnectionError', async () => {
      const reset = Object.assign(new Error('write EPIPE'), { code: 'EPIPE' });
      const transaction = redis.multi();
      vi.spyOn(transaction, 'exec').mockRejectedValueOnce(reset);
      vi.spyOn(redis, 'multi').mockReturnValueOnce(transaction);

      await expect(backend.enqueue(enqueueData())).rejects.toThrow('Redis connection failed: write EPIPE');
      expect(await redis.lrange('rq:queue:reports', 0, -1)).toEqual([]);
    });

    it('should surface a command that failed inside the transaction', async () => {
      const transaction = redis.multi();
      vi.spyOn(transaction, 'exec').mockResolvedValueOnce([
        [null, 1],
        [new Error('WRONGTYPE Operation against a key holding the wrong kind of value'), null],
        [null, 1],
      ]);
      vi.spyOn(redis, 'multi').mockReturnValueOnce(transaction);

      const enqueueing = backend.enqueue(enqueueData());

      await expect(enqueueing).rejects.toThrow(JobQueueError);
      await expect(enqueueing).rejects.not.toThrow(ConnectionError);
      await expect(enqueueing).rejects.toThrow(
        'Redis command failed: WRONGTYPE Operation against a key holding the wrong kind of value',
      );
    });
  });

  describe('fetch', () => {
    it('should read back what was enqueued', async () => {
      const job = await backend.enqueue(enqueueData({ meta: { progress: 0 } }));

      const fetched = await backend.fetch(job.id);

      expect(fetched).toEqual(job);
    });

    it('should see updates written by a worker', async () => {
      const job = await backend.enqueue(enqueueData());
      await redis.hset(`rq:job:${job.id}`, {
        status: 'finished',
        result: '42',
        meta: '{"progress":1}',
        started_at: '1700000000000',
        ended_at: '1700000005000',
      });

      const fetched = await backend.fetch(job.id);

      expect(fetched.status).toBe('finished');
      expect(fetched.result).toBe(42);
      expect(fetched.meta).toEqual({ progress: 1 });
      expect(fetched.startedAt).toBe(1700000000000);
      expect(fetched.endedAt).toBe(1700000005000);
    });

    it('should throw NoSuchJobError for an unknown id', async () => {
      await expect(backend.fetch('0b6a3c52-1111-4222-8333-944455556666' as JobId)).rejects.toThrow(NoSuchJobError);
    });

    it('should reject a stored job with an unknown status', async () => {
      await redis.hset('rq:job:legacy', { status: 'deferred', func_name: 'x' });

      await expect(backend.fetch('legacy' as JobId)).rejects.toThrow('Job legacy has unknown status "deferred"');
    });

    it('should reject malformed JSON fields', async () => {
      await redis.hset('rq:job:broken', { status: 'queued', args: '[1,' });

      await expect(backend.fetch('broken' as JobId)).rejects.toThrow(JobQueueError);
      await expect(backend.fetch('broken' as JobId)).rejects.toThrow(/^Job broken has malformed args: /);
    });

    it('should report transport failures as ConnectionError', async () => {
      const reset = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
      vi.spyOn(redis, 'hgetall').mockRejectedValueOnce(reset);

      await expect(backend.fetch('any' as JobId)).rejects.toThrow(ConnectionError);
    });
  });

  describe('cancel', () => {
    it('should mark the job canceled and remove it from the queue', async () => {
      const kept = await backend.enqueue(enqueueData());
      const job = await backend.enqueue(enqueueData());

      const canceled = await backend.cancel(job.id);

      expect(canceled.status).toBe('canceled');
      expect((await backend.fetch(job.id)).status).toBe('canceled');
      expect(await redis.lrange('rq:queue:reports', 0, -1)).toEqual([kept.id]);
      expect(await redis.zrange('rq:wip:reports:canceled', 0, -1)).toEqual([job.id]);
    });

    it('should reject canceling a finished job', async () => {
      const job = await backend.enqueue(enqueueData());
      await redis.hset(`rq:job:${job.id}`, { status: 'finished', result: 'null' });

      await expect(backend.cancel(job.id)).rejects.toThrow(`Cannot cancel job ${job.id} in status finished`);
    });

    it('should throw NoSuchJobError for an unknown id', async () => {
      await expect(backend.cancel('gone' as JobId)).rejects.toThrow('No such job: gone');
    });

    it('should leave a job finished by a worker after the read untouched', async () => {
      const job = await backend.enqueue(enqueueData());
      const read = backend.fetch.bind(backend);
      vi.spyOn(backend, 'fetch').mockImplementationOnce(async (id) => {
        const snapshot = await read(id);
        await redis.hset(`rq:job:${job.id}`, { status: 'finished', result: '42' });
        return snapshot;
      });

      await expect(backend.cancel(job.id)).rejects.toThrow(InvalidJobOperationError);

      const stored = await backend.fetch(job.id);
      expect(stored.status).toBe('finished');
      expect(stored.result).toBe(42);
      expect(await redis.zrange('rq:wip:reports:canceled', 0, -1)).toEqual([]);
    });

    it('should report a job removed after the read as missing', async () => {
      const job = await backend.enqueue(enqueueData());
      const read = backend.fetch.bind(backend);
      vi.spyOn(backend, 'fetch').mockImplementationOnce(async (id) => {
        const snapshot = await read(id);
        await redis.del(`rq:job:${job.id}`);
        return snapshot;
      });

      await expect(backend.cancel(job.id)).rejects.toThrow(`No such job: ${job.id}`);
    });
  });

  describe('close', () => {
    it('should quit the connection once', async () => {
      const quit = vi.spyOn(redis, 'quit');

      await backend.close();
      await backend.close();

      expect(quit).toHaveBeenCalledTimes(1);
    });
  });
});
