// Main classes
export { JobQueueClient } from './core/JobQueueClient';
export { RedisJobBackend } from './core/RedisJobBackend';
export { InMemoryJobBackend } from './core/InMemoryJobBackend';
export { createJobApiRoutes } from './lib/ApiIntegration';

export {
  JobQueueError,
  ConnectionError,
  NoSuchJobError,
  InvalidJobIdError,
  InvalidJobOperationError,
  ConfigurationError,
} from './core/errors';

export { ok, err, isOk, isErr } from './core/result';
export { toJobId } from './core/jobId';
export { JOB_STATUSES, TERMINAL_STATUSES, isJobStatus, isTerminalStatus } from './core/types';
export {
  DEFAULT_REDIS_URL,
  DEFAULT_QUEUE_NAME,
  DEFAULT_JOB_TIMEOUT_MS,
  MAX_JOB_TIMEOUT_MS,
  resolveBackendUrl,
  resolveClientConfig,
  parseBackendUrl,
} from './core/config';

// Types
export type {
  JobId,
  JobStatus,
  JobMetadata,
  JobRecord,
  EnqueueOptions,
  EnqueueData,
  ClientOptions,
  Logger,
} from './core/types';

export type { Result, Ok, Err, FailureReason } from './core/result';
export type { JobBackend } from './core/JobBackend';
export type { RedisBackendOptions } from './core/RedisJobBackend';
export type { InMemoryBackendEvents } from './core/InMemoryJobBackend';
export type {
  JobQueueClientOptions,
  JobQueueClientEvents,
  ClientOperation,
  OperationFailure,
} from './core/JobQueueClient';
export type { Env, ResolvedClientConfig, BackendAddress } from './core/config';
export type { ApiIntegrationOptions } from './lib/ApiIntegration';
export type { EnqueueRequest, FailureBody } from './lib/types';
export { EnqueueRequestSchema } from './lib/types';
