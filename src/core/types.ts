export const JOB_STATUSES = ['queued', 'started', 'finished', 'failed', 'canceled'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_STATUSES: readonly JobStatus[] = ['finished', 'failed', 'canceled'];

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === 'string' && JOB_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Opaque job identifier handed out by the backend at enqueue time.
 * Obtain one through `toJobId` so plain strings can't be passed by accident.
 */
export type JobId = string & { readonly __brand: 'JobId' };

export type JobMetadata = Record<string, unknown>;

export interface JobRecord {
  id: JobId;
  functionRef: string;
  args: unknown[];
  kwargs: Record<string, unknown>;
  status: JobStatus;
  meta: JobMetadata;
  result?: unknown;
  error?: string;
  timeoutMs: number;
  origin: string; // queue name
  description?: string;
  createdAt: number;
  enqueuedAt: number;
  startedAt?: number;
  endedAt?: number;
}

export interface EnqueueOptions {
  args?: unknown[];
  kwargs?: Record<string, unknown>;
  timeoutMs?: number; // default = 1 hour
  description?: string;
  meta?: JobMetadata;
}

/**
 * What the client hands to a backend once defaults are applied
 */
export interface EnqueueData {
  functionRef: string;
  args: unknown[];
  kwargs: Record<string, unknown>;
  timeoutMs: number;
  description?: string;
  meta: JobMetadata;
}

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface ClientOptions {
  /**
   * Backend address, e.g. redis://localhost:6379/0. Falls back to REDIS_URL.
   */
  url?: string;
  queueName?: string;
  defaultTimeoutMs?: number;
  connectTimeoutMs?: number;
  logger?: Logger;
}
