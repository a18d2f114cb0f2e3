import { JobStatus } from './types';

export type FailureReason =
  | 'invalid_id'
  | 'not_found'
  | 'not_finished'
  | 'invalid_operation'
  | 'connection'
  | 'backend';

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err {
  ok: false;
  error: string;
  reason: FailureReason;
  status?: JobStatus;
}

export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err(error: string, reason: FailureReason, status?: JobStatus): Err {
  return status === undefined ? { ok: false, error, reason } : { ok: false, error, reason, status };
}

export function isOk<T>(result: Result<T>): result is Ok<T> {
  return result.ok;
}

export function isErr<T>(result: Result<T>): result is Err {
  return !result.ok;
}
