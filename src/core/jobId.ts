import { v4 as uuid } from 'uuid';
import { Result, err, ok } from './result';
import { JobId } from './types';

const MAX_JOB_ID_LENGTH = 128;

export function toJobId(raw: string): Result<JobId> {
  if (raw.length === 0) {
    return err('Invalid job id: empty', 'invalid_id');
  }
  if (raw.length > MAX_JOB_ID_LENGTH) {
    return err(`Invalid job id: longer than ${MAX_JOB_ID_LENGTH} characters`, 'invalid_id');
  }
  if (/\s/.test(raw)) {
    return err(`Invalid job id: "${raw}" contains whitespace`, 'invalid_id');
  }
  return ok(raw as JobId);
}

export function newJobId(): JobId {
  return uuid() as JobId;
}
