import { z } from 'zod';
import { MAX_JOB_TIMEOUT_MS } from '../core/config';
import { FailureReason } from '../core/result';

export const EnqueueRequestSchema = z.object({
  function: z.string().trim().min(1),
  args: z.array(z.unknown()).default([]),
  kwargs: z.record(z.unknown()).default({}),
  timeoutMs: z.number().int().positive().max(MAX_JOB_TIMEOUT_MS).optional(),
  description: z.string().optional(),
  meta: z.record(z.unknown()).optional(),
});

export type EnqueueRequest = z.infer<typeof EnqueueRequestSchema>;

export interface FailureBody {
  success: false;
  error: string;
  reason: FailureReason | 'validation';
  status?: string;
  details?: unknown;
}
