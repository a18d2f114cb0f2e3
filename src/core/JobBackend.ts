import { EnqueueData, JobId, JobRecord } from './types';

/**
 * Storage side of the queue. Every method is a single round trip; failures
 * are thrown (usually as a JobQueueError) and translated by the client.
 */
export interface JobBackend {
  readonly queueName: string;
  enqueue(data: EnqueueData): Promise<JobRecord>;
  /**
   * @throws NoSuchJobError when the backend has no record of the id
   */
  fetch(id: JobId): Promise<JobRecord>;
  /**
   * Moves a queued or started job to `canceled`. Jobs already in a terminal
   * state are rejected with InvalidJobOperationError.
   */
  cancel(id: JobId): Promise<JobRecord>;
  close(): Promise<void>;
}
