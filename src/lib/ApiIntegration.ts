import express, { ErrorRequestHandler, Request, RequestHandler, Response, Router } from 'express';
import { JobQueueClient } from '../core/JobQueueClient';
import { describeError } from '../core/errors';
import { Err, FailureReason } from '../core/result';
import { Logger } from '../core/types';
import { EnqueueRequestSchema, FailureBody } from './types';

/**
 * Options for configuring the API integration
 */
export interface ApiIntegrationOptions {
  /**
   * Request path (defaults to '/jobs')
   */
  requestPath?: string;

  /**
   * Optional middleware to run before every route
   */
  middleware?: RequestHandler[];

  /**
   * Optional function to rewrite positional args before they are enqueued
   */
  transformArgs?: (args: unknown[], functionRef: string) => unknown[];

  /**
   * Where unexpected handler errors are reported (defaults to console)
   */
  logger?: Logger;
}

const REASON_STATUS: Record<FailureReason, number> = {
  invalid_id: 400,
  not_found: 404,
  not_finished: 409,
  invalid_operation: 409,
  connection: 503,
  backend: 502,
};

function sendFailure(res: Response, failure: Err): void {
  const body: FailureBody = { success: false, error: failure.error, reason: failure.reason };
  if (failure.status !== undefined) body.status = failure.status;
  res.status(REASON_STATUS[failure.reason]).json(body);
}

function sendUnexpected(res: Response, logger: Logger, action: string, error: unknown): void {
  logger.error(`[JobApi] Error ${action}:`, describeError(error));
  res.status(500).json({ success: false, error: describeError(error) });
}

function isBodyParseFailure(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Creates Express routes exposing a JobQueueClient over HTTP
 *
 * @param client The client every route delegates to
 * @param options Configuration options
 * @returns Express router with API endpoints
 */
export function createJobApiRoutes(client: JobQueueClient, options: ApiIntegrationOptions = {}): Router {
  const router = express.Router();

  const {
    requestPath = '/jobs',
    middleware = [],
    transformArgs = (args: unknown[]) => args,
    logger = console,
  } = options;

  router.use(express.json());
  if (middleware.length > 0) {
    router.use(middleware);
  }

  router.post(requestPath, async (req: Request, res: Response): Promise<void> => {
    try {
      const parsed = EnqueueRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        const body: FailureBody = {
          success: false,
          error: 'Invalid job request',
          reason: 'validation',
          details: parsed.error.errors,
        };
        res.status(400).json(body);
        return;
      }

      const request = parsed.data;
      const enqueued = await client.enqueue(request.function, {
        args: transformArgs(request.args, request.function),
        kwargs: request.kwargs,
        timeoutMs: request.timeoutMs,
        description: request.description,
        meta: request.meta,
      });
      if (!enqueued.ok) {
        sendFailure(res, enqueued);
        return;
      }

      res.status(201).json({ success: true, jobId: enqueued.value, status: 'queued' });
    } catch (error) {
      sendUnexpected(res, logger, 'adding job to queue', error);
    }
  });

  router.get(`${requestPath}/:id/status`, async (req: Request, res: Response): Promise<void> => {
    try {
      const status = await client.status(req.params.id);
      if (!status.ok) {
        sendFailure(res, status);
        return;
      }
      res.status(200).json({ success: true, jobId: req.params.id, status: status.value });
    } catch (error) {
      sendUnexpected(res, logger, 'getting job status', error);
    }
  });

  router.get(`${requestPath}/:id/meta`, async (req: Request, res: Response): Promise<void> => {
    try {
      const meta = await client.metadata(req.params.id);
      if (!meta.ok) {
        sendFailure(res, meta);
        return;
      }
      res.status(200).json({ success: true, jobId: req.params.id, meta: meta.value });
    } catch (error) {
      sendUnexpected(res, logger, 'getting job metadata', error);
    }
  });

  router.get(`${requestPath}/:id/result`, async (req: Request, res: Response): Promise<void> => {
    try {
      const result = await client.result(req.params.id);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      res.status(200).json({ success: true, jobId: req.params.id, result: result.value ?? null });
    } catch (error) {
      sendUnexpected(res, logger, 'getting job result', error);
    }
  });

  router.post(`${requestPath}/:id/cancel`, async (req: Request, res: Response): Promise<void> => {
    try {
      const canceled = await client.cancel(req.params.id);
      if (!canceled.ok) {
        sendFailure(res, canceled);
        return;
      }
      res.status(200).json({ success: true, jobId: req.params.id, status: 'canceled' });
    } catch (error) {
      sendUnexpected(res, logger, 'canceling job', error);
    }
  });

  // Malformed JSON bodies get the same answer as a failed schema check
  const handleBodyErrors: ErrorRequestHandler = (error, _req, res, next) => {
    if (!isBodyParseFailure(error)) {
      next(error);
      return;
    }
    const body: FailureBody = { success: false, error: 'Invalid JSON body', reason: 'validation' };
    res.status(400).json(body);
  };
  router.use(handleBodyErrors);

  return router;
}
