import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { describeError } from './lib/errors';
import { createModuleLogger } from './lib/logger';
import type { RunSummary } from './types';

export type RunJob = (signal?: AbortSignal) => Promise<RunSummary>;

export interface TriggerResponse {
  status: number;
  body: unknown;
}

const log = createModuleLogger('trigger');

/** Runs one audit and maps its outcome to an HTTP answer. */
export async function handleTrigger(runJob: RunJob, signal?: AbortSignal): Promise<TriggerResponse> {
  try {
    const summary = await runJob(signal);
    return { status: summary.status === 'failed' ? 500 : 200, body: summary };
  } catch (error) {
    log.error({ error }, 'Audit run aborted');
    return { status: 500, body: { error: describeError(error) } };
  }
}

export interface TriggerApp {
  app: Express;
  /** Cancels the run in progress, if any. */
  abortActiveRun(reason: string): void;
}

export function createTriggerApp(runJob: RunJob): TriggerApp {
  const app = express();
  let active: AbortController | undefined;

  // Health (no run)
  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // The request body carries nothing the run needs
  app.post('/', (_req, res, next) => {
    const controller = new AbortController();
    active = controller;
    log.info('Audit run triggered');

    handleTrigger(runJob, controller.signal)
      .then((response) => {
        res.status(response.status).json(response.body);
      })
      .finally(() => {
        if (active === controller) active = undefined;
      })
      .catch(next);
  });

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ error: `Route ${req.method} ${req.path} not found` });
  });

  // Global error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    log.error({ error: err, method: req.method, path: req.path }, 'Unhandled error');
    res.status(500).json({ error: err.message });
  });

  return {
    app,
    abortActiveRun: (reason) => active?.abort(new Error(reason)),
  };
}
