import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createHealthRouter, type HealthProbe } from './routes/health';
import { createSurveyRouter, type SurveyOperations } from './routes/surveys';
import { createTelnyxWebhookRouter, type CallbackSink } from './routes/telnyxWebhook';
import { SurveyError } from './survey/errors';
import type { TelnyxVerifyConfig } from './telnyx/telnyxVerify';

export interface ServerDependencies {
  surveys: SurveyOperations & CallbackSink;
  telnyxVerify: TelnyxVerifyConfig;
  operatorApiToken?: string;
  healthProbes: Record<string, HealthProbe>;
  /** Serves stored audio under /audio when set. */
  audioDir?: string;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SurveyError) {
    const level = err.statusCode >= 500 ? 'error' : 'info';
    log[level]({ err, code: err.code, path: req.path }, 'request failed');
    res.status(err.statusCode).json({ error: err.code.toLowerCase(), message: err.message });
    return;
  }
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'invalid_json' });
    return;
  }
  log.error({ err, path: req.path }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function buildServer(deps: ServerDependencies): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/health', createHealthRouter(deps.healthProbes));
  app.use('/v1/telnyx/webhook', createTelnyxWebhookRouter(deps.surveys, deps.telnyxVerify));
  app.use('/v1/surveys', createSurveyRouter(deps.surveys, { apiToken: deps.operatorApiToken }));
  if (deps.audioDir) {
    app.use('/audio', express.static(deps.audioDir, { index: false }));
  }

  app.use(errorHandler);

  const server = http.createServer(app);
  return { app, server };
}
