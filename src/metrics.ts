import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';
import type { PipelineStage, SurveyPhase } from './survey/types';

/**
 * Runtime Prometheus metrics.
 *
 * prom-client Histogram.startTimer() measures seconds; the *_ms histograms
 * here are fed true milliseconds instead.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_survey_runtime_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Answer pipeline stage duration in milliseconds, retries included',
  labelNames: ['stage', 'outcome'] as const,
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000, 120000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Failed stage attempts by stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

const sessionTransitionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}session_transitions_total`,
  help: 'Committed session phase transitions',
  labelNames: ['from', 'to'] as const,
  registers: [register],
});

const droppedEventsTotal = new client.Counter({
  name: `${METRICS_PREFIX}dropped_events_total`,
  help: 'Gateway callbacks and internal events dropped before commit',
  labelNames: ['reason'] as const,
  registers: [register],
});

const casConflictsTotal = new client.Counter({
  name: `${METRICS_PREFIX}cas_conflicts_total`,
  help: 'Session compare-and-swap version conflicts',
  registers: [register],
});

const sessionOutcomesTotal = new client.Counter({
  name: `${METRICS_PREFIX}session_outcomes_total`,
  help: 'Sessions reaching a terminal phase',
  labelNames: ['phase', 'direction'] as const,
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  const routePath =
    route && typeof route === 'object' && 'path' in route && typeof route.path === 'string'
      ? route.path
      : undefined;

  if (routePath) return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

export function observeStageDuration(stage: PipelineStage, outcome: 'succeeded' | 'failed', durationMs: number): void {
  stageDurationMs.observe({ stage, outcome }, durationMs);
}

export function incStageError(stage: PipelineStage): void {
  stageErrorsTotal.inc({ stage });
}

export function recordTransitions(from: SurveyPhase, phases: readonly SurveyPhase[]): void {
  let previous = from;
  for (const phase of phases) {
    sessionTransitionsTotal.inc({ from: previous, to: phase });
    previous = phase;
  }
}

export function incDroppedEvent(reason: string): void {
  const label = reason && reason.trim() !== '' ? reason : 'unknown';
  droppedEventsTotal.inc({ reason: label });
}

export function incCasConflict(): void {
  casConflictsTotal.inc();
}

export function recordSessionOutcome(phase: SurveyPhase, direction: string): void {
  sessionOutcomesTotal.inc({ phase, direction });
}
