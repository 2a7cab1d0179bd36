import crypto from 'crypto';
import express, { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { log } from '../log';
import type { CreateSessionRequest } from '../survey/orchestrator';
import { buildQuestions, QuestionListSchema } from '../survey/questions';
import type { SessionSnapshot } from '../survey/types';

export interface SurveyOperations {
  createSession(request: CreateSessionRequest): Promise<SessionSnapshot>;
  abortSession(sessionId: string, reason?: string): Promise<SessionSnapshot>;
  getSessionSnapshot(sessionId: string): Promise<SessionSnapshot>;
}

const CreateSurveySchema = z.object({
  destination: z.string().trim().regex(/^\+[1-9]\d{1,14}$/, 'destination must be E.164'),
  questions: QuestionListSchema.min(1).optional(),
  participantId: z.string().trim().min(1).optional(),
});

const AbortSurveySchema = z
  .object({
    reason: z.string().trim().min(1).max(200).optional(),
  })
  .default({});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function tokensMatch(expected: string, presented: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(presented);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

function bearerAuth(token: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!token) {
      next();
      return;
    }
    const header = req.header('authorization') ?? '';
    const presented = header.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : '';
    if (!presented || !tokensMatch(token, presented)) {
      log.warn({ event: 'operator_auth_rejected', path: req.path }, 'operator request unauthorized');
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    next();
  };
}

function validationError(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: 'invalid_request',
    issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}

/** Operator surface: start, inspect and abort survey sessions. */
export function createSurveyRouter(surveys: SurveyOperations, options: { apiToken?: string }): Router {
  const router = Router();
  router.use(express.json({ limit: '256kb' }));
  router.use(bearerAuth(options.apiToken));

  router.post(
    '/',
    asyncRoute(async (req, res) => {
      const parsed = CreateSurveySchema.safeParse(req.body);
      if (!parsed.success) {
        validationError(res, parsed.error);
        return;
      }

      const snapshot = await surveys.createSession({
        destination: parsed.data.destination,
        questions: parsed.data.questions ? buildQuestions(parsed.data.questions) : undefined,
        participantId: parsed.data.participantId,
      });
      res.status(201).json(snapshot);
    }),
  );

  router.get(
    '/:sessionId',
    asyncRoute(async (req, res) => {
      res.status(200).json(await surveys.getSessionSnapshot(req.params.sessionId));
    }),
  );

  router.post(
    '/:sessionId/abort',
    asyncRoute(async (req, res) => {
      const parsed = AbortSurveySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        validationError(res, parsed.error);
        return;
      }
      const snapshot = await surveys.abortSession(req.params.sessionId, parsed.data.reason);
      res.status(200).json(snapshot);
    }),
  );

  return router;
}
