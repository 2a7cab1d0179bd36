import { z } from 'zod';
import { PIPELINE_STAGES, UNAVAILABLE, type CallSession } from './types';

const PromptSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('audio'), uri: z.string().min(1) }),
  z.object({ kind: z.literal('text'), text: z.string().min(1) }),
]);

export const QuestionSchema = z.object({
  index: z.number().int().nonnegative(),
  prompt: PromptSchema,
  expectedAnswerKind: z.enum(['free-speech', 'bounded']),
});

const FieldSchema = z.union([z.literal(UNAVAILABLE), z.string()]);

const AnswerRecordSchema = z.object({
  questionIndex: z.number().int().nonnegative(),
  rawRecordingUri: FieldSchema,
  transcript: FieldSchema.optional(),
  detectedLanguage: FieldSchema.optional(),
  translatedTranscript: FieldSchema.optional(),
  synthesizedAudioUri: FieldSchema.optional(),
  pipelineStatus: z.enum(['pending', 'processing', 'completed', 'skipped', 'empty']),
  failedStage: z.enum(PIPELINE_STAGES).optional(),
  failureReason: z.string().optional(),
  recordedAt: z.string(),
  completedAt: z.string().optional(),
});

export const CallSessionSchema = z.object({
  sessionId: z.string().min(1),
  version: z.number().int().nonnegative(),
  gatewayCallId: z.string().min(1).optional(),
  direction: z.enum(['outbound', 'inbound']),
  destination: z.string().optional(),
  caller: z.string().optional(),
  participantId: z.string().optional(),
  questionList: z.array(QuestionSchema),
  currentQuestionIndex: z.number().int().nonnegative(),
  phase: z.enum([
    'dialing',
    'awaiting-answer-recording',
    'answer-recorded',
    'pipeline-processing',
    'question-complete',
    'survey-complete',
    'failed',
    'aborted',
  ]),
  answers: z.record(z.string(), AnswerRecordSchema),
  lastEventSequence: z.number().int().nonnegative(),
  lastEventAt: z.object({
    'call-status': z.number().optional(),
    'recording-status': z.number().optional(),
    'playback-status': z.number().optional(),
  }),
  recordingUri: z.string().optional(),
  recordingActive: z.boolean(),
  promptSeq: z.number().int().nonnegative(),
  promptActive: z.boolean(),
  queuedPrompts: z.array(PromptSchema),
  retryCount: z.number().int().nonnegative(),
  failureReason: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  endedAt: z.string().optional(),
});

export function parseSessionRecord(raw: string): CallSession {
  const result = CallSessionSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid session record: ${issues}`);
  }
  return result.data;
}
