export type SessionId = string;
export type GatewayCallId = string;

export type CallDirection = 'outbound' | 'inbound';

export type SurveyPhase =
  | 'dialing'
  | 'awaiting-answer-recording'
  | 'answer-recorded'
  | 'pipeline-processing'
  | 'question-complete'
  | 'survey-complete'
  | 'failed'
  | 'aborted';

export const TERMINAL_PHASES: ReadonlySet<SurveyPhase> = new Set<SurveyPhase>([
  'survey-complete',
  'failed',
  'aborted',
]);

export function isTerminalPhase(phase: SurveyPhase): boolean {
  return TERMINAL_PHASES.has(phase);
}

export type AnswerKind = 'free-speech' | 'bounded';

export type QuestionPrompt = { kind: 'audio'; uri: string } | { kind: 'text'; text: string };

export interface Question {
  index: number;
  prompt: QuestionPrompt;
  expectedAnswerKind: AnswerKind;
}

export const UNAVAILABLE = 'unavailable' as const;
export type Unavailable = typeof UNAVAILABLE;

export const PIPELINE_STAGES = ['transcribe', 'detect-language', 'translate', 'synthesize'] as const;
export type PipelineStage = (typeof PIPELINE_STAGES)[number];

/**
 * pending: recorded, not yet handed to the pipeline
 * processing: stage chain in flight
 * completed: every stage succeeded
 * skipped: a stage exhausted its retries, remaining fields are unavailable
 * empty: no recording arrived inside the silence window
 */
export type AnswerPipelineStatus = 'pending' | 'processing' | 'completed' | 'skipped' | 'empty';

export interface AnswerRecord {
  questionIndex: number;
  rawRecordingUri: string | Unavailable;
  transcript?: string | Unavailable;
  detectedLanguage?: string | Unavailable;
  translatedTranscript?: string | Unavailable;
  synthesizedAudioUri?: string | Unavailable;
  pipelineStatus: AnswerPipelineStatus;
  failedStage?: PipelineStage;
  failureReason?: string;
  recordedAt: string;
  completedAt?: string;
}

export type AnswerField = 'transcript' | 'detectedLanguage' | 'translatedTranscript' | 'synthesizedAudioUri';

export const STAGE_FIELDS: Record<PipelineStage, AnswerField> = {
  transcribe: 'transcript',
  'detect-language': 'detectedLanguage',
  translate: 'translatedTranscript',
  synthesize: 'synthesizedAudioUri',
};

/** Independent ordering lanes for gateway callbacks. */
export type EventChannel = 'call-status' | 'recording-status' | 'playback-status';

export interface CallSession {
  sessionId: SessionId;
  version: number;
  gatewayCallId?: GatewayCallId;
  direction: CallDirection;
  destination?: string;
  caller?: string;
  participantId?: string;
  questionList: Question[];
  currentQuestionIndex: number;
  phase: SurveyPhase;
  answers: Record<number, AnswerRecord>;
  lastEventSequence: number;
  lastEventAt: Partial<Record<EventChannel, number>>;
  recordingUri?: string;
  recordingActive: boolean;
  /** Sequence number of the last play instruction issued. */
  promptSeq: number;
  promptActive: boolean;
  /** Prompts waiting for the active one to finish; played one at a time. */
  queuedPrompts: QuestionPrompt[];
  retryCount: number;
  failureReason?: string;
  createdAt: string;
  updatedAt: string;
  endedAt?: string;
}

export type CallEndReason =
  | 'completed'
  | 'hangup'
  | 'no-answer'
  | 'busy'
  | 'failed'
  | 'canceled';

export type StageOutcome =
  | { status: 'succeeded'; value: string }
  | { status: 'failed'; reason: string };

export type CallCreated = { type: 'call-created'; gatewayCallId: GatewayCallId };
export type CallAnswered = { type: 'call-answered' };
export type PromptFinished = { type: 'prompt-finished'; promptSeq?: number };
export type RecordingAvailable = {
  type: 'recording-available';
  recordingUri: string;
  questionIndex?: number;
};
export type RecordingTimedOut = { type: 'recording-timed-out'; questionIndex: number };
export type PipelineEnqueued = { type: 'pipeline-enqueued'; questionIndex: number };
export type PipelineStageCompleted = {
  type: 'pipeline-stage-completed';
  questionIndex: number;
  stage: PipelineStage;
  outcome: StageOutcome;
};
export type CallEnded = { type: 'call-ended'; reason: CallEndReason };
export type GatewayFailure = { type: 'gateway-error'; action: string; message: string };
export type OperatorAbort = { type: 'operator-abort'; reason?: string };

export type SurveyEvent =
  | CallCreated
  | CallAnswered
  | PromptFinished
  | RecordingAvailable
  | RecordingTimedOut
  | PipelineEnqueued
  | PipelineStageCompleted
  | CallEnded
  | GatewayFailure
  | OperatorAbort;

export type GatewayAction =
  | { type: 'answer' }
  | { type: 'play'; prompt: QuestionPrompt; promptSeq: number }
  | { type: 'start-recording'; questionIndex: number }
  | { type: 'stop-recording'; questionIndex: number }
  | { type: 'hangup' };

export type Instruction = readonly GatewayAction[];

export interface SessionSnapshot {
  sessionId: SessionId;
  gatewayCallId?: GatewayCallId;
  direction: CallDirection;
  destination?: string;
  phase: SurveyPhase;
  currentQuestionIndex: number;
  totalQuestions: number;
  answers: AnswerRecord[];
  failureReason?: string;
  version: number;
  createdAt: string;
  updatedAt: string;
  endedAt?: string;
}

export function toSnapshot(session: CallSession): SessionSnapshot {
  const answers = Object.values(session.answers).sort((a, b) => a.questionIndex - b.questionIndex);
  return {
    sessionId: session.sessionId,
    gatewayCallId: session.gatewayCallId,
    direction: session.direction,
    destination: session.destination,
    phase: session.phase,
    currentQuestionIndex: session.currentQuestionIndex,
    totalQuestions: session.questionList.length,
    answers: answers.map((answer) => ({ ...answer })),
    failureReason: session.failureReason,
    version: session.version,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    endedAt: session.endedAt,
  };
}

export function cloneSession(session: CallSession): CallSession {
  return structuredClone(session);
}
