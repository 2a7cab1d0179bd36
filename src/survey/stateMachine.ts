import {
  PIPELINE_STAGES,
  STAGE_FIELDS,
  UNAVAILABLE,
  cloneSession,
  isTerminalPhase,
  type AnswerRecord,
  type CallSession,
  type GatewayAction,
  type Instruction,
  type PipelineStageCompleted,
  type QuestionPrompt,
  type SurveyEvent,
  type SurveyPhase,
} from './types';

export interface SurveyScript {
  /** Played ahead of the first question. */
  introPrompt?: QuestionPrompt;
  /** Played once the last answer is processed, before hangup. */
  closingPrompt?: QuestionPrompt;
}

export interface TransitionContext {
  now: string;
  script: SurveyScript;
}

export interface TransitionResult {
  session: CallSession;
  instruction: Instruction;
  changed: boolean;
  /** Phases passed through, in order, including the final one. Empty when unchanged. */
  phases: SurveyPhase[];
  note?: string;
}

const NO_INSTRUCTION: Instruction = [];

function unchanged(session: CallSession, note: string): TransitionResult {
  return { session, instruction: NO_INSTRUCTION, changed: false, phases: [], note };
}

class Draft {
  public readonly next: CallSession;
  public readonly phases: SurveyPhase[] = [];
  public readonly actions: GatewayAction[] = [];

  constructor(
    current: CallSession,
    private readonly ctx: TransitionContext,
  ) {
    this.next = cloneSession(current);
    this.next.updatedAt = ctx.now;
    this.next.lastEventSequence += 1;
  }

  public enter(phase: SurveyPhase): void {
    this.next.phase = phase;
    this.phases.push(phase);
    if (isTerminalPhase(phase)) {
      this.next.endedAt = this.ctx.now;
      this.next.promptActive = false;
      this.next.queuedPrompts = [];
    }
  }

  /** Plays the first prompt now and queues the rest behind it. */
  public play(prompts: QuestionPrompt[]): void {
    const [first, ...rest] = prompts;
    if (!first) {
      return;
    }
    this.next.queuedPrompts = rest;
    this.issue(first);
  }

  public playNextQueued(): boolean {
    const [head, ...rest] = this.next.queuedPrompts;
    if (!head) {
      return false;
    }
    this.next.queuedPrompts = rest;
    this.issue(head);
    return true;
  }

  private issue(prompt: QuestionPrompt): void {
    this.next.promptSeq += 1;
    this.next.promptActive = true;
    this.actions.push({ type: 'play', prompt, promptSeq: this.next.promptSeq });
  }

  public stopRecordingIfActive(): void {
    if (this.next.recordingActive) {
      this.actions.push({ type: 'stop-recording', questionIndex: this.next.currentQuestionIndex });
      this.next.recordingActive = false;
    }
  }

  public result(note?: string): TransitionResult {
    return { session: this.next, instruction: this.actions, changed: true, phases: this.phases, note };
  }
}

function questionPrompt(session: CallSession, index: number): QuestionPrompt | undefined {
  return session.questionList[index]?.prompt;
}

/**
 * Leaves the current question (its answer is terminal) and either asks the
 * next one, plays the closing prompt, or completes the survey.
 */
function advanceAfterAnswer(draft: Draft, ctx: TransitionContext): void {
  const next = draft.next;
  draft.enter('question-complete');
  next.recordingUri = undefined;
  next.currentQuestionIndex = Math.min(next.currentQuestionIndex + 1, next.questionList.length);

  const prompt = questionPrompt(next, next.currentQuestionIndex);
  if (prompt) {
    draft.enter('awaiting-answer-recording');
    draft.play([prompt]);
    return;
  }

  if (ctx.script.closingPrompt) {
    draft.play([ctx.script.closingPrompt]);
    return;
  }

  draft.enter('survey-complete');
  draft.actions.push({ type: 'hangup' });
}

function onCallAnswered(session: CallSession, ctx: TransitionContext): TransitionResult {
  if (session.phase !== 'dialing') {
    return unchanged(session, 'answered_duplicate');
  }

  const draft = new Draft(session, ctx);
  const first = questionPrompt(session, session.currentQuestionIndex);
  if (!first) {
    draft.enter('question-complete');
    if (ctx.script.closingPrompt) {
      draft.play([ctx.script.closingPrompt]);
      return draft.result('empty_question_list');
    }
    draft.enter('survey-complete');
    draft.actions.push({ type: 'hangup' });
    return draft.result('empty_question_list');
  }

  draft.enter('awaiting-answer-recording');
  const prompts = ctx.script.introPrompt ? [ctx.script.introPrompt, first] : [first];
  draft.play(prompts);
  return draft.result();
}

function onPromptFinished(
  session: CallSession,
  event: Extract<SurveyEvent, { type: 'prompt-finished' }>,
  ctx: TransitionContext,
): TransitionResult {
  if (!session.promptActive) {
    return unchanged(session, 'no_prompt_pending');
  }
  if (event.promptSeq !== undefined && event.promptSeq !== session.promptSeq) {
    return unchanged(session, 'prompt_superseded');
  }

  const draft = new Draft(session, ctx);
  draft.next.promptActive = false;
  if (draft.playNextQueued()) {
    return draft.result();
  }

  if (session.phase === 'awaiting-answer-recording' && !session.recordingActive) {
    draft.next.recordingActive = true;
    draft.actions.push({ type: 'start-recording', questionIndex: session.currentQuestionIndex });
    return draft.result();
  }

  if (session.phase === 'question-complete' && session.currentQuestionIndex >= session.questionList.length) {
    draft.enter('survey-complete');
    draft.actions.push({ type: 'hangup' });
  }

  return draft.result();
}

function onRecordingAvailable(
  session: CallSession,
  event: Extract<SurveyEvent, { type: 'recording-available' }>,
  ctx: TransitionContext,
): TransitionResult {
  const index = session.currentQuestionIndex;
  if (session.phase !== 'awaiting-answer-recording') {
    return unchanged(session, 'recording_not_expected');
  }
  if (event.questionIndex !== undefined && event.questionIndex !== index) {
    return unchanged(session, 'recording_for_other_question');
  }
  // A recording saved before this question's record_start belongs to an earlier one.
  if (!session.recordingActive) {
    return unchanged(session, 'recording_not_started');
  }
  if (session.answers[index]) {
    return unchanged(session, 'recording_already_accepted');
  }

  const draft = new Draft(session, ctx);
  draft.enter('answer-recorded');
  draft.next.recordingUri = event.recordingUri;
  draft.next.recordingActive = false;
  draft.next.answers[index] = {
    questionIndex: index,
    rawRecordingUri: event.recordingUri,
    pipelineStatus: 'pending',
    recordedAt: ctx.now,
  };
  return draft.result();
}

function onRecordingTimedOut(
  session: CallSession,
  event: Extract<SurveyEvent, { type: 'recording-timed-out' }>,
  ctx: TransitionContext,
): TransitionResult {
  const index = session.currentQuestionIndex;
  if (session.phase !== 'awaiting-answer-recording' || event.questionIndex !== index || session.answers[index]) {
    return unchanged(session, 'silence_timer_stale');
  }

  const draft = new Draft(session, ctx);
  draft.stopRecordingIfActive();
  draft.next.answers[index] = {
    questionIndex: index,
    rawRecordingUri: UNAVAILABLE,
    transcript: UNAVAILABLE,
    detectedLanguage: UNAVAILABLE,
    translatedTranscript: UNAVAILABLE,
    synthesizedAudioUri: UNAVAILABLE,
    pipelineStatus: 'empty',
    failureReason: 'no_recording',
    recordedAt: ctx.now,
    completedAt: ctx.now,
  };
  advanceAfterAnswer(draft, ctx);
  return draft.result('empty_answer');
}

function onPipelineEnqueued(
  session: CallSession,
  event: Extract<SurveyEvent, { type: 'pipeline-enqueued' }>,
  ctx: TransitionContext,
): TransitionResult {
  const answer = session.answers[event.questionIndex];
  if (
    session.phase !== 'answer-recorded' ||
    event.questionIndex !== session.currentQuestionIndex ||
    !answer ||
    answer.pipelineStatus !== 'pending'
  ) {
    return unchanged(session, 'pipeline_enqueue_stale');
  }

  const draft = new Draft(session, ctx);
  draft.enter('pipeline-processing');
  draft.next.recordingUri = undefined;
  draft.next.answers[event.questionIndex] = { ...answer, pipelineStatus: 'processing' };
  return draft.result();
}

function onStageCompleted(
  session: CallSession,
  event: PipelineStageCompleted,
  ctx: TransitionContext,
): TransitionResult {
  const answer = session.answers[event.questionIndex];
  if (
    session.phase !== 'pipeline-processing' ||
    event.questionIndex !== session.currentQuestionIndex ||
    !answer ||
    answer.pipelineStatus !== 'processing'
  ) {
    return unchanged(session, 'stage_result_discarded');
  }

  const field = STAGE_FIELDS[event.stage];
  if (answer[field] !== undefined) {
    return unchanged(session, 'stage_result_duplicate');
  }

  const stageOrder = PIPELINE_STAGES.indexOf(event.stage);
  const missingEarlier = PIPELINE_STAGES.slice(0, stageOrder).some((stage) => answer[STAGE_FIELDS[stage]] === undefined);
  if (missingEarlier) {
    return unchanged(session, 'stage_result_out_of_order');
  }

  const draft = new Draft(session, ctx);
  const updated: AnswerRecord = { ...answer };

  if (event.outcome.status === 'succeeded') {
    updated[field] = event.outcome.value;
    if (event.stage !== 'synthesize') {
      draft.next.answers[event.questionIndex] = updated;
      return draft.result();
    }
    updated.pipelineStatus = 'completed';
  } else {
    for (const stage of PIPELINE_STAGES.slice(stageOrder)) {
      updated[STAGE_FIELDS[stage]] = UNAVAILABLE;
    }
    updated.pipelineStatus = 'skipped';
    updated.failedStage = event.stage;
    updated.failureReason = event.outcome.reason;
  }

  updated.completedAt = ctx.now;
  draft.next.answers[event.questionIndex] = updated;
  advanceAfterAnswer(draft, ctx);
  return draft.result(updated.pipelineStatus === 'skipped' ? 'answer_skipped' : undefined);
}

function onCallEnded(
  session: CallSession,
  event: Extract<SurveyEvent, { type: 'call-ended' }>,
  ctx: TransitionContext,
): TransitionResult {
  const draft = new Draft(session, ctx);
  if (session.phase === 'question-complete' && session.currentQuestionIndex >= session.questionList.length) {
    draft.enter('survey-complete');
    return draft.result('ended_during_closing');
  }

  draft.stopRecordingIfActive();
  draft.next.failureReason = `call_${event.reason}`;
  draft.enter('failed');
  return draft.result();
}

function onGatewayError(
  session: CallSession,
  event: Extract<SurveyEvent, { type: 'gateway-error' }>,
  ctx: TransitionContext,
): TransitionResult {
  const draft = new Draft(session, ctx);
  draft.stopRecordingIfActive();
  draft.next.failureReason = `gateway_${event.action}: ${event.message}`;
  draft.enter('failed');
  if (session.gatewayCallId) {
    draft.actions.push({ type: 'hangup' });
  }
  return draft.result();
}

function onOperatorAbort(
  session: CallSession,
  event: Extract<SurveyEvent, { type: 'operator-abort' }>,
  ctx: TransitionContext,
): TransitionResult {
  const draft = new Draft(session, ctx);
  draft.stopRecordingIfActive();
  draft.next.failureReason = event.reason ? `aborted: ${event.reason}` : 'aborted';
  draft.enter('aborted');
  if (session.gatewayCallId) {
    draft.actions.push({ type: 'hangup' });
  }
  return draft.result();
}

function onCallCreated(
  session: CallSession,
  event: Extract<SurveyEvent, { type: 'call-created' }>,
  ctx: TransitionContext,
): TransitionResult {
  if (session.gatewayCallId) {
    return unchanged(
      session,
      session.gatewayCallId === event.gatewayCallId ? 'call_id_already_bound' : 'call_id_immutable',
    );
  }

  const draft = new Draft(session, ctx);
  draft.next.gatewayCallId = event.gatewayCallId;
  return draft.result();
}

/**
 * Pure survey transition. Terminal sessions never change; every other
 * combination either returns an updated copy plus the gateway instruction
 * to execute, or the input unchanged with a note saying why.
 */
export function transition(session: CallSession, event: SurveyEvent, ctx: TransitionContext): TransitionResult {
  if (isTerminalPhase(session.phase)) {
    return unchanged(session, 'session_terminal');
  }

  switch (event.type) {
    case 'call-created':
      return onCallCreated(session, event, ctx);
    case 'call-answered':
      return onCallAnswered(session, ctx);
    case 'prompt-finished':
      return onPromptFinished(session, event, ctx);
    case 'recording-available':
      return onRecordingAvailable(session, event, ctx);
    case 'recording-timed-out':
      return onRecordingTimedOut(session, event, ctx);
    case 'pipeline-enqueued':
      return onPipelineEnqueued(session, event, ctx);
    case 'pipeline-stage-completed':
      return onStageCompleted(session, event, ctx);
    case 'call-ended':
      return onCallEnded(session, event, ctx);
    case 'gateway-error':
      return onGatewayError(session, event, ctx);
    case 'operator-abort':
      return onOperatorAbort(session, event, ctx);
    default: {
      const exhaustive: never = event;
      return exhaustive;
    }
  }
}
