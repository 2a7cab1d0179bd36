import { randomUUID } from 'crypto';
import type { GatewayCallback, TelephonyGateway } from '../gateway/types';
import { log } from '../log';
import { incCasConflict, incDroppedEvent, recordSessionOutcome, recordTransitions } from '../metrics';
import { nextPendingStage, type AudioPipeline } from '../pipeline/audioPipeline';
import { RetryExhaustedError, retry, withTimeout, type RetryPolicy } from '../retry';
import { CallbackCorrelator, toSurveyEvent } from './correlator';
import {
  ContentionError,
  DuplicateGatewayCallIdError,
  DuplicateSessionError,
  NotFoundError,
  StageTimeoutError,
  UnknownCallIdError,
  VersionConflictError,
  describeError,
} from './errors';
import type { SessionStore } from './sessionStore';
import { transition, type SurveyScript, type TransitionResult } from './stateMachine';
import {
  isTerminalPhase,
  toSnapshot,
  type CallDirection,
  type CallSession,
  type GatewayAction,
  type GatewayCallId,
  type PipelineStageCompleted,
  type Question,
  type SessionId,
  type SessionSnapshot,
  type SurveyEvent,
} from './types';
import { WorkQueue } from './workQueue';

export interface SurveyOrchestratorOptions {
  store: SessionStore;
  gateway: TelephonyGateway;
  pipeline: AudioPipeline;
  script: SurveyScript;
  /** Used for inbound calls and for requests that bring no questions. */
  defaultQuestions: Question[];
  workerConcurrency: number;
  casPolicy: RetryPolicy;
  gatewayTimeoutMs: number;
  /** Unset disables the empty-answer policy. */
  silenceTimeoutMs?: number;
  now?: () => Date;
  newSessionId?: () => SessionId;
  sleep?: (ms: number) => Promise<void>;
}

export interface CreateSessionRequest {
  destination: string;
  questions?: Question[];
  participantId?: string;
}

export type CallbackOutcome =
  | { status: 'applied'; sessionId: SessionId; phase: CallSession['phase'] }
  | { status: 'created'; sessionId: SessionId }
  | { status: 'dropped'; reason: string; sessionId?: SessionId }
  | { status: 'error'; message: string };

export type SessionListener = (session: CallSession) => Promise<void> | void;

type Decision = { kind: 'commit'; result: TransitionResult } | { kind: 'skip'; reason: string };

type CommitResult =
  | { committed: true; before: CallSession; session: CallSession; result: TransitionResult }
  | { committed: false; session: CallSession; reason: string };

function logContext(session: CallSession): Record<string, unknown> {
  return {
    session_id: session.sessionId,
    gateway_call_id: session.gatewayCallId,
    direction: session.direction,
  };
}

/**
 * Composition point of the survey engine: gateway callbacks and pipeline
 * completions go through one worker pool, are resolved by the correlator,
 * transitioned by the state machine and committed with compare-and-swap.
 * Gateway instructions and pipeline work run only after a commit succeeds.
 */
export class SurveyOrchestrator {
  private readonly store: SessionStore;
  private readonly gateway: TelephonyGateway;
  private readonly pipeline: AudioPipeline;
  private readonly correlator: CallbackCorrelator;
  private readonly queue: WorkQueue;
  private readonly now: () => Date;
  private readonly newSessionId: () => SessionId;
  private readonly silenceTimers = new Map<SessionId, NodeJS.Timeout>();
  private readonly background = new Set<Promise<void>>();
  private readonly terminalListeners: SessionListener[] = [];

  constructor(private readonly options: SurveyOrchestratorOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.pipeline = options.pipeline;
    this.correlator = new CallbackCorrelator(options.store);
    this.queue = new WorkQueue({ concurrency: options.workerConcurrency });
    this.now = options.now ?? (() => new Date());
    this.newSessionId = options.newSessionId ?? randomUUID;
  }

  public onSessionTerminal(listener: SessionListener): void {
    this.terminalListeners.push(listener);
  }

  public async createSession(request: CreateSessionRequest): Promise<SessionSnapshot> {
    const session = this.buildSession({
      direction: 'outbound',
      destination: request.destination,
      questions: request.questions ?? this.options.defaultQuestions,
      participantId: request.participantId,
    });
    const created = await this.store.create(session);
    log.info(
      { event: 'session_created', ...logContext(created), questions: created.questionList.length },
      'survey session created',
    );

    let event: SurveyEvent;
    let placedCallId: GatewayCallId | undefined;
    const dial = this.gateway.placeCall({ sessionId: created.sessionId, destination: request.destination });
    try {
      const placed = await withTimeout(() => dial, this.options.gatewayTimeoutMs, 'gateway placeCall');
      placedCallId = placed.gatewayCallId;
      event = { type: 'call-created', gatewayCallId: placed.gatewayCallId };
    } catch (error) {
      log.warn({ event: 'place_call_failed', ...logContext(created), err: error }, 'place call failed');
      if (error instanceof StageTimeoutError) {
        this.track(
          dial.then(
            (late) => this.hangUpOrphan(created.sessionId, late.gatewayCallId, 'dial_timed_out'),
            (lateError: unknown) => {
              log.info({ event: 'late_dial_failed', ...logContext(created), err: lateError }, 'timed-out dial failed');
            },
          ),
        );
      }
      event = { type: 'gateway-error', action: 'place-call', message: describeError(error) };
    }

    const outcome = await this.queue.push('call_created', () => this.applyInternal(created.sessionId, event));
    if (placedCallId !== undefined && outcome.session.gatewayCallId !== placedCallId) {
      await this.hangUpOrphan(created.sessionId, placedCallId, outcome.committed ? 'call_id_mismatch' : outcome.reason);
    }
    return toSnapshot(outcome.session);
  }

  public async abortSession(sessionId: SessionId, reason?: string): Promise<SessionSnapshot> {
    const outcome = await this.queue.push('operator_abort', () =>
      this.applyInternal(sessionId, { type: 'operator-abort', reason }),
    );
    if (!outcome.committed) {
      log.info({ event: 'abort_ignored', session_id: sessionId, reason: outcome.reason }, 'abort ignored');
    }
    return toSnapshot(outcome.session);
  }

  public async getSessionSnapshot(sessionId: SessionId): Promise<SessionSnapshot> {
    return toSnapshot(await this.store.get(sessionId));
  }

  /** Queues a callback; never rejects. */
  public handleGatewayCallback(callback: GatewayCallback): Promise<CallbackOutcome> {
    return this.queue
      .push(`callback_${callback.channel}`, () => this.processGatewayCallback(callback))
      .catch((error: unknown): CallbackOutcome => {
        log.error(
          { event: 'gateway_callback_failed', gateway_call_id: callback.gatewayCallId, err: error },
          'gateway callback failed',
        );
        return { status: 'error', message: describeError(error) };
      });
  }

  public async processGatewayCallback(callback: GatewayCallback): Promise<CallbackOutcome> {
    let session: CallSession;
    try {
      session = await this.correlator.resolve(callback);
    } catch (error) {
      if (!(error instanceof UnknownCallIdError)) {
        throw error;
      }
      if (callback.channel === 'call-status' && callback.status === 'initiated' && callback.direction === 'inbound') {
        return this.acceptInbound(callback);
      }
      incDroppedEvent('unknown_call_id');
      log.info(
        { event: 'callback_dropped', reason: 'unknown_call_id', gateway_call_id: callback.gatewayCallId, channel: callback.channel },
        'callback for unknown call dropped',
      );
      return { status: 'dropped', reason: 'unknown_call_id' };
    }

    const event = toSurveyEvent(callback);
    const outcome = await this.commit(session.sessionId, session, (current) => {
      if (current.gatewayCallId && current.gatewayCallId !== callback.gatewayCallId) {
        return { kind: 'skip', reason: 'call_id_mismatch' };
      }
      const admission = this.correlator.admit(current, callback);
      if (!admission.accepted) {
        return { kind: 'skip', reason: admission.reason };
      }
      const result = transition(current, event, this.transitionContext());
      if (!result.changed) {
        return { kind: 'skip', reason: result.note ?? 'no_change' };
      }
      return { kind: 'commit', result: { ...result, session: this.correlator.markApplied(result.session, callback) } };
    });

    if (!outcome.committed) {
      incDroppedEvent(outcome.reason);
      log.info(
        { event: 'callback_dropped', reason: outcome.reason, channel: callback.channel, ...logContext(outcome.session) },
        'callback dropped',
      );
      return { status: 'dropped', reason: outcome.reason, sessionId: outcome.session.sessionId };
    }

    await this.afterCommit(outcome.before, outcome.session, outcome.result);
    return { status: 'applied', sessionId: outcome.session.sessionId, phase: outcome.session.phase };
  }

  /** Resolves once no queued work or pipeline run is left. Pending silence timers do not count. */
  public async whenIdle(): Promise<void> {
    for (;;) {
      await this.queue.whenIdle();
      if (this.background.size === 0) {
        return;
      }
      await Promise.allSettled([...this.background]);
    }
  }

  public async shutdown(): Promise<void> {
    for (const timer of this.silenceTimers.values()) {
      clearTimeout(timer);
    }
    this.silenceTimers.clear();
    await this.whenIdle();
    await this.queue.close();
  }

  private transitionContext(): { now: string; script: SurveyScript } {
    return { now: this.now().toISOString(), script: this.options.script };
  }

  private buildSession(init: {
    direction: CallDirection;
    questions: Question[];
    destination?: string;
    caller?: string;
    participantId?: string;
    gatewayCallId?: GatewayCallId;
  }): CallSession {
    const now = this.now().toISOString();
    return {
      sessionId: this.newSessionId(),
      version: 0,
      gatewayCallId: init.gatewayCallId,
      direction: init.direction,
      destination: init.destination,
      caller: init.caller,
      participantId: init.participantId,
      questionList: init.questions.map((question, index) => ({ ...question, index })),
      currentQuestionIndex: 0,
      phase: 'dialing',
      answers: {},
      lastEventSequence: 0,
      lastEventAt: {},
      recordingActive: false,
      promptSeq: 0,
      promptActive: false,
      queuedPrompts: [],
      retryCount: 0,
      createdAt: now,
      updatedAt: now,
    };
  }

  private async acceptInbound(
    callback: Extract<GatewayCallback, { channel: 'call-status'; status: 'initiated' }>,
  ): Promise<CallbackOutcome> {
    const draft = this.buildSession({
      direction: 'inbound',
      questions: this.options.defaultQuestions,
      caller: callback.from,
      destination: callback.to,
      gatewayCallId: callback.gatewayCallId,
    });
    draft.lastEventAt = { 'call-status': callback.timestamp };

    let created: CallSession;
    try {
      created = await this.store.create(draft);
    } catch (error) {
      if (error instanceof DuplicateGatewayCallIdError || error instanceof DuplicateSessionError) {
        const existing = await this.store.getByGatewayCallId(callback.gatewayCallId);
        incDroppedEvent('duplicate');
        return { status: 'dropped', reason: 'duplicate', sessionId: existing.sessionId };
      }
      throw error;
    }

    log.info({ event: 'inbound_session_created', ...logContext(created), from: callback.from }, 'inbound survey session created');
    await this.executeInstruction(created, [{ type: 'answer' }]);
    return { status: 'created', sessionId: created.sessionId };
  }

  private async applyInternal(sessionId: SessionId, event: SurveyEvent): Promise<CommitResult> {
    const outcome = await this.commit(sessionId, undefined, (current) => {
      const result = transition(current, event, this.transitionContext());
      return result.changed ? { kind: 'commit', result } : { kind: 'skip', reason: result.note ?? 'no_change' };
    });

    if (outcome.committed) {
      await this.afterCommit(outcome.before, outcome.session, outcome.result);
    } else {
      log.debug(
        { event: 'internal_event_skipped', survey_event: event.type, reason: outcome.reason, ...logContext(outcome.session) },
        'internal event skipped',
      );
    }
    return outcome;
  }

  /**
   * Read, decide, compare-and-swap; on a version conflict the record is read
   * again and the decision recomputed, within the CAS retry policy.
   */
  private async commit(
    sessionId: SessionId,
    initial: CallSession | undefined,
    decide: (current: CallSession) => Decision,
  ): Promise<CommitResult> {
    try {
      const { value } = await retry<CommitResult>(
        async (attempt) => {
          const current = attempt === 1 && initial ? initial : await this.store.get(sessionId);
          const decision = decide(current);
          if (decision.kind === 'skip') {
            return { committed: false, session: current, reason: decision.reason };
          }

          const next: CallSession = { ...decision.result.session, retryCount: attempt - 1 };
          const stored = await this.store.compareAndSwap(sessionId, current.version, next);
          return { committed: true, before: current, session: stored, result: decision.result };
        },
        this.options.casPolicy,
        {
          label: `session ${sessionId} commit`,
          sleep: this.options.sleep,
          shouldRetry: (error) => error instanceof VersionConflictError,
          onRetry: ({ attempt }) => {
            incCasConflict();
            log.debug({ event: 'session_cas_conflict', session_id: sessionId, attempt }, 'session version conflict');
          },
        },
      );
      return value;
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        incCasConflict();
        log.warn({ event: 'session_contention', session_id: sessionId, attempts: error.attempts }, 'session contended');
        throw new ContentionError(sessionId, error.attempts);
      }
      throw error;
    }
  }

  private async afterCommit(before: CallSession, session: CallSession, result: TransitionResult): Promise<void> {
    if (result.phases.length > 0) {
      recordTransitions(before.phase, result.phases);
      log.info(
        {
          event: 'session_transition',
          ...logContext(session),
          from: before.phase,
          to: session.phase,
          question_index: session.currentQuestionIndex,
          note: result.note,
        },
        'survey session transition',
      );
    }

    if (session.phase !== 'awaiting-answer-recording') {
      this.clearSilenceTimer(session.sessionId);
    }

    await this.executeInstruction(session, result.instruction);

    if (isTerminalPhase(session.phase)) {
      await this.notifyTerminal(session);
      return;
    }

    if (session.phase === 'answer-recorded') {
      await this.applyInternal(session.sessionId, {
        type: 'pipeline-enqueued',
        questionIndex: session.currentQuestionIndex,
      });
      return;
    }

    if (session.phase === 'pipeline-processing' && before.phase !== 'pipeline-processing') {
      this.track(this.drivePipeline(session.sessionId, session.currentQuestionIndex));
    }
  }

  private async executeInstruction(session: CallSession, instruction: readonly GatewayAction[]): Promise<void> {
    if (instruction.length === 0) {
      return;
    }
    const callId = session.gatewayCallId;
    if (!callId) {
      log.debug({ event: 'instruction_skipped_no_call', ...logContext(session) }, 'no gateway call to instruct');
      return;
    }

    for (const action of instruction) {
      try {
        await withTimeout(
          () => this.executeAction(callId, session, action),
          this.options.gatewayTimeoutMs,
          `gateway ${action.type}`,
        );
      } catch (error) {
        const cleanup = action.type === 'hangup' || action.type === 'stop-recording';
        log.warn(
          { event: 'gateway_action_failed', action: action.type, cleanup, ...logContext(session), err: error },
          'gateway action failed',
        );
        if (cleanup) {
          continue;
        }
        if (!isTerminalPhase(session.phase)) {
          await this.applyInternal(session.sessionId, {
            type: 'gateway-error',
            action: action.type,
            message: describeError(error),
          });
        }
        return;
      }
    }
  }

  private async executeAction(callId: GatewayCallId, session: CallSession, action: GatewayAction): Promise<void> {
    const sessionId = session.sessionId;
    switch (action.type) {
      case 'answer':
        await this.gateway.answerCall(callId, { sessionId });
        return;
      case 'play':
        await this.gateway.playAudio(callId, action.prompt, { sessionId, promptSeq: action.promptSeq });
        return;
      case 'start-recording':
        await this.gateway.startRecording(callId, { sessionId, questionIndex: action.questionIndex });
        this.armSilenceTimer(sessionId, action.questionIndex);
        return;
      case 'stop-recording':
        await this.gateway.stopRecording(callId, { sessionId, questionIndex: action.questionIndex });
        return;
      case 'hangup':
        await this.gateway.endCall(callId, { sessionId });
        return;
    }
  }

  private async drivePipeline(sessionId: SessionId, questionIndex: number): Promise<void> {
    for (;;) {
      const session = await this.store.get(sessionId);
      const answer = session.answers[questionIndex];
      if (
        session.phase !== 'pipeline-processing' ||
        session.currentQuestionIndex !== questionIndex ||
        !answer ||
        answer.pipelineStatus !== 'processing'
      ) {
        log.debug({ event: 'pipeline_stopped', ...logContext(session), question_index: questionIndex }, 'pipeline stopped');
        return;
      }

      const stage = nextPendingStage(answer);
      if (!stage) {
        return;
      }

      const outcome = await this.pipeline.runStage({ sessionId, questionIndex, stage }, answer);
      const committed = await this.commitStageResult(sessionId, {
        type: 'pipeline-stage-completed',
        questionIndex,
        stage,
        outcome,
      });

      if (!committed.committed) {
        incDroppedEvent(committed.reason);
        log.info(
          { event: 'stage_result_discarded', ...logContext(committed.session), stage, reason: committed.reason },
          'stage result discarded',
        );
        return;
      }
      if (outcome.status === 'failed' || stage === 'synthesize') {
        return;
      }
    }
  }

  /** A contended result is queued again after a backoff; the stage itself is not rerun. */
  private async commitStageResult(sessionId: SessionId, event: PipelineStageCompleted): Promise<CommitResult> {
    const { value } = await retry(
      () => this.queue.push(`stage_${event.stage}`, () => this.applyInternal(sessionId, event)),
      this.options.casPolicy,
      {
        label: `session ${sessionId} ${event.stage} result`,
        sleep: this.options.sleep,
        shouldRetry: (error) => error instanceof ContentionError,
        onRetry: ({ attempt, waitMs }) => {
          log.warn(
            { event: 'stage_result_requeued', session_id: sessionId, stage: event.stage, attempt, wait_ms: waitMs },
            'stage result requeued after contention',
          );
        },
      },
    );
    return value;
  }

  /** Ends a placed call that no live session owns. */
  private async hangUpOrphan(sessionId: SessionId, callId: GatewayCallId, reason: string): Promise<void> {
    log.warn(
      { event: 'orphan_call_hangup', session_id: sessionId, gateway_call_id: callId, reason },
      'hanging up call without a live session',
    );
    try {
      await withTimeout(
        () => this.gateway.endCall(callId, { sessionId }),
        this.options.gatewayTimeoutMs,
        'gateway hangup',
      );
    } catch (error) {
      log.warn(
        { event: 'orphan_call_hangup_failed', session_id: sessionId, gateway_call_id: callId, err: error },
        'orphan call hangup failed',
      );
    }
  }

  private armSilenceTimer(sessionId: SessionId, questionIndex: number): void {
    const timeoutMs = this.options.silenceTimeoutMs;
    if (timeoutMs === undefined) {
      return;
    }
    this.clearSilenceTimer(sessionId);
    const timer = setTimeout(() => {
      this.silenceTimers.delete(sessionId);
      this.track(
        this.queue
          .push('recording_timed_out', () => this.applyInternal(sessionId, { type: 'recording-timed-out', questionIndex }))
          .then(() => undefined),
      );
    }, timeoutMs);
    timer.unref?.();
    this.silenceTimers.set(sessionId, timer);
  }

  private clearSilenceTimer(sessionId: SessionId): void {
    const timer = this.silenceTimers.get(sessionId);
    if (timer) {
      clearTimeout(timer);
      this.silenceTimers.delete(sessionId);
    }
  }

  private async notifyTerminal(session: CallSession): Promise<void> {
    recordSessionOutcome(session.phase, session.direction);
    log.info(
      {
        event: 'session_terminal',
        ...logContext(session),
        phase: session.phase,
        answers: Object.keys(session.answers).length,
        failure_reason: session.failureReason,
      },
      'survey session finished',
    );

    for (const listener of this.terminalListeners) {
      try {
        await listener(session);
      } catch (error) {
        log.error({ event: 'terminal_listener_failed', ...logContext(session), err: error }, 'terminal listener failed');
      }
    }
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch((error: unknown) => {
        if (error instanceof NotFoundError) {
          log.warn({ event: 'background_session_missing', err: error }, 'session vanished during background work');
          return;
        }
        log.error({ event: 'background_work_failed', err: error }, 'background work failed');
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }
}
