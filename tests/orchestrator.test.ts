import assert from 'node:assert/strict';
import { test } from 'node:test';
import { CallbackClock, FakeGateway, noSleep, ScriptedCapabilities, textQuestions } from './fakes';
import { setTestEnv } from './testEnv';
import type { SessionStore } from '../src/survey/sessionStore';
import type { SurveyScript } from '../src/survey/stateMachine';
import type { CallSession, GatewayCallId, SessionId } from '../src/survey/types';

setTestEnv();

/** Wraps a store to observe every committed write. */
class RecordingStore implements SessionStore {
  public readonly writes: CallSession[] = [];

  constructor(private readonly inner: SessionStore) {}

  create(session: CallSession): Promise<CallSession> {
    return this.inner.create(session);
  }

  async compareAndSwap(sessionId: SessionId, expectedVersion: number, next: CallSession): Promise<CallSession> {
    const stored = await this.inner.compareAndSwap(sessionId, expectedVersion, next);
    this.writes.push(stored);
    return stored;
  }

  get(sessionId: SessionId): Promise<CallSession> {
    return this.inner.get(sessionId);
  }

  getByGatewayCallId(gatewayCallId: GatewayCallId): Promise<CallSession> {
    return this.inner.getByGatewayCallId(gatewayCallId);
  }
}

/** Holds the first `parties` index lookups until all of them have read. */
class BarrierStore extends RecordingStore {
  private waiting: Array<() => void> = [];
  private remaining: number;

  constructor(inner: SessionStore, parties: number) {
    super(inner);
    this.remaining = parties;
  }

  async getByGatewayCallId(gatewayCallId: GatewayCallId): Promise<CallSession> {
    const session = await super.getByGatewayCallId(gatewayCallId);
    if (this.remaining === 0) {
      return session;
    }
    this.remaining -= 1;
    if (this.remaining === 0) {
      const waiters = this.waiting;
      this.waiting = [];
      waiters.forEach((release) => release());
      return session;
    }
    await new Promise<void>((resolve) => this.waiting.push(resolve));
    return session;
  }
}

/** Rejects the first `conflicts` writes that commit question 0's transcript. */
class ContendedStore extends RecordingStore {
  constructor(
    inner: SessionStore,
    private conflicts: number,
    private readonly conflict: () => Error,
  ) {
    super(inner);
  }

  async compareAndSwap(sessionId: SessionId, expectedVersion: number, next: CallSession): Promise<CallSession> {
    const first = next.answers[0];
    if (this.conflicts > 0 && first?.transcript !== undefined && first.detectedLanguage === undefined) {
      this.conflicts -= 1;
      throw this.conflict();
    }
    return super.compareAndSwap(sessionId, expectedVersion, next);
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

interface Harness {
  orchestrator: import('../src/survey/orchestrator').SurveyOrchestrator;
  gateway: FakeGateway;
  caps: ScriptedCapabilities;
  clock: CallbackClock;
  terminal: CallSession[];
}

async function setup(
  options: {
    script?: SurveyScript;
    questions?: number;
    silenceTimeoutMs?: number;
    gatewayTimeoutMs?: number;
    store?: SessionStore;
  } = {},
): Promise<Harness> {
  const { SurveyOrchestrator } = await import('../src/survey/orchestrator');
  const { AudioPipeline } = await import('../src/pipeline/audioPipeline');
  const { InMemorySessionStore } = await import('../src/survey/sessionStore');

  const gateway = new FakeGateway();
  const caps = new ScriptedCapabilities();
  let counter = 0;

  const orchestrator = new SurveyOrchestrator({
    store: options.store ?? new InMemorySessionStore(),
    gateway,
    pipeline: new AudioPipeline({
      capabilities: caps.asCapabilities(),
      targetLanguage: 'en',
      voiceProfile: { language: 'en' },
      stageTimeoutMs: 1000,
      retryPolicy: { maxAttempts: 3, backoff: { baseMs: 1, maxMs: 1 } },
      concurrency: 4,
      sleep: noSleep,
    }),
    script: options.script ?? {},
    defaultQuestions: textQuestions('Q1?', 'Q2?', 'Q3?').slice(0, options.questions ?? 3),
    workerConcurrency: 8,
    casPolicy: { maxAttempts: 5, backoff: { baseMs: 0, maxMs: 0 } },
    gatewayTimeoutMs: options.gatewayTimeoutMs ?? 1000,
    silenceTimeoutMs: options.silenceTimeoutMs,
    newSessionId: () => {
      counter += 1;
      return `sess-${counter}`;
    },
    sleep: noSleep,
  });

  const terminal: CallSession[] = [];
  orchestrator.onSessionTerminal((session) => {
    terminal.push(session);
  });

  return { orchestrator, gateway, caps, clock: new CallbackClock(), terminal };
}

/** Plays out one question: prompt finished, recording delivered, pipeline drained. */
async function answer(h: Harness, callId: string, questionIndex: number): Promise<void> {
  await h.orchestrator.processGatewayCallback(h.clock.playbackEnded(callId, h.gateway.lastPromptSeq()));
  await h.orchestrator.processGatewayCallback(
    h.clock.recording(callId, `http://rec.test/q${questionIndex}.wav`, questionIndex),
  );
  await h.orchestrator.whenIdle();
}

test('a three-question survey completes with every answer processed', async () => {
  const h = await setup();

  const created = await h.orchestrator.createSession({ destination: '+15550100001' });
  assert.equal(created.sessionId, 'sess-1');
  assert.equal(created.gatewayCallId, 'call-1');
  assert.equal(created.phase, 'dialing');

  const answered = await h.orchestrator.processGatewayCallback(h.clock.answered('call-1'));
  assert.deepEqual(answered, { status: 'applied', sessionId: 'sess-1', phase: 'awaiting-answer-recording' });

  for (const index of [0, 1, 2]) {
    await answer(h, 'call-1', index);
  }

  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  assert.equal(snapshot.phase, 'survey-complete');
  assert.equal(snapshot.currentQuestionIndex, 3);
  assert.equal(snapshot.answers.length, 3);
  assert.deepEqual(
    snapshot.answers.map((a) => a.pipelineStatus),
    ['completed', 'completed', 'completed'],
  );
  assert.equal(snapshot.answers[1]?.transcript, 'answer from http://rec.test/q1.wav');
  assert.equal(snapshot.answers[1]?.detectedLanguage, 'es');
  assert.equal(snapshot.answers[1]?.translatedTranscript, 'en: answer from http://rec.test/q1.wav');
  assert.equal(snapshot.answers[1]?.synthesizedAudioUri, 'http://audio.test/sess-1/q1.wav');

  assert.deepEqual(h.gateway.methods(), [
    'placeCall',
    'playAudio',
    'startRecording',
    'playAudio',
    'startRecording',
    'playAudio',
    'startRecording',
    'endCall',
  ]);
  assert.equal(h.terminal.length, 1);
  assert.equal(h.terminal[0]?.phase, 'survey-complete');
});

test('committed writes never move the question index backwards', async () => {
  const { InMemorySessionStore } = await import('../src/survey/sessionStore');
  const recorder = new RecordingStore(new InMemorySessionStore());
  const h = await setup({ store: recorder });
  await h.orchestrator.createSession({ destination: '+15550100001' });
  await h.orchestrator.processGatewayCallback(h.clock.answered('call-1'));
  for (const index of [0, 1, 2]) {
    await answer(h, 'call-1', index);
  }

  const writes = recorder.writes;
  assert.ok(writes.length > 10);
  writes.forEach((session, i) => {
    assert.equal(session.version, i + 2);
    if (i > 0) {
      assert.ok(session.currentQuestionIndex >= (writes[i - 1]?.currentQuestionIndex ?? 0));
      assert.ok(session.lastEventSequence > (writes[i - 1]?.lastEventSequence ?? 0));
    }
  });
});

test('duplicate and stale callbacks are dropped without side effects', async () => {
  const h = await setup({ questions: 1 });
  await h.orchestrator.createSession({ destination: '+15550100001' });

  const answeredCallback = h.clock.answered('call-1');
  await h.orchestrator.processGatewayCallback(answeredCallback);
  const replay = await h.orchestrator.processGatewayCallback(answeredCallback);
  assert.deepEqual(replay, { status: 'dropped', reason: 'duplicate', sessionId: 'sess-1' });

  const stale = await h.orchestrator.processGatewayCallback({ ...answeredCallback, timestamp: answeredCallback.timestamp - 500 });
  assert.equal(stale.status, 'dropped');
  assert.equal(stale.status === 'dropped' ? stale.reason : undefined, 'stale');

  await h.orchestrator.processGatewayCallback(h.clock.playbackEnded('call-1', 1));
  const recording = h.clock.recording('call-1', 'http://rec.test/q0.wav', 0);
  await h.orchestrator.processGatewayCallback(recording);
  const recordingReplay = await h.orchestrator.processGatewayCallback(recording);
  assert.deepEqual(recordingReplay, { status: 'dropped', reason: 'duplicate', sessionId: 'sess-1' });
  await h.orchestrator.whenIdle();

  const late = await h.orchestrator.processGatewayCallback(h.clock.recording('call-1', 'http://rec.test/again.wav', 0));
  assert.equal(late.status, 'dropped');

  assert.equal(h.caps.counts.transcribe, 1);
  assert.equal(h.gateway.methods().filter((m) => m === 'playAudio').length, 1);
  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  assert.equal(snapshot.phase, 'survey-complete');
  assert.equal(snapshot.answers[0]?.rawRecordingUri, 'http://rec.test/q0.wav');
});

test('a stage that fails on every attempt skips the answer and the survey goes on', async () => {
  const { TranscriptionError } = await import('../src/survey/errors');
  const h = await setup();
  h.caps.transcribe = async (uri) => {
    if (uri.endsWith('q1.wav')) {
      throw new TranscriptionError('whisper unavailable');
    }
    return `answer from ${uri}`;
  };

  await h.orchestrator.createSession({ destination: '+15550100001' });
  await h.orchestrator.processGatewayCallback(h.clock.answered('call-1'));
  for (const index of [0, 1, 2]) {
    await answer(h, 'call-1', index);
  }

  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  assert.equal(snapshot.phase, 'survey-complete');
  assert.deepEqual(snapshot.answers[1], {
    questionIndex: 1,
    rawRecordingUri: 'http://rec.test/q1.wav',
    transcript: 'unavailable',
    detectedLanguage: 'unavailable',
    translatedTranscript: 'unavailable',
    synthesizedAudioUri: 'unavailable',
    pipelineStatus: 'skipped',
    failedStage: 'transcribe',
    failureReason: 'whisper unavailable',
    recordedAt: snapshot.answers[1]?.recordedAt,
    completedAt: snapshot.answers[1]?.completedAt,
  });
  assert.equal(snapshot.answers[2]?.pipelineStatus, 'completed');
  assert.equal(h.caps.counts.transcribe, 5);
  assert.equal(h.caps.counts.detect, 2);
});

test('concurrent deliveries of one callback commit exactly once', async () => {
  const { InMemorySessionStore } = await import('../src/survey/sessionStore');
  const h = await setup({ store: new BarrierStore(new InMemorySessionStore(), 2) });
  await h.orchestrator.createSession({ destination: '+15550100001' });

  const callback = h.clock.answered('call-1');
  const outcomes = await Promise.all([
    h.orchestrator.processGatewayCallback(callback),
    h.orchestrator.processGatewayCallback({ ...callback }),
  ]);

  const statuses = outcomes.map((outcome) => outcome.status).sort();
  assert.deepEqual(statuses, ['applied', 'dropped']);
  const dropped = outcomes.find((outcome) => outcome.status === 'dropped');
  assert.equal(dropped?.status === 'dropped' ? dropped.reason : undefined, 'duplicate');
  assert.equal(h.gateway.methods().filter((m) => m === 'playAudio').length, 1);

  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  assert.equal(snapshot.phase, 'awaiting-answer-recording');
  assert.equal(snapshot.version, 3);
});

test('an abort during processing wins over the late stage result', async () => {
  const h = await setup();
  const gate = deferred();
  const transcribeStarted = deferred();
  h.caps.transcribe = async (uri) => {
    if (uri.endsWith('q1.wav')) {
      transcribeStarted.resolve();
      await gate.promise;
      return 'hola';
    }
    return `answer from ${uri}`;
  };

  await h.orchestrator.createSession({ destination: '+15550100001' });
  await h.orchestrator.processGatewayCallback(h.clock.answered('call-1'));
  await answer(h, 'call-1', 0);
  await h.orchestrator.processGatewayCallback(h.clock.playbackEnded('call-1', h.gateway.lastPromptSeq()));
  await h.orchestrator.processGatewayCallback(h.clock.recording('call-1', 'http://rec.test/q1.wav', 1));
  await transcribeStarted.promise;

  const aborted = await h.orchestrator.abortSession('sess-1', 'operator request');
  assert.equal(aborted.phase, 'aborted');
  assert.equal(aborted.failureReason, 'aborted: operator request');

  gate.resolve();
  await h.orchestrator.whenIdle();

  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  assert.equal(snapshot.phase, 'aborted');
  assert.equal(snapshot.currentQuestionIndex, 1);
  assert.equal(snapshot.answers[0]?.pipelineStatus, 'completed');
  assert.equal(snapshot.answers[0]?.transcript, 'answer from http://rec.test/q0.wav');
  assert.equal(snapshot.answers[0]?.synthesizedAudioUri, 'http://audio.test/sess-1/q0.wav');
  assert.equal(snapshot.answers[1]?.pipelineStatus, 'processing');
  assert.equal(snapshot.answers[1]?.transcript, undefined);
  assert.equal(snapshot.version, aborted.version);
  assert.equal(h.caps.counts.detect, 1);
  assert.equal(h.gateway.methods().at(-1), 'endCall');
  assert.equal(h.terminal.length, 1);
});

test('callbacks for unknown calls are dropped', async () => {
  const h = await setup();
  const outcome = await h.orchestrator.processGatewayCallback(h.clock.answered('call-nobody'));
  assert.deepEqual(outcome, { status: 'dropped', reason: 'unknown_call_id' });
  assert.deepEqual(h.gateway.methods(), []);
});

test('an inbound call creates a session and answers it once', async () => {
  const h = await setup({ script: { introPrompt: { kind: 'text', text: 'Welcome' } } });
  const initiated = {
    channel: 'call-status',
    status: 'initiated',
    direction: 'inbound',
    from: '+15550100009',
    to: '+15550100000',
    gatewayCallId: 'in-1',
    timestamp: h.clock.tick(),
  } as const;

  const created = await h.orchestrator.processGatewayCallback(initiated);
  assert.deepEqual(created, { status: 'created', sessionId: 'sess-1' });
  const again = await h.orchestrator.processGatewayCallback(initiated);
  assert.deepEqual(again, { status: 'dropped', reason: 'duplicate', sessionId: 'sess-1' });
  assert.deepEqual(h.gateway.methods(), ['answerCall']);

  await h.orchestrator.processGatewayCallback(h.clock.answered('in-1'));
  await h.orchestrator.processGatewayCallback(h.clock.playbackEnded('in-1', 1));
  await h.orchestrator.processGatewayCallback(h.clock.playbackEnded('in-1', 2));

  const plays = h.gateway.calls.filter((call) => call.method === 'playAudio');
  assert.deepEqual(
    plays.map((call) => (call.method === 'playAudio' && call.prompt.kind === 'text' ? call.prompt.text : '')),
    ['Welcome', 'Q1?'],
  );
  assert.equal(h.gateway.methods().at(-1), 'startRecording');

  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  assert.equal(snapshot.direction, 'inbound');
  assert.equal(snapshot.destination, '+15550100000');
});

test('a failed dial leaves a failed session', async () => {
  const h = await setup();
  h.gateway.failing.add('placeCall');

  const snapshot = await h.orchestrator.createSession({ destination: '+15550100001' });
  assert.equal(snapshot.phase, 'failed');
  assert.equal(snapshot.failureReason, 'gateway_place-call: gateway placeCall failed: simulated failure');
  assert.deepEqual(h.gateway.methods(), ['placeCall']);
  assert.equal(h.terminal.length, 1);
});

test('a failed play command fails the session and hangs up', async () => {
  const h = await setup();
  await h.orchestrator.createSession({ destination: '+15550100001' });
  h.gateway.failing.add('playAudio');

  await h.orchestrator.processGatewayCallback(h.clock.answered('call-1'));

  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  assert.equal(snapshot.phase, 'failed');
  assert.equal(snapshot.failureReason, 'gateway_play: gateway playAudio failed: simulated failure');
  assert.deepEqual(h.gateway.methods(), ['placeCall', 'playAudio', 'endCall']);
});

test('silence past the window records an empty answer', async () => {
  const h = await setup({ questions: 1, silenceTimeoutMs: 20 });
  const finished = new Promise<CallSession>((resolve) => {
    h.orchestrator.onSessionTerminal(resolve);
  });
  // the silence timer is unref'd; keep the loop alive until it fires
  const keepAlive = setTimeout(() => undefined, 5000);

  await h.orchestrator.createSession({ destination: '+15550100001' });
  await h.orchestrator.processGatewayCallback(h.clock.answered('call-1'));
  await h.orchestrator.processGatewayCallback(h.clock.playbackEnded('call-1', 1));

  const session = await finished;
  clearTimeout(keepAlive);
  assert.equal(session.phase, 'survey-complete');
  assert.equal(session.answers[0]?.pipelineStatus, 'empty');
  assert.equal(session.answers[0]?.failureReason, 'no_recording');
  assert.deepEqual(h.gateway.methods().slice(-2), ['stopRecording', 'endCall']);
  assert.equal(h.caps.counts.transcribe, 0);
});

test('hanging up mid-survey fails the session', async () => {
  const h = await setup();
  await h.orchestrator.createSession({ destination: '+15550100001' });
  await h.orchestrator.processGatewayCallback(h.clock.answered('call-1'));
  await h.orchestrator.processGatewayCallback(h.clock.ended('call-1'));

  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  assert.equal(snapshot.phase, 'failed');
  assert.equal(snapshot.failureReason, 'call_hangup');
  assert.equal(h.terminal.length, 1);
  await h.orchestrator.shutdown();
});

test('a call placed after the session was aborted is hung up', async () => {
  const h = await setup();
  const dialing = deferred();
  const release = deferred();
  h.gateway.holdDial = () => {
    dialing.resolve();
    return release.promise;
  };

  const creating = h.orchestrator.createSession({ destination: '+15550100001' });
  await dialing.promise;
  const aborted = await h.orchestrator.abortSession('sess-1', 'operator request');
  assert.equal(aborted.phase, 'aborted');
  assert.equal(aborted.gatewayCallId, undefined);

  release.resolve();
  const snapshot = await creating;
  assert.equal(snapshot.phase, 'aborted');
  assert.deepEqual(h.gateway.calls.slice(1), [{ method: 'endCall', callId: 'call-1' }]);
  assert.equal(h.terminal.length, 1);
});

test('a dial that answers after its timeout is hung up', async () => {
  const h = await setup({ gatewayTimeoutMs: 10 });
  const release = deferred();
  h.gateway.holdDial = () => release.promise;

  const snapshot = await h.orchestrator.createSession({ destination: '+15550100001' });
  assert.equal(snapshot.phase, 'failed');
  assert.equal(snapshot.failureReason, 'gateway_place-call: gateway placeCall timed out after 10ms');

  release.resolve();
  await h.orchestrator.whenIdle();
  assert.deepEqual(h.gateway.calls.slice(1), [{ method: 'endCall', callId: 'call-1' }]);
});

test('a call answered before the dial returns still asks the first question', async () => {
  const h = await setup({ questions: 1 });
  const dialing = deferred();
  const release = deferred();
  h.gateway.holdDial = () => {
    dialing.resolve();
    return release.promise;
  };

  const creating = h.orchestrator.createSession({ destination: '+15550100001' });
  await dialing.promise;

  const answered = await h.orchestrator.processGatewayCallback({ ...h.clock.answered('call-1'), sessionHint: 'sess-1' });
  assert.deepEqual(answered, { status: 'applied', sessionId: 'sess-1', phase: 'awaiting-answer-recording' });
  assert.deepEqual(h.gateway.calls.slice(1), [
    { method: 'playAudio', callId: 'call-1', prompt: { kind: 'text', text: 'Q1?' }, promptSeq: 1 },
  ]);

  release.resolve();
  const created = await creating;
  assert.equal(created.gatewayCallId, 'call-1');
  assert.equal(created.phase, 'awaiting-answer-recording');

  await answer(h, 'call-1', 0);
  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  assert.equal(snapshot.phase, 'survey-complete');
  assert.deepEqual(h.gateway.methods(), ['placeCall', 'playAudio', 'startRecording', 'endCall']);
});

test('a recording saved by a silence stop is not taken as the next answer', async () => {
  const h = await setup({ questions: 2, silenceTimeoutMs: 20 });
  await h.orchestrator.createSession({ destination: '+15550100001' });
  await h.orchestrator.processGatewayCallback(h.clock.answered('call-1'));
  await h.orchestrator.processGatewayCallback(h.clock.playbackEnded('call-1', 1));

  await delay(60);
  await h.orchestrator.whenIdle();
  assert.deepEqual(h.gateway.calls.slice(-2), [
    { method: 'stopRecording', callId: 'call-1', questionIndex: 0 },
    { method: 'playAudio', callId: 'call-1', prompt: { kind: 'text', text: 'Q2?' }, promptSeq: 2 },
  ]);

  const unlabelled = await h.orchestrator.processGatewayCallback(
    h.clock.recording('call-1', 'http://rec.test/q0-stopped.wav'),
  );
  assert.deepEqual(unlabelled, { status: 'dropped', reason: 'recording_not_started', sessionId: 'sess-1' });
  const labelled = await h.orchestrator.processGatewayCallback(
    h.clock.recording('call-1', 'http://rec.test/q0-stopped.wav', 0),
  );
  assert.deepEqual(labelled, { status: 'dropped', reason: 'recording_for_other_question', sessionId: 'sess-1' });

  await answer(h, 'call-1', 1);
  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  assert.equal(snapshot.phase, 'survey-complete');
  assert.deepEqual(
    snapshot.answers.map((a) => [a.questionIndex, a.rawRecordingUri, a.pipelineStatus]),
    [
      [0, 'unavailable', 'empty'],
      [1, 'http://rec.test/q1.wav', 'completed'],
    ],
  );
});

test('a stage result that loses the write race is committed on a later round', async () => {
  const { InMemorySessionStore } = await import('../src/survey/sessionStore');
  const { VersionConflictError } = await import('../src/survey/errors');
  const store = new ContendedStore(new InMemorySessionStore(), 7, () => new VersionConflictError('sess-1', 0));
  const h = await setup({ questions: 1, store });

  await h.orchestrator.createSession({ destination: '+15550100001' });
  await h.orchestrator.processGatewayCallback(h.clock.answered('call-1'));
  await answer(h, 'call-1', 0);

  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  assert.equal(snapshot.phase, 'survey-complete');
  assert.equal(snapshot.answers[0]?.transcript, 'answer from http://rec.test/q0.wav');
  assert.equal(snapshot.answers[0]?.pipelineStatus, 'completed');
  assert.equal(h.caps.counts.transcribe, 1);
});

async function outcomeOf(h: Harness): Promise<{ phase: string; currentQuestionIndex: number; recordings: string[] }> {
  const snapshot = await h.orchestrator.getSessionSnapshot('sess-1');
  return {
    phase: snapshot.phase,
    currentQuestionIndex: snapshot.currentQuestionIndex,
    recordings: snapshot.answers.map((a) => a.rawRecordingUri),
  };
}

test('replays interleaved across channels end where the causal order ends', async () => {
  const inOrder = await setup({ questions: 2 });
  await inOrder.orchestrator.createSession({ destination: '+15550100001' });
  await inOrder.orchestrator.processGatewayCallback(inOrder.clock.answered('call-1'));
  await answer(inOrder, 'call-1', 0);
  await answer(inOrder, 'call-1', 1);

  const shuffled = await setup({ questions: 2 });
  const { clock, orchestrator } = shuffled;
  await orchestrator.createSession({ destination: '+15550100001' });
  const answered = clock.answered('call-1');
  const firstPromptEnded = clock.playbackEnded('call-1', 1);
  const firstRecording = clock.recording('call-1', 'http://rec.test/q0.wav', 0);
  const secondPromptEnded = clock.playbackEnded('call-1', 2);
  const secondRecording = clock.recording('call-1', 'http://rec.test/q1.wav', 1);

  await orchestrator.processGatewayCallback(answered);
  await orchestrator.processGatewayCallback(firstPromptEnded);
  await orchestrator.processGatewayCallback(firstRecording);
  // redeliveries of earlier call-status and playback events after the recording
  await orchestrator.processGatewayCallback(firstPromptEnded);
  await orchestrator.processGatewayCallback({ ...answered, timestamp: answered.timestamp - 1 });
  await orchestrator.processGatewayCallback(answered);
  await orchestrator.whenIdle();
  await orchestrator.processGatewayCallback(firstRecording);
  await orchestrator.processGatewayCallback(secondPromptEnded);
  await orchestrator.processGatewayCallback(firstPromptEnded);
  await orchestrator.processGatewayCallback(secondRecording);
  await orchestrator.processGatewayCallback(secondPromptEnded);
  await orchestrator.whenIdle();

  const expected = await outcomeOf(inOrder);
  assert.deepEqual(expected, {
    phase: 'survey-complete',
    currentQuestionIndex: 2,
    recordings: ['http://rec.test/q0.wav', 'http://rec.test/q1.wav'],
  });
  assert.deepEqual(await outcomeOf(shuffled), expected);
  assert.deepEqual(shuffled.gateway.methods(), inOrder.gateway.methods());
  assert.equal(shuffled.caps.counts.transcribe, 2);
});

test('a hangup delivered ahead of the answer it follows fails the call once', async () => {
  const inOrder = await setup();
  await inOrder.orchestrator.createSession({ destination: '+15550100001' });
  await inOrder.orchestrator.processGatewayCallback(inOrder.clock.answered('call-1'));
  await inOrder.orchestrator.processGatewayCallback(inOrder.clock.ended('call-1'));

  const shuffled = await setup();
  await shuffled.orchestrator.createSession({ destination: '+15550100001' });
  const answered = shuffled.clock.answered('call-1');
  const ended = shuffled.clock.ended('call-1');
  await shuffled.orchestrator.processGatewayCallback(ended);
  const late = await shuffled.orchestrator.processGatewayCallback(answered);
  assert.deepEqual(late, { status: 'dropped', reason: 'stale', sessionId: 'sess-1' });

  const expected = await outcomeOf(inOrder);
  assert.deepEqual(expected, { phase: 'failed', currentQuestionIndex: 0, recordings: [] });
  assert.deepEqual(await outcomeOf(shuffled), expected);
  assert.equal(shuffled.terminal.length, 1);
});
