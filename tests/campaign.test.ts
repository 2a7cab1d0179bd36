import assert from 'node:assert/strict';
import { test } from 'node:test';
import { baseSession, MockRedis } from './fakes';
import { setTestEnv } from './testEnv';
import type { SessionLauncher } from '../src/campaign/dialer';
import type { Participant } from '../src/campaign/participants';
import type { CreateSessionRequest } from '../src/survey/orchestrator';
import type { CallSession, SessionSnapshot } from '../src/survey/types';

setTestEnv();

const policy = { maxAttempts: 3, retryGapMs: 60 * 60 * 1000 };
const now = new Date('2026-03-01T12:00:00.000Z');

function participant(overrides: Partial<Participant> = {}): Participant {
  return { participantId: 'p1', phoneE164: '+15550100001', status: 'pending', attempts: 0, ...overrides };
}

class FakeLauncher implements SessionLauncher {
  public readonly requests: CreateSessionRequest[] = [];
  public readonly listeners: Array<(session: CallSession) => Promise<void> | void> = [];
  public failWith?: Error;
  /** Phase reported to listeners before createSession returns, as a failed dial does. */
  public finishImmediately?: CallSession['phase'];

  async createSession(request: CreateSessionRequest): Promise<SessionSnapshot> {
    this.requests.push(request);
    if (this.failWith) {
      throw this.failWith;
    }
    const { toSnapshot } = await import('../src/survey/types');
    const sessionId = `s-${this.requests.length}`;
    const phase = this.finishImmediately ?? 'dialing';
    const session = baseSession({ sessionId, participantId: request.participantId, destination: request.destination, phase });
    if (this.finishImmediately) {
      await this.finish(session);
    }
    return toSnapshot(session);
  }

  onSessionTerminal(listener: (session: CallSession) => Promise<void> | void): void {
    this.listeners.push(listener);
  }

  async finish(session: CallSession): Promise<void> {
    for (const listener of this.listeners) {
      await listener(session);
    }
  }
}

test('contact lists are validated', async () => {
  const { parseContacts } = await import('../src/campaign/participants');

  assert.deepEqual(parseContacts([{ participantId: ' p1 ', phoneE164: '+15550100001' }]), [
    { participantId: 'p1', phoneE164: '+15550100001' },
  ]);
  assert.throws(
    () => parseContacts([{ participantId: 'p1', phoneE164: '5550100001' }]),
    /^Error: Invalid contacts: 0\.phoneE164: invalid E\.164 number$/,
  );
  assert.throws(
    () =>
      parseContacts([
        { participantId: 'p1', phoneE164: '+15550100001' },
        { participantId: 'p1', phoneE164: '+15550100002' },
      ]),
    /duplicate participantId p1/,
  );
});

test('canCall honours status, attempts, schedule and retry gap', async () => {
  const { canCall } = await import('../src/campaign/participants');

  assert.equal(canCall(participant(), now, policy), true);
  assert.equal(canCall(participant({ status: 'completed' }), now, policy), false);
  assert.equal(canCall(participant({ status: 'in-progress' }), now, policy), false);
  assert.equal(canCall(participant({ attempts: 3 }), now, policy), false);
  assert.equal(canCall(participant({ scheduledAt: '2026-03-01T13:00:00.000Z' }), now, policy), false);
  assert.equal(canCall(participant({ scheduledAt: '2026-03-01T11:00:00.000Z' }), now, policy), true);
  assert.equal(canCall(participant({ attempts: 1, lastAttemptAt: '2026-03-01T11:30:00.000Z' }), now, policy), false);
  assert.equal(canCall(participant({ attempts: 1, lastAttemptAt: '2026-03-01T11:00:00.000Z' }), now, policy), true);
});

test('session outcomes fold into the participant status', async () => {
  const { applySessionOutcome } = await import('../src/campaign/participants');
  const inProgress = participant({ status: 'in-progress', attempts: 1 });

  assert.equal(applySessionOutcome(inProgress, 's-1', 'survey-complete', policy).status, 'completed');
  assert.equal(applySessionOutcome(inProgress, 's-1', 'aborted', policy).status, 'failed');
  assert.deepEqual(applySessionOutcome(inProgress, 's-1', 'failed', policy), {
    ...inProgress,
    status: 'pending',
    lastSessionId: 's-1',
    lastOutcome: 'failed',
  });
  assert.equal(applySessionOutcome({ ...inProgress, attempts: 3 }, 's-1', 'failed', policy).status, 'failed');
  assert.equal(applySessionOutcome(inProgress, 's-1', 'dialing', policy), inProgress);
});

test('the dialer calls eligible participants and records outcomes', async () => {
  const { CampaignDialer } = await import('../src/campaign/dialer');
  const { InMemoryParticipantStore } = await import('../src/campaign/participantStore');
  const store = new InMemoryParticipantStore();
  await store.save(participant());
  await store.save(participant({ participantId: 'p2', phoneE164: '+15550100002', scheduledAt: '2026-03-02T00:00:00.000Z' }));
  await store.save(participant({ participantId: 'p3', phoneE164: '+15550100003', status: 'completed', attempts: 1 }));

  let clock = now;
  const launcher = new FakeLauncher();
  const dialer = new CampaignDialer({ store, launcher, policy, intervalMs: 1000, now: () => clock });

  assert.deepEqual(await dialer.runOnce(), { eligible: 1, started: 1, failed: 0 });
  assert.deepEqual(launcher.requests, [{ destination: '+15550100001', participantId: 'p1' }]);
  assert.equal((await store.get('p1')).status, 'in-progress');

  await launcher.finish(baseSession({ sessionId: 's-1', participantId: 'p1', phase: 'failed' }));
  const afterFailure = await store.get('p1');
  assert.equal(afterFailure.status, 'pending');
  assert.equal(afterFailure.attempts, 1);
  assert.equal(afterFailure.lastSessionId, 's-1');

  assert.deepEqual(await dialer.runOnce(), { eligible: 0, started: 0, failed: 0 });

  clock = new Date(now.getTime() + policy.retryGapMs);
  assert.deepEqual(await dialer.runOnce(), { eligible: 1, started: 1, failed: 0 });
  await launcher.finish(baseSession({ sessionId: 's-2', participantId: 'p1', phase: 'survey-complete' }));
  assert.equal((await store.get('p1')).status, 'completed');
  assert.equal((await store.get('p1')).attempts, 2);
});

test('a session that fails while dialing is folded in before the attempt returns', async () => {
  const { CampaignDialer } = await import('../src/campaign/dialer');
  const { InMemoryParticipantStore } = await import('../src/campaign/participantStore');
  const store = new InMemoryParticipantStore();
  await store.save(participant());
  const launcher = new FakeLauncher();
  launcher.finishImmediately = 'failed';
  const dialer = new CampaignDialer({ store, launcher, policy, intervalMs: 1000, now: () => now });

  assert.deepEqual(await dialer.runOnce(), { eligible: 1, started: 1, failed: 0 });
  const record = await store.get('p1');
  assert.equal(record.status, 'pending');
  assert.equal(record.lastOutcome, 'failed');
  assert.equal(record.attempts, 1);
});

test('a launcher error puts the participant back to pending', async () => {
  const { CampaignDialer } = await import('../src/campaign/dialer');
  const { InMemoryParticipantStore } = await import('../src/campaign/participantStore');
  const store = new InMemoryParticipantStore();
  await store.save(participant());
  const launcher = new FakeLauncher();
  launcher.failWith = new Error('store unavailable');
  const dialer = new CampaignDialer({ store, launcher, policy, intervalMs: 1000, now: () => now });

  assert.deepEqual(await dialer.runOnce(), { eligible: 1, started: 0, failed: 1 });
  const record = await store.get('p1');
  assert.equal(record.status, 'pending');
  assert.equal(record.attempts, 1);
  assert.equal(record.lastAttemptAt, now.toISOString());
});

test('outcomes for sessions outside the campaign are ignored', async () => {
  const { CampaignDialer } = await import('../src/campaign/dialer');
  const { InMemoryParticipantStore } = await import('../src/campaign/participantStore');
  const store = new InMemoryParticipantStore();
  await store.save(participant({ status: 'completed', attempts: 1 }));
  const launcher = new FakeLauncher();
  const dialer = new CampaignDialer({ store, launcher, policy, intervalMs: 1000, now: () => now });

  await dialer.recordOutcome(baseSession({ phase: 'failed' }));
  await dialer.recordOutcome(baseSession({ participantId: 'p1', phase: 'failed' }));
  assert.equal((await store.get('p1')).status, 'completed');
});

test('the redis participant store keeps attempt history across upserts', async () => {
  const { RedisParticipantStore } = await import('../src/campaign/participantStore');
  const { NotFoundError } = await import('../src/survey/errors');
  const redis = new MockRedis();
  const store = new RedisParticipantStore({ prefix: 'survey', redis: redis as never });

  await store.upsertContact({ participantId: 'p2', phoneE164: '+15550100002' });
  await store.upsertContact({ participantId: 'p1', phoneE164: '+15550100001' });
  await store.save(participant({ status: 'failed', attempts: 3 }));
  const refreshed = await store.upsertContact({ participantId: 'p1', phoneE164: '+15550100009' });

  assert.deepEqual(refreshed, { ...participant({ status: 'failed', attempts: 3 }), phoneE164: '+15550100009', scheduledAt: undefined });
  redis.hashes.get('survey:participants')?.set('broken', '{not json');
  assert.deepEqual(
    (await store.list()).map((p) => p.participantId),
    ['p1', 'p2'],
  );
  await assert.rejects(store.get('p9'), NotFoundError);
});
