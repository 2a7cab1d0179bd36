import { log } from '../log';
import type { CreateSessionRequest } from '../survey/orchestrator';
import type { CallSession, SessionSnapshot } from '../survey/types';
import { applySessionOutcome, canCall, markAttemptStarted, type CallPolicy } from './participants';
import type { ParticipantStore } from './participantStore';

/** The part of the orchestrator the dialer drives. */
export interface SessionLauncher {
  createSession(request: CreateSessionRequest): Promise<SessionSnapshot>;
  onSessionTerminal(listener: (session: CallSession) => Promise<void> | void): void;
}

export interface CampaignDialerOptions {
  store: ParticipantStore;
  launcher: SessionLauncher;
  policy: CallPolicy;
  intervalMs: number;
  now?: () => Date;
}

export interface DialerTickSummary {
  eligible: number;
  started: number;
  failed: number;
}

/**
 * Starts survey sessions for eligible participants and folds session
 * outcomes back into their records.
 */
export class CampaignDialer {
  private readonly now: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<DialerTickSummary> | null = null;

  constructor(private readonly options: CampaignDialerOptions) {
    this.now = options.now ?? (() => new Date());
    options.launcher.onSessionTerminal((session) => this.recordOutcome(session));
  }

  /** One pass over the participant list; overlapping calls share the pass in flight. */
  public runOnce(): Promise<DialerTickSummary> {
    if (!this.running) {
      this.running = this.tick().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  public start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        log.error({ event: 'campaign_tick_failed', err: error }, 'campaign tick failed');
      });
    }, this.options.intervalMs);
    this.timer.unref?.();
    log.info({ event: 'campaign_started', interval_ms: this.options.intervalMs }, 'campaign dialer started');
  }

  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
  }

  public async recordOutcome(session: CallSession): Promise<void> {
    if (!session.participantId) {
      return;
    }
    const participant = await this.options.store.get(session.participantId);
    if (participant.status !== 'in-progress') {
      log.debug(
        { event: 'campaign_outcome_ignored', participant_id: participant.participantId, status: participant.status },
        'participant not in progress',
      );
      return;
    }

    const next = applySessionOutcome(participant, session.sessionId, session.phase, this.options.policy);
    await this.options.store.save(next);
    log.info(
      {
        event: 'campaign_outcome',
        participant_id: next.participantId,
        session_id: session.sessionId,
        phase: session.phase,
        status: next.status,
        attempts: next.attempts,
      },
      'campaign participant updated',
    );
  }

  private async tick(): Promise<DialerTickSummary> {
    const now = this.now();
    const eligible = (await this.options.store.list()).filter((participant) =>
      canCall(participant, now, this.options.policy),
    );
    const summary: DialerTickSummary = { eligible: eligible.length, started: 0, failed: 0 };

    for (const participant of eligible) {
      // saved before dialing so an outcome that lands during createSession finds it in progress
      const attempt = markAttemptStarted(participant, now);
      await this.options.store.save(attempt);

      try {
        const snapshot = await this.options.launcher.createSession({
          destination: participant.phoneE164,
          participantId: participant.participantId,
        });
        summary.started += 1;
        log.info(
          {
            event: 'campaign_call_started',
            participant_id: participant.participantId,
            session_id: snapshot.sessionId,
            attempt: attempt.attempts,
            phase: snapshot.phase,
          },
          'campaign call started',
        );
      } catch (error) {
        summary.failed += 1;
        await this.options.store.save({ ...attempt, status: 'pending' });
        log.error(
          { event: 'campaign_call_failed', participant_id: participant.participantId, err: error },
          'campaign call could not start',
        );
      }
    }
    return summary;
  }
}
