import type { CallStatusCallback, GatewayCallback } from '../gateway/types';
import { NotFoundError, UnknownCallIdError } from './errors';
import type { SessionStore } from './sessionStore';
import type { CallSession, SurveyEvent } from './types';

export type AdmissionDecision =
  | { accepted: true }
  | { accepted: false; reason: 'duplicate' | 'stale' };

function callStatusEvent(callback: CallStatusCallback): SurveyEvent {
  switch (callback.status) {
    case 'initiated':
      return { type: 'call-created', gatewayCallId: callback.gatewayCallId };
    case 'answered':
      return { type: 'call-answered' };
    case 'ended':
      return { type: 'call-ended', reason: callback.reason };
  }
}

/** Maps a normalized gateway callback onto the survey event it stands for. */
export function toSurveyEvent(callback: GatewayCallback): SurveyEvent {
  switch (callback.channel) {
    case 'call-status':
      return callStatusEvent(callback);
    case 'recording-status':
      return {
        type: 'recording-available',
        recordingUri: callback.recordingUri,
        questionIndex: callback.questionIndex,
      };
    case 'playback-status':
      return { type: 'prompt-finished', promptSeq: callback.promptSeq };
  }
}

/**
 * Resolves gateway callbacks to sessions and filters replays. Ordering is
 * tracked per channel: call-status, recording-status and playback-status
 * interleave freely, but within a channel timestamps must strictly increase.
 */
export class CallbackCorrelator {
  constructor(private readonly store: SessionStore) {}

  public async resolve(callback: GatewayCallback): Promise<CallSession> {
    try {
      return await this.store.getByGatewayCallId(callback.gatewayCallId);
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
    }

    // The index is bound only once the dial response is committed; early
    // callbacks find their session through the echoed client state.
    if (callback.sessionHint) {
      try {
        const session = await this.store.get(callback.sessionHint);
        if (!session.gatewayCallId || session.gatewayCallId === callback.gatewayCallId) {
          return session;
        }
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          throw error;
        }
      }
    }

    throw new UnknownCallIdError(callback.gatewayCallId);
  }

  public admit(session: CallSession, callback: GatewayCallback): AdmissionDecision {
    const last = session.lastEventAt[callback.channel];
    if (last === undefined || callback.timestamp > last) {
      return { accepted: true };
    }
    return { accepted: false, reason: callback.timestamp === last ? 'duplicate' : 'stale' };
  }

  /**
   * Records the callback as applied on a record about to be committed. A
   * session matched through its client state before the dial response was
   * committed gets bound to the callback's call id here.
   */
  public markApplied(next: CallSession, callback: GatewayCallback): CallSession {
    return {
      ...next,
      gatewayCallId: next.gatewayCallId ?? callback.gatewayCallId,
      lastEventAt: { ...next.lastEventAt, [callback.channel]: callback.timestamp },
    };
  }
}
