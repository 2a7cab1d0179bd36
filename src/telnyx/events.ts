import { z } from 'zod';
import type { GatewayCallContext, GatewayCallback } from '../gateway/types';
import type { CallEndReason } from '../survey/types';
import { TelnyxWebhookSchema, type TelnyxCallPayload } from './types';

const ClientStateSchema = z.object({
  session_id: z.string().min(1),
  prompt_seq: z.number().int().nonnegative().optional(),
  question_index: z.number().int().nonnegative().optional(),
});

export function encodeClientState(context: GatewayCallContext): string {
  const state: z.infer<typeof ClientStateSchema> = {
    session_id: context.sessionId,
    prompt_seq: context.promptSeq,
    question_index: context.questionIndex,
  };
  return Buffer.from(JSON.stringify(state), 'utf8').toString('base64');
}

export function decodeClientState(clientState?: string | null): GatewayCallContext | undefined {
  if (!clientState) {
    return undefined;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(clientState, 'base64').toString('utf8'));
  } catch {
    return undefined;
  }

  const parsed = ClientStateSchema.safeParse(decoded);
  if (!parsed.success) {
    return undefined;
  }
  return {
    sessionId: parsed.data.session_id,
    promptSeq: parsed.data.prompt_seq,
    questionIndex: parsed.data.question_index,
  };
}

const HANGUP_CAUSES: Record<string, CallEndReason> = {
  normal_clearing: 'hangup',
  user_busy: 'busy',
  timeout: 'no-answer',
  no_answer: 'no-answer',
  originator_cancel: 'canceled',
  call_rejected: 'failed',
  unallocated_number: 'failed',
  destination_out_of_order: 'failed',
};

export function mapHangupCause(cause?: string | null): CallEndReason {
  if (!cause) {
    return 'hangup';
  }
  return HANGUP_CAUSES[cause.trim().toLowerCase()] ?? 'failed';
}

function recordingUri(payload: TelnyxCallPayload): string | undefined {
  return (
    payload.recording_urls?.wav ??
    payload.recording_urls?.mp3 ??
    payload.public_recording_urls?.wav ??
    payload.public_recording_urls?.mp3 ??
    undefined
  );
}

function parseTimestamp(occurredAt: string | undefined, fallback: number): number {
  if (!occurredAt) {
    return fallback;
  }
  const parsed = Date.parse(occurredAt);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export type TelnyxEventMapping =
  | { kind: 'callback'; eventType: string; callback: GatewayCallback }
  | { kind: 'ignored'; eventType?: string; reason: string };

/**
 * Normalizes a Telnyx call-control webhook into a gateway callback.
 * Events the survey does not act on are reported as ignored.
 */
export function mapTelnyxWebhook(body: unknown, receivedAt: number = Date.now()): TelnyxEventMapping {
  const parsed = TelnyxWebhookSchema.safeParse(body);
  if (!parsed.success) {
    return { kind: 'ignored', reason: 'invalid_payload' };
  }

  const { event_type: eventType, occurred_at: occurredAt, payload } = parsed.data.data;
  const state = decodeClientState(payload.client_state);
  const base = {
    gatewayCallId: payload.call_control_id,
    timestamp: parseTimestamp(occurredAt, receivedAt),
    sessionHint: state?.sessionId,
  };

  switch (eventType) {
    case 'call.initiated':
      return {
        kind: 'callback',
        eventType,
        callback: {
          ...base,
          channel: 'call-status',
          status: 'initiated',
          direction: payload.direction === 'incoming' ? 'inbound' : 'outbound',
          from: payload.from ?? undefined,
          to: payload.to ?? undefined,
        },
      };
    case 'call.answered':
      return { kind: 'callback', eventType, callback: { ...base, channel: 'call-status', status: 'answered' } };
    case 'call.hangup':
      return {
        kind: 'callback',
        eventType,
        callback: { ...base, channel: 'call-status', status: 'ended', reason: mapHangupCause(payload.hangup_cause) },
      };
    case 'call.recording.saved': {
      const uri = recordingUri(payload);
      if (!uri) {
        return { kind: 'ignored', eventType, reason: 'missing_recording_url' };
      }
      return {
        kind: 'callback',
        eventType,
        callback: { ...base, channel: 'recording-status', recordingUri: uri, questionIndex: state?.questionIndex },
      };
    }
    case 'call.playback.ended':
    case 'call.speak.ended':
      return {
        kind: 'callback',
        eventType,
        callback: { ...base, channel: 'playback-status', promptSeq: state?.promptSeq },
      };
    default:
      return { kind: 'ignored', eventType, reason: 'unhandled_event' };
  }
}
