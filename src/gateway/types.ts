import type {
  CallDirection,
  CallEndReason,
  GatewayCallId,
  QuestionPrompt,
  SessionId,
} from '../survey/types';

/** Correlation data the gateway echoes back on callbacks for a command. */
export interface GatewayCallContext {
  sessionId: SessionId;
  promptSeq?: number;
  questionIndex?: number;
}

export interface PlaceCallRequest {
  sessionId: SessionId;
  destination: string;
}

export interface PlaceCallResult {
  gatewayCallId: GatewayCallId;
}

/**
 * Outbound contract with the telephony provider. Every method resolves once
 * the provider has accepted the command (or rejects with GatewayError); the
 * effects arrive later as callbacks.
 */
export interface TelephonyGateway {
  placeCall(request: PlaceCallRequest): Promise<PlaceCallResult>;
  answerCall(callId: GatewayCallId, context: GatewayCallContext): Promise<void>;
  playAudio(callId: GatewayCallId, prompt: QuestionPrompt, context: GatewayCallContext): Promise<void>;
  startRecording(callId: GatewayCallId, context: GatewayCallContext): Promise<void>;
  stopRecording(callId: GatewayCallId, context: GatewayCallContext): Promise<void>;
  endCall(callId: GatewayCallId, context: GatewayCallContext): Promise<void>;
}

interface CallbackBase {
  gatewayCallId: GatewayCallId;
  /** Epoch milliseconds reported by the gateway. */
  timestamp: number;
  /** Session id recovered from the echoed client state, if any. */
  sessionHint?: SessionId;
}

export type CallStatusCallback = CallbackBase & {
  channel: 'call-status';
} & (
    | { status: 'initiated'; direction: CallDirection; from?: string; to?: string }
    | { status: 'answered' }
    | { status: 'ended'; reason: CallEndReason }
  );

export type RecordingStatusCallback = CallbackBase & {
  channel: 'recording-status';
  recordingUri: string;
  questionIndex?: number;
};

export type PlaybackStatusCallback = CallbackBase & {
  channel: 'playback-status';
  promptSeq?: number;
};

export type GatewayCallback = CallStatusCallback | RecordingStatusCallback | PlaybackStatusCallback;
