import type {
  GatewayCallContext,
  PlaceCallRequest,
  PlaceCallResult,
  TelephonyGateway,
} from '../gateway/types';
import { log } from '../log';
import { GatewayError } from '../survey/errors';
import type { GatewayCallId, QuestionPrompt } from '../survey/types';
import { encodeClientState } from './events';
import type { TelnyxClient } from './telnyxClient';
import { TelnyxDialResponseSchema } from './types';

export interface TelnyxGatewayOptions {
  client: TelnyxClient;
  connectionId: string;
  fromNumber: string;
  /** Where Telnyx should send call-control webhooks for dialed calls. */
  webhookUrl: string;
  ttsVoice: string;
  ttsLanguage: string;
  recordingMaxSeconds: number;
  /** Gateway-side end of recording after this much trailing silence. */
  recordingSilenceSeconds: number;
}

export class TelnyxGateway implements TelephonyGateway {
  constructor(private readonly options: TelnyxGatewayOptions) {}

  public async placeCall(request: PlaceCallRequest): Promise<PlaceCallResult> {
    const body = await this.options.client.request('calls', {
      method: 'POST',
      body: JSON.stringify({
        connection_id: this.options.connectionId,
        to: request.destination,
        from: this.options.fromNumber,
        webhook_url: this.options.webhookUrl,
        client_state: encodeClientState({ sessionId: request.sessionId }),
      }),
    });

    const parsed = TelnyxDialResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GatewayError('place-call', 'dial response carried no call_control_id', {
        session_id: request.sessionId,
      });
    }

    const gatewayCallId = parsed.data.data.call_control_id;
    log.info(
      { event: 'telnyx_call_placed', session_id: request.sessionId, call_control_id: gatewayCallId },
      'telnyx call placed',
    );
    return { gatewayCallId };
  }

  public async answerCall(callId: GatewayCallId, context: GatewayCallContext): Promise<void> {
    await this.options.client.callControl(
      callId,
      'answer',
      { client_state: encodeClientState(context) },
      { session_id: context.sessionId },
    );
  }

  public async playAudio(callId: GatewayCallId, prompt: QuestionPrompt, context: GatewayCallContext): Promise<void> {
    const clientState = encodeClientState(context);
    if (prompt.kind === 'audio') {
      await this.options.client.callControl(
        callId,
        'playback_start',
        { audio_url: prompt.uri, client_state: clientState },
        { session_id: context.sessionId, prompt_seq: context.promptSeq },
      );
      return;
    }

    await this.options.client.callControl(
      callId,
      'speak',
      {
        payload: prompt.text,
        voice: this.options.ttsVoice,
        language: this.options.ttsLanguage,
        client_state: clientState,
      },
      { session_id: context.sessionId, prompt_seq: context.promptSeq },
    );
  }

  public async startRecording(callId: GatewayCallId, context: GatewayCallContext): Promise<void> {
    await this.options.client.callControl(
      callId,
      'record_start',
      {
        format: 'wav',
        channels: 'single',
        play_beep: true,
        max_length: this.options.recordingMaxSeconds,
        timeout_secs: this.options.recordingSilenceSeconds,
        client_state: encodeClientState(context),
      },
      { session_id: context.sessionId, question_index: context.questionIndex },
    );
  }

  public async stopRecording(callId: GatewayCallId, context: GatewayCallContext): Promise<void> {
    await this.options.client.callControl(
      callId,
      'record_stop',
      { client_state: encodeClientState(context) },
      { session_id: context.sessionId, question_index: context.questionIndex },
    );
  }

  public async endCall(callId: GatewayCallId, context: GatewayCallContext): Promise<void> {
    await this.options.client.callControl(callId, 'hangup', undefined, { session_id: context.sessionId });
  }
}
