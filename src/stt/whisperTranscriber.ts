import { fetch, type Dispatcher } from 'undici';
import { log } from '../log';
import type { CapabilityCallOptions, Transcriber } from '../pipeline/capabilities';
import { TranscriptionError } from '../survey/errors';
import { assertLooksLikeWav } from './wavGuard';

export interface WhisperTranscriberOptions {
  whisperUrl: string;
  /** Language hint forwarded to the server; omitted lets Whisper detect. */
  language?: string;
  /** Bearer token for fetching recordings that are not public. */
  recordingAuthToken?: string;
  dispatcher?: Dispatcher;
}

function previewText(text: string, max = 120): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function extractText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data && typeof data === 'object' && 'text' in data && typeof data.text === 'string') {
    return data.text;
  }
  return '';
}

/**
 * Transcribes a recorded answer: downloads the recording, checks it is a
 * WAV payload and posts it to a Whisper-compatible HTTP server.
 */
export class WhisperTranscriber implements Transcriber {
  constructor(private readonly options: WhisperTranscriberOptions) {}

  public async transcribe(audioUri: string, { signal, tag }: CapabilityCallOptions): Promise<string> {
    const logContext = { session_id: tag.sessionId, question_index: tag.questionIndex };
    const audio = await this.download(audioUri, signal);

    assertLooksLikeWav(audio, logContext);

    const url = new URL(this.options.whisperUrl);
    if (this.options.language) {
      url.searchParams.set('language', this.options.language);
    }

    const startedAt = Date.now();
    log.info(
      { event: 'whisper_fetch_start', bytes: audio.length, whisperUrl: url.toString(), ...logContext },
      'sending wav to whisper',
    );

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'audio/wav',
        Accept: 'application/json, text/plain;q=0.9, */*;q=0.1',
      },
      body: audio,
      signal,
      dispatcher: this.options.dispatcher,
    });

    const contentType = response.headers.get('content-type') ?? '';
    const respText = await response.text();

    if (!response.ok) {
      const preview = previewText(respText, 700);
      log.error(
        { event: 'whisper_error', status: response.status, body_preview: preview, ...logContext },
        'whisper request failed',
      );
      throw new TranscriptionError(`whisper error ${response.status}: ${preview}`, isRetryableStatus(response.status));
    }

    let text = respText;
    if (contentType.includes('application/json')) {
      try {
        text = extractText(JSON.parse(respText));
      } catch {
        throw new TranscriptionError('whisper returned malformed json');
      }
    }

    log.info(
      {
        event: 'whisper_response',
        status: response.status,
        elapsed_ms: Date.now() - startedAt,
        transcript_length: text.length,
        transcript_preview: previewText(text),
        ...logContext,
      },
      'whisper response',
    );
    return text.trim();
  }

  private async download(audioUri: string, signal: AbortSignal): Promise<Buffer> {
    const headers: Record<string, string> = {};
    if (this.options.recordingAuthToken) {
      headers.Authorization = `Bearer ${this.options.recordingAuthToken}`;
    }

    const response = await fetch(audioUri, { headers, signal, dispatcher: this.options.dispatcher });
    if (!response.ok) {
      throw new TranscriptionError(
        `recording download failed: ${response.status}`,
        isRetryableStatus(response.status),
      );
    }
    return Buffer.from(await response.arrayBuffer());
  }
}
