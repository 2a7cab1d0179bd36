import { log } from '../log';
import type { CapabilityCallOptions, Synthesizer, VoiceProfile } from '../pipeline/capabilities';
import type { AudioStore } from '../storage/audioStore';
import { SynthesisError } from '../survey/errors';
import type { TTSRequest, TTSResult } from './types';

export async function synthesizeSpeech(
  kokoroUrl: string,
  request: TTSRequest,
  signal?: AbortSignal,
): Promise<TTSResult> {
  const response = await fetch(kokoroUrl, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      text: request.text,
      voice: request.voice,
      language: request.language,
    }),
    signal,
  });

  if (!response.ok) {
    const body = await response.text();
    log.error({ event: 'kokoro_tts_error', status: response.status, body }, 'kokoro tts error');
    throw new SynthesisError(`kokoro tts error ${response.status}`, response.status === 429 || response.status >= 500);
  }

  const arrayBuffer = await response.arrayBuffer();
  return {
    audio: Buffer.from(arrayBuffer),
    contentType: response.headers.get('content-type') ?? 'audio/wav',
  };
}

export class KokoroSynthesizer implements Synthesizer {
  constructor(
    private readonly kokoroUrl: string,
    private readonly audioStore: AudioStore,
  ) {}

  public async synthesize(text: string, voiceProfile: VoiceProfile, { signal, tag }: CapabilityCallOptions): Promise<string> {
    const startedAt = Date.now();
    const result = await synthesizeSpeech(
      this.kokoroUrl,
      { text, voice: voiceProfile.voice, language: voiceProfile.language },
      signal,
    );
    if (result.audio.length === 0) {
      throw new SynthesisError('kokoro returned no audio');
    }

    const uri = await this.audioStore.storeWav(tag.sessionId, `q${tag.questionIndex}`, result.audio);
    log.info(
      {
        event: 'tts_synthesized',
        session_id: tag.sessionId,
        question_index: tag.questionIndex,
        duration_ms: Date.now() - startedAt,
        audio_bytes: result.audio.length,
        audio_url: uri,
      },
      'tts synthesized',
    );
    return uri;
  }
}
