import { log } from '../log';
import { TranscriptionError } from '../survey/errors';

export function looksLikeWav(buf: Buffer): boolean {
  if (buf.length < 12) return false;
  return buf.toString('ascii', 0, 4) === 'RIFF' && buf.toString('ascii', 8, 12) === 'WAVE';
}

/** Throws a non-retryable TranscriptionError when the recording is not RIFF/WAVE. */
export function assertLooksLikeWav(buf: Buffer, context: Record<string, unknown> = {}): void {
  if (looksLikeWav(buf)) return;

  log.error(
    {
      event: 'recording_invalid_wav',
      buf_len: buf.length,
      first_bytes_hex: buf.subarray(0, 32).toString('hex'),
      ...context,
    },
    'recording is not a wav payload',
  );
  throw new TranscriptionError('invalid_wav_payload', false);
}
