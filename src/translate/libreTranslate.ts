import { fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { log } from '../log';
import type { CapabilityCallOptions, LanguageDetector, Translator } from '../pipeline/capabilities';
import { DetectionError, TranslationError } from '../survey/errors';

export interface LibreTranslateOptions {
  baseUrl: string;
  apiKey?: string;
  /** Longest piece of text sent in one translate request. */
  maxChunkChars: number;
  dispatcher?: Dispatcher;
}

const DetectResponseSchema = z.array(
  z.object({
    language: z.string().min(1),
    confidence: z.number().optional(),
  }),
);

const TranslateResponseSchema = z.object({
  translatedText: z.string(),
});

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Splits text into pieces of at most maxChars, preferring sentence ends,
 * then whitespace. Pieces are trimmed; joining them with a space restores
 * the text up to whitespace.
 */
export function splitIntoChunks(text: string, maxChars: number): string[] {
  const normalized = text.trim();
  if (normalized === '') {
    return [];
  }
  if (normalized.length <= maxChars) {
    return [normalized];
  }

  const sentences = normalized.match(/[^.!?]+[.!?]*\s*/g) ?? [normalized];
  const chunks: string[] = [];
  let current = '';

  const flush = (): void => {
    const trimmed = current.trim();
    if (trimmed !== '') {
      chunks.push(trimmed);
    }
    current = '';
  };

  for (const sentence of sentences) {
    if (current.length + sentence.length <= maxChars) {
      current += sentence;
      continue;
    }
    flush();
    if (sentence.length <= maxChars) {
      current = sentence;
      continue;
    }
    for (const word of sentence.split(/\s+/)) {
      if (word === '') {
        continue;
      }
      const candidate = current === '' ? word : `${current} ${word}`;
      if (candidate.length <= maxChars) {
        current = candidate;
        continue;
      }
      flush();
      // a single word longer than the limit is cut hard
      let rest = word;
      while (rest.length > maxChars) {
        chunks.push(rest.slice(0, maxChars));
        rest = rest.slice(maxChars);
      }
      current = rest;
    }
  }
  flush();
  return chunks;
}

/** Language detection and translation against a LibreTranslate-compatible server. */
export class LibreTranslateClient implements LanguageDetector, Translator {
  private readonly baseUrl: string;

  constructor(private readonly options: LibreTranslateOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
  }

  public async detectLanguage(transcript: string, { signal, tag }: CapabilityCallOptions): Promise<string> {
    const body = await this.post('/detect', { q: transcript }, signal, (message, retryable) => new DetectionError(message, retryable));
    const parsed = DetectResponseSchema.safeParse(body);
    if (!parsed.success || parsed.data.length === 0) {
      throw new DetectionError('detect response carried no language');
    }

    const best = parsed.data.reduce((top, candidate) =>
      (candidate.confidence ?? 0) > (top.confidence ?? 0) ? candidate : top,
    );
    log.info(
      {
        event: 'language_detected',
        session_id: tag.sessionId,
        question_index: tag.questionIndex,
        language: best.language,
        confidence: best.confidence,
      },
      'language detected',
    );
    return best.language;
  }

  public async translate(
    text: string,
    targetLanguage: string,
    { signal, tag, sourceLanguage }: CapabilityCallOptions & { sourceLanguage?: string },
  ): Promise<string> {
    const chunks = splitIntoChunks(text, this.options.maxChunkChars);
    const translated: string[] = [];

    for (const chunk of chunks) {
      const body = await this.post(
        '/translate',
        { q: chunk, source: sourceLanguage ?? 'auto', target: targetLanguage, format: 'text' },
        signal,
        (message, retryable) => new TranslationError(message, retryable),
      );
      const parsed = TranslateResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new TranslationError('translate response carried no translatedText');
      }
      translated.push(parsed.data.translatedText.trim());
    }

    log.info(
      {
        event: 'transcript_translated',
        session_id: tag.sessionId,
        question_index: tag.questionIndex,
        source: sourceLanguage,
        target: targetLanguage,
        chunks: chunks.length,
      },
      'transcript translated',
    );
    return translated.join(' ');
  }

  private async post(
    path: string,
    payload: Record<string, unknown>,
    signal: AbortSignal,
    toError: (message: string, retryable: boolean) => Error,
  ): Promise<unknown> {
    const body = this.options.apiKey ? { ...payload, api_key: this.options.apiKey } : payload;
    const response = await fetch(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(body),
      signal,
      dispatcher: this.options.dispatcher,
    });

    const text = await response.text();
    if (!response.ok) {
      log.warn(
        { event: 'translate_service_error', path, status: response.status, body_preview: text.slice(0, 300) },
        'translate service error',
      );
      throw toError(`${path} failed: ${response.status}`, isRetryableStatus(response.status));
    }

    try {
      return JSON.parse(text);
    } catch {
      throw toError(`${path} returned malformed json`, true);
    }
  }
}
