import { log } from '../log';
import { incStageError, observeStageDuration } from '../metrics';
import { RetryExhaustedError, retry, withTimeout, type RetryPolicy } from '../retry';
import { DetectionError, SurveyError, SynthesisError, TranscriptionError, describeError } from '../survey/errors';
import {
  PIPELINE_STAGES,
  STAGE_FIELDS,
  UNAVAILABLE,
  type AnswerRecord,
  type PipelineStage,
  type StageOutcome,
} from '../survey/types';
import type { AudioCapabilities, CapabilityCallOptions, StageTag, VoiceProfile } from './capabilities';
import { ConcurrencyLimiter } from './limiter';

export interface AudioPipelineOptions {
  capabilities: AudioCapabilities;
  targetLanguage: string;
  voiceProfile: VoiceProfile;
  stageTimeoutMs: number;
  retryPolicy: RetryPolicy;
  /** Cap on simultaneous outstanding capability calls across all sessions. */
  concurrency: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function stageKey(tag: StageTag): string {
  return `${tag.sessionId}:${tag.questionIndex}:${tag.stage}`;
}

/** First stage whose output field is still unset, in pipeline order. */
export function nextPendingStage(answer: AnswerRecord): PipelineStage | undefined {
  return PIPELINE_STAGES.find((stage) => answer[STAGE_FIELDS[stage]] === undefined);
}

function primaryLanguage(code: string): string {
  return code.trim().toLowerCase().split(/[-_]/)[0] ?? '';
}

function usable(value: string | undefined): string | undefined {
  return value === undefined || value === UNAVAILABLE ? undefined : value;
}

function isRetryable(error: unknown): boolean {
  return error instanceof SurveyError ? error.retryable : true;
}

/**
 * Runs single stages of the answer pipeline against the external
 * capabilities. Each stage call gets its own timeout, is retried with
 * backoff, and shares one concurrency cap with every other stage call.
 * Concurrent requests for the same (session, question, stage) share one run.
 */
export class AudioPipeline {
  private readonly limiter: ConcurrencyLimiter;
  private readonly inFlight = new Map<string, Promise<StageOutcome>>();

  constructor(private readonly options: AudioPipelineOptions) {
    this.limiter = new ConcurrencyLimiter(options.concurrency);
  }

  public get activeStageCalls(): number {
    return this.limiter.inFlight;
  }

  public runStage(tag: StageTag, answer: AnswerRecord): Promise<StageOutcome> {
    const key = stageKey(tag);
    const existing = this.inFlight.get(key);
    if (existing) {
      log.debug({ event: 'stage_run_joined', stage_key: key }, 'stage already running');
      return existing;
    }

    const run = this.execute(tag, answer).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  private async execute(tag: StageTag, answer: AnswerRecord): Promise<StageOutcome> {
    const startedAt = Date.now();
    const context = {
      session_id: tag.sessionId,
      question_index: tag.questionIndex,
      stage: tag.stage,
    };

    try {
      const { value, attempts } = await retry(
        () =>
          this.limiter.run(() =>
            withTimeout(
              (signal) => this.invoke(tag, answer, { signal, tag }),
              this.options.stageTimeoutMs,
              `stage ${tag.stage}`,
            ),
          ),
        this.options.retryPolicy,
        {
          label: `stage ${tag.stage}`,
          shouldRetry: isRetryable,
          sleep: this.options.sleep,
          random: this.options.random,
          onRetry: ({ error, attempt, waitMs }) => {
            incStageError(tag.stage);
            log.warn(
              { event: 'stage_retry', ...context, attempt, wait_ms: waitMs, err: error },
              'pipeline stage retry',
            );
          },
        },
      );

      const durationMs = Date.now() - startedAt;
      observeStageDuration(tag.stage, 'succeeded', durationMs);
      log.info(
        { event: 'stage_completed', ...context, attempts, duration_ms: durationMs },
        'pipeline stage completed',
      );
      return { status: 'succeeded', value };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      incStageError(tag.stage);
      observeStageDuration(tag.stage, 'failed', Date.now() - startedAt);
      log.warn({ event: 'stage_failed', ...context, err: cause }, 'pipeline stage failed');
      return { status: 'failed', reason: describeError(cause) };
    }
  }

  private async invoke(tag: StageTag, answer: AnswerRecord, call: CapabilityCallOptions): Promise<string> {
    const { capabilities, targetLanguage, voiceProfile } = this.options;

    switch (tag.stage) {
      case 'transcribe': {
        const uri = usable(answer.rawRecordingUri);
        if (!uri) {
          throw new TranscriptionError('no recording to transcribe', false);
        }
        return (await capabilities.transcriber.transcribe(uri, call)).trim();
      }
      case 'detect-language': {
        const transcript = usable(answer.transcript)?.trim();
        if (!transcript) {
          throw new DetectionError('empty_transcript', false);
        }
        return primaryLanguage(await capabilities.detector.detectLanguage(transcript, call));
      }
      case 'translate': {
        const transcript = usable(answer.transcript) ?? '';
        const source = usable(answer.detectedLanguage);
        if (source && primaryLanguage(source) === primaryLanguage(targetLanguage)) {
          return transcript;
        }
        return capabilities.translator.translate(transcript, targetLanguage, { ...call, sourceLanguage: source });
      }
      case 'synthesize': {
        const text = usable(answer.translatedTranscript)?.trim();
        if (!text) {
          throw new SynthesisError('nothing to synthesize', false);
        }
        return capabilities.synthesizer.synthesize(text, voiceProfile, call);
      }
    }
  }
}
