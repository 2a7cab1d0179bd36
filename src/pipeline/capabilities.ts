import type { PipelineStage, SessionId } from '../survey/types';

/** Identifies one stage run for one answer; passed to every capability call. */
export interface StageTag {
  sessionId: SessionId;
  questionIndex: number;
  stage: PipelineStage;
}

export interface CapabilityCallOptions {
  signal: AbortSignal;
  tag: StageTag;
}

export interface VoiceProfile {
  voice?: string;
  language: string;
}

export interface Transcriber {
  /** Rejects with TranscriptionError. */
  transcribe(audioUri: string, options: CapabilityCallOptions): Promise<string>;
}

export interface LanguageDetector {
  /** Resolves an ISO 639-1 code; rejects with DetectionError. */
  detectLanguage(transcript: string, options: CapabilityCallOptions): Promise<string>;
}

export interface Translator {
  /** Rejects with TranslationError. */
  translate(
    text: string,
    targetLanguage: string,
    options: CapabilityCallOptions & { sourceLanguage?: string },
  ): Promise<string>;
}

export interface Synthesizer {
  /** Resolves the URI of the stored audio; rejects with SynthesisError. */
  synthesize(text: string, voiceProfile: VoiceProfile, options: CapabilityCallOptions): Promise<string>;
}

export interface AudioCapabilities {
  transcriber: Transcriber;
  detector: LanguageDetector;
  translator: Translator;
  synthesizer: Synthesizer;
}
