import path from 'path';
import { CampaignDialer } from './campaign/dialer';
import { loadContactsFile } from './campaign/participants';
import { RedisParticipantStore } from './campaign/participantStore';
import type { RuntimeEnv } from './env';
import { log } from './log';
import { AudioPipeline } from './pipeline/audioPipeline';
import { closeRedis, configureRedis } from './redis/client';
import { ResultsLog } from './results/resultsLog';
import type { ServerDependencies } from './server';
import { AudioStore } from './storage/audioStore';
import { WhisperTranscriber } from './stt/whisperTranscriber';
import { SurveyOrchestrator } from './survey/orchestrator';
import { loadQuestionsFile } from './survey/questions';
import { RedisSessionStore } from './survey/redisSessionStore';
import { TelnyxClient } from './telnyx/telnyxClient';
import { TelnyxGateway } from './telnyx/telnyxGateway';
import { LibreTranslateClient } from './translate/libreTranslate';
import { KokoroSynthesizer } from './tts/kokoroTTS';

export interface Runtime {
  orchestrator: SurveyOrchestrator;
  dialer?: CampaignDialer;
  server: ServerDependencies;
  close(): Promise<void>;
}

function textPrompt(text: string): { kind: 'text'; text: string } | undefined {
  const trimmed = text.trim();
  return trimmed === '' ? undefined : { kind: 'text', text: trimmed };
}

/** Maps validated configuration onto the survey engine and its adapters. */
export async function createRuntime(env: RuntimeEnv): Promise<Runtime> {
  const redis = configureRedis(env.REDIS_URL);
  const publicBaseUrl = env.PUBLIC_BASE_URL.replace(/\/$/, '');
  const audioDir = path.resolve(env.AUDIO_STORAGE_DIR);

  const questions = await loadQuestionsFile(path.resolve(env.SURVEY_QUESTIONS_FILE));
  if (questions.length === 0) {
    log.warn({ event: 'survey_questions_empty', file: env.SURVEY_QUESTIONS_FILE }, 'question list is empty');
  }

  const audioStore = new AudioStore({
    storageDir: audioDir,
    publicBaseUrl: env.AUDIO_PUBLIC_BASE_URL,
    retentionMs: env.AUDIO_RETENTION_MINUTES * 60 * 1000,
  });
  const translator = new LibreTranslateClient({
    baseUrl: env.TRANSLATE_URL,
    apiKey: env.TRANSLATE_API_KEY,
    maxChunkChars: env.TRANSLATE_CHUNK_CHARS,
  });

  const pipeline = new AudioPipeline({
    capabilities: {
      transcriber: new WhisperTranscriber({ whisperUrl: env.WHISPER_URL, language: env.WHISPER_LANGUAGE }),
      detector: translator,
      translator,
      synthesizer: new KokoroSynthesizer(env.KOKORO_URL, audioStore),
    },
    targetLanguage: env.SURVEY_TARGET_LANGUAGE,
    voiceProfile: { voice: env.KOKORO_VOICE_ID, language: env.SURVEY_TARGET_LANGUAGE },
    stageTimeoutMs: env.STAGE_TIMEOUT_MS,
    retryPolicy: {
      maxAttempts: env.STAGE_MAX_ATTEMPTS,
      backoff: { baseMs: env.STAGE_BACKOFF_BASE_MS, maxMs: env.STAGE_BACKOFF_MAX_MS, jitterMs: 100 },
    },
    concurrency: env.STAGE_CONCURRENCY,
  });

  const gateway = new TelnyxGateway({
    client: new TelnyxClient({
      apiKey: env.TELNYX_API_KEY,
      timeoutMs: env.GATEWAY_TIMEOUT_MS,
      maxRetries: env.GATEWAY_MAX_RETRIES,
    }),
    connectionId: env.TELNYX_CONNECTION_ID,
    fromNumber: env.TELNYX_FROM_NUMBER,
    webhookUrl: `${publicBaseUrl}/v1/telnyx/webhook`,
    ttsVoice: env.TELNYX_TTS_VOICE,
    ttsLanguage: env.TELNYX_TTS_LANGUAGE,
    recordingMaxSeconds: env.RECORDING_MAX_SECONDS,
    recordingSilenceSeconds: env.RECORDING_SILENCE_SECONDS,
  });

  const orchestrator = new SurveyOrchestrator({
    store: new RedisSessionStore({ prefix: env.SESSION_PREFIX, redis }),
    gateway,
    pipeline,
    script: {
      introPrompt: textPrompt(env.SURVEY_INTRO_MESSAGE),
      closingPrompt: textPrompt(env.SURVEY_CLOSING_MESSAGE),
    },
    defaultQuestions: questions,
    workerConcurrency: env.WORKER_CONCURRENCY,
    casPolicy: { maxAttempts: env.CAS_MAX_ATTEMPTS, backoff: { baseMs: 10, maxMs: 200, jitterMs: 20 } },
    // the gateway client retries inside one action, so the outer bound covers all of them
    gatewayTimeoutMs: env.GATEWAY_TIMEOUT_MS * (env.GATEWAY_MAX_RETRIES + 1) + 2000,
    silenceTimeoutMs: env.SILENCE_TIMEOUT_MS,
  });

  if (env.RESULTS_LOG_PATH) {
    const resultsLog = new ResultsLog(path.resolve(env.RESULTS_LOG_PATH));
    orchestrator.onSessionTerminal((session) => resultsLog.append(session));
  }

  let dialer: CampaignDialer | undefined;
  if (env.CAMPAIGN_ENABLED) {
    const participants = new RedisParticipantStore({ prefix: env.SESSION_PREFIX, redis });
    if (env.CAMPAIGN_CONTACTS_FILE) {
      const contacts = await loadContactsFile(path.resolve(env.CAMPAIGN_CONTACTS_FILE));
      for (const contact of contacts) {
        await participants.upsertContact(contact);
      }
      log.info({ event: 'campaign_contacts_loaded', count: contacts.length }, 'campaign contacts loaded');
    }
    dialer = new CampaignDialer({
      store: participants,
      launcher: orchestrator,
      policy: {
        maxAttempts: env.CAMPAIGN_MAX_ATTEMPTS,
        retryGapMs: env.CAMPAIGN_RETRY_GAP_MINUTES * 60 * 1000,
      },
      intervalMs: env.CAMPAIGN_INTERVAL_MS,
    });
  }

  const audioServedLocally = env.AUDIO_PUBLIC_BASE_URL.replace(/\/$/, '') === `${publicBaseUrl}/audio`;

  return {
    orchestrator,
    dialer,
    server: {
      surveys: orchestrator,
      telnyxVerify: {
        publicKey: env.TELNYX_PUBLIC_KEY,
        webhookSecret: env.TELNYX_WEBHOOK_SECRET,
        skipVerification: env.TELNYX_SKIP_SIGNATURE,
      },
      operatorApiToken: env.OPERATOR_API_TOKEN,
      healthProbes: {
        redis: async () => {
          await redis.ping();
        },
      },
      audioDir: audioServedLocally ? audioDir : undefined,
    },
    async close() {
      await dialer?.stop();
      await orchestrator.shutdown();
      audioStore.stop();
      await closeRedis();
    },
  };
}
