import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return value;
};

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  TELNYX_API_KEY: z.string().min(1),
  TELNYX_PUBLIC_KEY: z.string().min(1),
  TELNYX_CONNECTION_ID: z.string().min(1),
  TELNYX_FROM_NUMBER: z.string().min(1),
  TELNYX_SKIP_SIGNATURE: z.preprocess(stringToBoolean, z.boolean().default(false)),
  TELNYX_WEBHOOK_SECRET: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  TELNYX_TTS_VOICE: z.preprocess(emptyToUndefined, z.string().min(1).default('female')),
  TELNYX_TTS_LANGUAGE: z.preprocess(emptyToUndefined, z.string().min(1).default('en-US')),
  PUBLIC_BASE_URL: z.string().min(1),
  AUDIO_PUBLIC_BASE_URL: z.string().min(1),
  AUDIO_STORAGE_DIR: z.string().min(1),
  AUDIO_RETENTION_MINUTES: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(1440)),
  WHISPER_URL: z.string().min(1),
  WHISPER_LANGUAGE: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  TRANSLATE_URL: z.string().min(1),
  TRANSLATE_API_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  TRANSLATE_CHUNK_CHARS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(1500)),
  KOKORO_URL: z.string().min(1),
  KOKORO_VOICE_ID: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  REDIS_URL: z.string().min(1),
  SESSION_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('survey')),

  SURVEY_TARGET_LANGUAGE: z.preprocess(emptyToUndefined, z.string().min(2).default('en')),
  SURVEY_QUESTIONS_FILE: z.preprocess(emptyToUndefined, z.string().min(1).default('config/questions.txt')),
  SURVEY_INTRO_MESSAGE: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .default('Hello. This is a research survey call. Please answer each question after the beep.'),
  ),
  SURVEY_CLOSING_MESSAGE: z.preprocess(
    emptyToUndefined,
    z.string().default('Thank you. The survey is complete. Goodbye.'),
  ),
  SILENCE_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().optional()),
  RECORDING_MAX_SECONDS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(120)),
  RECORDING_SILENCE_SECONDS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(5)),

  STAGE_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(30000)),
  STAGE_MAX_ATTEMPTS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(3)),
  STAGE_BACKOFF_BASE_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(500)),
  STAGE_BACKOFF_MAX_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(8000)),
  STAGE_CONCURRENCY: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(32)),
  CAS_MAX_ATTEMPTS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(5)),
  WORKER_CONCURRENCY: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(64)),
  GATEWAY_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(8000)),
  GATEWAY_MAX_RETRIES: z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(2)),

  RESULTS_LOG_PATH: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  CAMPAIGN_CONTACTS_FILE: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  CAMPAIGN_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(false)),
  CAMPAIGN_MAX_ATTEMPTS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(3)),
  CAMPAIGN_RETRY_GAP_MINUTES: z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(60)),
  CAMPAIGN_INTERVAL_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(15000)),
  OPERATOR_API_TOKEN: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;
export type RuntimeEnv = typeof env;
