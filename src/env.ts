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

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(fallback));

const positiveNumber = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().positive().default(fallback));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  PUBLIC_BASE_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),

  GEMINI_API_KEY: z.string().min(1),
  GEMINI_MODEL: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('gemini-2.5-flash-native-audio-preview-09-2025'),
  ),
  GEMINI_LIVE_URL: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .min(1)
      .default(
        'wss://generativelanguage.googleapis.com/ws/google.ai.generativelanguage.v1beta.GenerativeService.BidiGenerateContent',
      ),
  ),
  GEMINI_SETUP_TIMEOUT_MS: positiveInt(10000),
  MODEL_VOICE: z.preprocess(emptyToUndefined, z.string().min(1).default('Aoede')),
  MODEL_LANGUAGE: z.preprocess(emptyToUndefined, z.string().min(1).default('en-US')),
  MODEL_MAX_OUTPUT_TOKENS: positiveInt(256),
  MODEL_TEMPERATURE: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(2).default(0.5)),
  MODEL_SYSTEM_INSTRUCTION_PATH: z.preprocess(emptyToUndefined, z.string().min(1).optional()),

  VAD_SPEECH_THRESHOLD: positiveNumber(0.3),
  VAD_SILENCE_MS: positiveInt(300),
  VAD_MIN_SPEECH_MS: positiveInt(200),
  VAD_FRAME_MS: positiveInt(20),
  VAD_NOISE_FLOOR_MULTIPLIER: positiveNumber(3),
  BROWSER_LOCAL_VAD_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(false)),

  BATCH_MIN_MS: positiveInt(150),
  BATCH_DEFAULT_MS: positiveInt(200),
  BATCH_MAX_MS: positiveInt(300),
  BATCH_ADAPTIVE_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(true)),

  DEDUP_MAX_ENTRIES: positiveInt(100),
  DEDUP_EVICT_BATCH: positiveInt(20),
  OUTBOUND_MIN_INTERVAL_MS: nonNegativeInt(10),

  KEEPALIVE_INTERVAL_MS: positiveInt(20000),
  SILENCE_FALLBACK_MS: nonNegativeInt(0),

  MAX_CONCURRENT_SESSIONS: positiveInt(50),

  TOOL_TIMEOUT_MS: positiveInt(20000),
  SCHEDULING_WEBHOOK_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  return parsed.data;
}

export const env = parseEnv(process.env);
