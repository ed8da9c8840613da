import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().min(1).optional());

const EnvSchema = z.object({
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(8080)),
  HOST: z.preprocess(emptyToUndefined, z.string().min(1).default('127.0.0.1')),
  PUBLIC_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().default('http://127.0.0.1:8080')),
  AGENT_NAME: z.preprocess(emptyToUndefined, z.string().min(1).default('Nova')),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),

  LLM_API_KEY: optionalString,
  LLM_BASE_URL: z.preprocess(
    emptyToUndefined,
    z.string().url().default('https://api.groq.com/openai/v1'),
  ),
  LLM_MODEL: z.preprocess(emptyToUndefined, z.string().min(1).default('llama-3.3-70b-versatile')),
  LLM_TEMPERATURE: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(2).default(0.7)),
  LLM_MAX_TOKENS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(150)),
  BRAIN_URL: optionalString,
  COMPLETION_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(8000),
  ),
  HISTORY_MAX_TURNS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(10)),
  WORKER_POOL_SIZE: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(5)),

  TELNYX_API_KEY: optionalString,
  TELNYX_CONNECTION_ID: optionalString,
  TELNYX_PHONE_NUMBER: optionalString,
  TELNYX_PUBLIC_KEY: optionalString,
  TEXML_VOICE: z.preprocess(emptyToUndefined, z.string().min(1).default('Polly.Joanna')),
  TEXML_LANGUAGE: z.preprocess(emptyToUndefined, z.string().min(1).default('en-US')),

  WHISPER_URL: optionalString,
  SPEECH_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(30000)),
  KOKORO_URL: optionalString,
  KOKORO_VOICE_ID: optionalString,
  AUDIO_STORAGE_DIR: optionalString,
  AUDIO_PUBLIC_BASE_URL: optionalString,

  CALL_SESSION_IDLE_TTL_MINUTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().min(0).default(60),
  ),
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
