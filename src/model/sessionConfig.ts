import fs from 'fs';
import { z } from 'zod';
import type { Env } from '../env';
import { log } from '../log';

const DEFAULT_SYSTEM_INSTRUCTION = [
  'You are a helpful voice assistant on a live call.',
  'Wait for the caller to finish speaking before you answer.',
  'Keep answers short and conversational.',
  'Reply in the language the session is configured for unless asked otherwise.',
].join('\n');

const SensitivitySchema = z.enum(['LOW', 'HIGH']);

export const FunctionDeclarationSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  parameters: z.record(z.unknown()),
});

export type FunctionDeclaration = z.infer<typeof FunctionDeclarationSchema>;

export const ModelSessionConfigSchema = z.object({
  model: z.string().min(1),
  voice: z.string().min(1).default('Aoede'),
  languageCode: z.string().min(2).default('en-US'),
  maxOutputTokens: z.number().int().positive().max(8192).default(256),
  temperature: z.number().min(0).max(2).default(0.5),
  topP: z.number().gt(0).max(1).default(0.8),
  topK: z.number().int().positive().default(20),
  responseModalities: z.array(z.enum(['AUDIO', 'TEXT'])).min(1).default(['AUDIO']),
  inputTranscription: z.boolean().default(true),
  outputTranscription: z.boolean().default(true),
  automaticVad: z
    .object({
      enabled: z.boolean().default(true),
      startSensitivity: SensitivitySchema.default('HIGH'),
      endSensitivity: SensitivitySchema.default('HIGH'),
      prefixPaddingMs: z.number().int().nonnegative().default(0),
      silenceDurationMs: z.number().int().positive().default(300),
    })
    .default({}),
  systemInstruction: z.string().min(1).default(DEFAULT_SYSTEM_INSTRUCTION),
  tools: z.array(FunctionDeclarationSchema).default([]),
});

export type ModelSessionConfig = z.infer<typeof ModelSessionConfigSchema>;
export type ModelSessionConfigInput = z.input<typeof ModelSessionConfigSchema>;

export function parseModelSessionConfig(input: ModelSessionConfigInput): ModelSessionConfig {
  const parsed = ModelSessionConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid model session config: ${issues}`);
  }
  return parsed.data;
}

let cachedInstruction: { path: string | undefined; text: string } | undefined;

export function loadSystemInstruction(path: string | undefined): string {
  if (cachedInstruction && cachedInstruction.path === path) {
    return cachedInstruction.text;
  }

  let text = DEFAULT_SYSTEM_INSTRUCTION;
  if (path) {
    try {
      const fromFile = fs.readFileSync(path, 'utf8').trim();
      if (fromFile) {
        text = fromFile;
      }
    } catch (error) {
      log.warn({ err: error, path }, 'system instruction file unreadable, using default');
    }
  }

  cachedInstruction = { path, text };
  return text;
}

export type SessionProfile = 'telephony' | 'browser';

/**
 * Telephony turns are driven by the local VAD, so the model's own activity detection is
 * switched off there. Browser sessions keep it on.
 */
export function buildSessionConfig(
  profile: SessionProfile,
  config: Env,
  tools: FunctionDeclaration[] = [],
): ModelSessionConfig {
  return parseModelSessionConfig({
    model: config.GEMINI_MODEL,
    voice: config.MODEL_VOICE,
    languageCode: config.MODEL_LANGUAGE,
    maxOutputTokens: config.MODEL_MAX_OUTPUT_TOKENS,
    temperature: config.MODEL_TEMPERATURE,
    responseModalities: ['AUDIO'],
    inputTranscription: true,
    outputTranscription: true,
    automaticVad:
      profile === 'telephony'
        ? { enabled: false }
        : {
            enabled: true,
            startSensitivity: 'HIGH',
            endSensitivity: 'HIGH',
            prefixPaddingMs: 0,
            silenceDurationMs: 300,
          },
    systemInstruction: loadSystemInstruction(config.MODEL_SYSTEM_INSTRUCTION_PATH),
    tools,
  });
}
