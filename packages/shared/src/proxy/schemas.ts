import { z } from 'zod';

export const LlmProviderSchema = z.enum(['openai', 'anthropic', 'google']);
export type LlmProvider = z.infer<typeof LlmProviderSchema>;

export const ProviderNameSchema = z.enum(['elevenlabs', 'openai', 'anthropic', 'google']);
export type ProviderName = z.infer<typeof ProviderNameSchema>;

export const SimplificationLevelSchema = z.enum(['A1', 'A2', 'B1']);
export type SimplificationLevel = z.infer<typeof SimplificationLevelSchema>;

export const DEFAULT_VOICE_ID = '21m00Tcm4TlvDq8ikWAM' as const;
export const DEFAULT_SPEECH_MODEL_ID = 'eleven_multilingual_v2' as const;
export const DEFAULT_LANGUAGE_CODE = 'de' as const;

const MAX_TEXT_LENGTH = 100_000;
const MAX_API_KEY_LENGTH = 500;

const requiredText = (field: string, max = MAX_TEXT_LENGTH) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .min(1, `${field} is required`)
    .max(max, `${field} must be at most ${max} characters`);

const optionalSessionCode = z
  .string({ invalid_type_error: 'sessionCode must be a string' })
  .trim()
  .toUpperCase()
  .max(12, 'sessionCode must be at most 12 characters')
  .optional();

const credentialFields = {
  apiKey: z
    .string({ invalid_type_error: 'apiKey must be a string' })
    .trim()
    .max(MAX_API_KEY_LENGTH, `apiKey must be at most ${MAX_API_KEY_LENGTH} characters`)
    .optional(),
  sessionCode: optionalSessionCode,
};

export const SpeechRequestSchema = z.object({
  ...credentialFields,
  text: requiredText('text', 10_000),
  voiceId: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,64}$/, 'voiceId must be an alphanumeric identifier')
    .optional(),
  modelId: z.string().trim().min(1).max(100).optional(),
  languageCode: z
    .string()
    .trim()
    .toLowerCase()
    .regex(/^[a-z]{2,3}$/, 'languageCode must be an ISO 639 code')
    .optional(),
});
export type SpeechRequest = z.infer<typeof SpeechRequestSchema>;

export const CompletionRequestSchema = z.object({
  ...credentialFields,
  provider: LlmProviderSchema.optional(),
  prompt: requiredText('prompt'),
  system: z.string().max(MAX_TEXT_LENGTH).optional(),
  model: z.string().trim().min(1).max(200).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().max(16_000).optional(),
});
export type CompletionRequest = z.infer<typeof CompletionRequestSchema>;

export const GenerateTasksRequestSchema = z.object({
  ...credentialFields,
  provider: LlmProviderSchema.optional(),
  text: requiredText('text'),
});
export type GenerateTasksRequest = z.infer<typeof GenerateTasksRequestSchema>;

export const TranslateRequestSchema = z.object({
  ...credentialFields,
  provider: LlmProviderSchema.optional(),
  text: requiredText('text'),
  targetLanguage: z
    .string()
    .trim()
    .toLowerCase()
    .regex(/^[a-z]{2,3}$/, 'targetLanguage must be an ISO 639 code')
    .default(DEFAULT_LANGUAGE_CODE),
});
export type TranslateRequest = z.infer<typeof TranslateRequestSchema>;

export const SimplifyTextRequestSchema = z.object({
  text: z
    .string({ required_error: 'text is required' })
    .trim()
    .min(1, 'text is required')
    .max(MAX_TEXT_LENGTH),
  level: z
    .string()
    .trim()
    .toUpperCase()
    .pipe(SimplificationLevelSchema)
    .default('A2'),
  sessionCode: z
    .string({ required_error: 'sessionCode is required' })
    .trim()
    .toUpperCase()
    .min(1, 'sessionCode is required'),
});
export type SimplifyTextRequest = z.infer<typeof SimplifyTextRequestSchema>;

export const WordInfoRequestSchema = z.object({
  word: z.string({ required_error: 'word is required' }).trim().min(1, 'word is required').max(100),
  sessionCode: optionalSessionCode,
  targetLanguage: z.string().trim().toLowerCase().max(3).optional(),
});
export type WordInfoRequest = z.infer<typeof WordInfoRequestSchema>;

export const WordInfoSchema = z
  .object({
    article: z.string(),
    plural: z.string(),
    wordType: z.string(),
    simpleExplanation: z.string(),
    exampleSentence: z.string(),
    syllables: z.string(),
    translation: z.string(),
  })
  .partial();
export type WordInfo = z.infer<typeof WordInfoSchema>;

export const ProviderErrorEnvelopeSchema = z.object({
  success: z.literal(false),
  error: z.string(),
  message: z.string(),
  timestamp: z.number().int().nonnegative(),
  provider: ProviderNameSchema.optional(),
  upstream: z.unknown().optional(),
  details: z.array(z.object({ path: z.string(), message: z.string() })).optional(),
});
export type ProviderErrorEnvelope = z.infer<typeof ProviderErrorEnvelopeSchema>;
