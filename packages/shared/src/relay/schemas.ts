import { z } from 'zod';

import { DEFAULT_VOICE_ID, LlmProviderSchema } from '../proxy/schemas.js';
import { ComprehensionTaskListSchema } from '../tasks/schemas.js';

export const SESSION_CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789' as const;
export const SESSION_CODE_LENGTH = 6;

export function normalizeSessionCode(raw: string): string {
  return raw.trim().toUpperCase();
}

export const SessionCodeSchema = z
  .string({ required_error: 'code is required', invalid_type_error: 'code must be a string' })
  .trim()
  .toUpperCase()
  .min(1, 'code is required')
  .max(12, 'code must be at most 12 characters');

export const PlaybackEventSchema = z.enum(['play', 'pause', 'seek']);
export type PlaybackEvent = z.infer<typeof PlaybackEventSchema>;

export const ControlEventSchema = z.enum(['play', 'pause', 'seek', 'join', 'leave']);
export type ControlEvent = z.infer<typeof ControlEventSchema>;

/**
 * Message fanned out to the students of a room. `position` is a word index
 * into the shared text, `speed` a playback rate multiplier.
 */
export const ControlMessageSchema = z.object({
  event: ControlEventSchema,
  position: z.number().int().nonnegative().optional(),
  speed: z.number().positive().max(4).optional(),
});
export type ControlMessage = z.infer<typeof ControlMessageSchema>;

export const InboundControlMessageSchema = ControlMessageSchema.extend({
  code: SessionCodeSchema,
  name: z.string().trim().max(50).optional(),
});
export type InboundControlMessage = z.infer<typeof InboundControlMessageSchema>;

export const SpeechToTextProviderSchema = z.enum(['browser', 'scribe']);
export type SpeechToTextProvider = z.infer<typeof SpeechToTextProviderSchema>;

export const CreateSessionPayloadSchema = z.object({
  elevenlabsKey: z
    .string({ required_error: 'ElevenLabs API key is required' })
    .trim()
    .min(1, 'ElevenLabs API key is required')
    .max(500),
  aiKey: z.string().trim().max(500).default(''),
  aiProvider: LlmProviderSchema.default('openai'),
  voiceId: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,64}$/, 'voiceId must be an alphanumeric identifier')
    .default(DEFAULT_VOICE_ID),
  sttProvider: SpeechToTextProviderSchema.default('browser'),
});
export type CreateSessionPayload = z.infer<typeof CreateSessionPayloadSchema>;
export type CreateSessionInput = z.input<typeof CreateSessionPayloadSchema>;

export const SessionCodePayloadSchema = z.object({
  code: SessionCodeSchema,
});

export const JoinSessionPayloadSchema = z.object({
  code: SessionCodeSchema,
  name: z.string().trim().max(50).optional(),
});
export type JoinSessionPayload = z.infer<typeof JoinSessionPayloadSchema>;

export const SetTextPayloadSchema = z.object({
  code: SessionCodeSchema,
  text: z.string({ required_error: 'text is required' }).max(100_000),
});

export const UpdateSettingsPayloadSchema = z.object({
  code: SessionCodeSchema,
  settings: z.record(z.unknown()).default({}),
});

export const ReleaseTasksPayloadSchema = z.object({
  code: SessionCodeSchema,
  tasks: ComprehensionTaskListSchema,
});

export const ToggleSimplificationPayloadSchema = z.object({
  code: SessionCodeSchema,
  enabled: z.boolean(),
});

export const StudentLevelSchema = z.enum(['original', 'A1', 'A2', 'B1']);
export type StudentLevel = z.infer<typeof StudentLevelSchema>;

export const StudentLevelPayloadSchema = z.object({
  code: SessionCodeSchema,
  level: StudentLevelSchema.default('original'),
});

export const TranslationRequestPayloadSchema = z.object({
  code: SessionCodeSchema,
  language: z.string().trim().toLowerCase().min(2).max(3),
});

export const TranslationLayoutSchema = z.enum(['side-by-side', 'below', 'replace']);
export type TranslationLayout = z.infer<typeof TranslationLayoutSchema>;

export const ApproveTranslationPayloadSchema = z.object({
  code: SessionCodeSchema,
  studentId: z.string().min(1),
  layout: TranslationLayoutSchema.default('side-by-side'),
});

export const DenyTranslationPayloadSchema = z.object({
  code: SessionCodeSchema,
  studentId: z.string().min(1),
});
