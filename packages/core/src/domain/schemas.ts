import { z } from 'zod';

export const SCHEMA_VERSION = 1;

export const SessionModeSchema = z.enum(['transcribe', 'ask', 'respond', 'code', 'process']);
export type SessionMode = z.infer<typeof SessionModeSchema>;

export const SessionStateSchema = z.enum([
  'idle',
  'recording',
  'transcribing',
  'processing',
  'showingResult',
  'error',
]);
export type SessionState = z.infer<typeof SessionStateSchema>;

export const FormattingStyleSchema = z.enum(['standard', 'structured', 'condensed']);
export type FormattingStyle = z.infer<typeof FormattingStyleSchema>;

export const CodeLanguageSchema = z.enum(['auto', 'python', 'bash']);
export type CodeLanguage = z.infer<typeof CodeLanguageSchema>;

export const OutputRoutingSchema = z.enum(['autoPaste', 'showInChat']);
export type OutputRouting = z.infer<typeof OutputRoutingSchema>;

// 'auto' or an ISO-639-1 code.
export const LanguageSchema = z.union([z.literal('auto'), z.string().regex(/^[a-z]{2}$/)]);
export type Language = z.infer<typeof LanguageSchema>;

export const ConversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});
export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

export const MODES_USING_CLIPBOARD: readonly SessionMode[] = ['respond', 'process'];

export const usesClipboard = (mode: SessionMode) => MODES_USING_CLIPBOARD.includes(mode);

export const DEFAULT_CLEANUP_PROMPT =
  'Fix grammar, punctuation, and formatting. Keep the original meaning and style. Return only the corrected text without explanations.';

export const SettingsSchema = z.object({
  language: LanguageSchema.default('auto'),
  postProcessing: z.boolean().default(true),
  cleanupPrompt: z.string().min(1).default(DEFAULT_CLEANUP_PROMPT),
  transcriptionModel: z.string().default('whisper-1'),
  completionModel: z.string().default('gpt-4o-mini'),
  visionModel: z.string().default('gpt-4o'),
  searchModel: z.string().default('gpt-4o-search-preview'),
  webSearch: z.boolean().default(false),
  outputRouting: OutputRoutingSchema.default('autoPaste'),
  customTerminology: z.array(z.string().trim().min(1)).default([]),
  pasteSettleDelayMs: z.number().int().min(0).default(500),
  errorDisplayMs: z.number().int().min(0).default(3000),
});
export type Settings = z.infer<typeof SettingsSchema>;

export const SettingsEnvelopeSchema = z.object({
  version: z.number().int().min(0).optional(),
  payload: z.unknown(),
});
export type SettingsEnvelope = z.infer<typeof SettingsEnvelopeSchema>;
