import { z } from 'zod';
import type { AudioHandle } from '@vocalis/platform';
import type { ConversationTurn } from '../domain/schemas';

export interface TranscriptionResult {
  text: string;
  /** Language tag reported by the service, when it reports one. */
  language?: string;
}

export interface TranscriptionOptions {
  language?: string;
  /** Falls back to the client's `transcriptionModel`. */
  model?: string;
  signal?: AbortSignal;
}

export interface TranscriptionClient {
  transcribe(audio: AudioHandle, options?: TranscriptionOptions): Promise<TranscriptionResult>;
}

export interface CompletionRequest {
  system: string;
  user: string;
  history: readonly ConversationTurn[];
  model: string;
  webSearch: boolean;
  temperature?: number;
  signal?: AbortSignal;
}

export interface ImageCompletionRequest {
  system: string;
  user: string;
  image: Uint8Array;
  model: string;
  signal?: AbortSignal;
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
  completeWithImage(request: ImageCompletionRequest): Promise<string>;
}

export const TranscriptionResponseSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
});

export const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().optional(),
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

export const ApiErrorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
  }),
});

export interface OpenAiClientOptions {
  fetcher: typeof fetch;
  baseUrl: string;
  getApiKey: () => Promise<string | null>;
  /** Defaults to reading `filePath` from disk. */
  readAudio?: (audio: AudioHandle) => Promise<Uint8Array>;
  transcriptionModel?: string;
}
