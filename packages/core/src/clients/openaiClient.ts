import { readFile } from 'fs/promises';
import { basename } from 'path';
import type { AudioHandle } from '@vocalis/platform';
import type { z } from 'zod';
import { ServiceError } from '../errors';
import { createLogger } from '../logging/logger';
import { redactSecrets } from '../security/redact';
import {
  ApiErrorResponseSchema,
  ChatCompletionResponseSchema,
  type CompletionClient,
  type CompletionRequest,
  type ImageCompletionRequest,
  type OpenAiClientOptions,
  type TranscriptionClient,
  type TranscriptionOptions,
  type TranscriptionResult,
  TranscriptionResponseSchema,
} from './types';

const logger = createLogger('openai');

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';

const joinUrl = (base: string, path: string) => {
  if (!base.endsWith('/') && !path.startsWith('/')) return `${base}/${path}`;
  if (base.endsWith('/') && path.startsWith('/')) return `${base}${path.slice(1)}`;
  return `${base}${path}`;
};

const readAudioFile = async (audio: AudioHandle) => new Uint8Array(await readFile(audio.filePath));

type ChatMessage =
  | { role: string; content: string }
  | {
      role: 'user';
      content: Array<
        { type: 'text'; text: string } | { type: 'image_url'; image_url: { url: string } }
      >;
    };

export const createOpenAiClient = (
  options: OpenAiClientOptions
): TranscriptionClient & CompletionClient => {
  const readAudio = options.readAudio ?? readAudioFile;
  const transcriptionModel = options.transcriptionModel ?? 'whisper-1';

  const requireApiKey = async () => {
    const apiKey = await options.getApiKey();
    if (!apiKey) {
      throw new ServiceError('No API key configured. Please add your OpenAI API key in Settings.');
    }
    return apiKey;
  };

  const request = async <T>(
    path: string,
    init: RequestInit,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> => {
    const apiKey = await requireApiKey();
    const url = joinUrl(options.baseUrl, path);
    const response = await options.fetcher(url, {
      ...init,
      headers: {
        ...(init.headers ?? {}),
        Authorization: `Bearer ${apiKey}`,
      },
    });

    if (!response.ok) {
      const details = await response.text();
      let message = `HTTP error ${response.status} from OpenAI API.`;
      try {
        const parsed = ApiErrorResponseSchema.safeParse(JSON.parse(details));
        if (parsed.success) message = parsed.data.error.message;
      } catch {
        // Non-JSON error bodies keep the status message.
      }
      logger.warn(`${path} failed with ${response.status}: ${redactSecrets(message)}`);
      throw new ServiceError(redactSecrets(message), response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ServiceError('Invalid response from OpenAI API.', response.status);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ServiceError('Invalid response from OpenAI API.', response.status);
    }
    return parsed.data;
  };

  const transcribe = async (
    audio: AudioHandle,
    transcriptionOptions: TranscriptionOptions = {}
  ): Promise<TranscriptionResult> => {
    const bytes = await readAudio(audio);
    const form = new FormData();
    form.append('model', transcriptionOptions.model ?? transcriptionModel);
    if (transcriptionOptions.language) form.append('language', transcriptionOptions.language);
    form.append('file', new Blob([bytes], { type: audio.mimeType }), basename(audio.filePath));
    const data = await request(
      '/audio/transcriptions',
      { method: 'POST', body: form, signal: transcriptionOptions.signal },
      TranscriptionResponseSchema
    );
    return { text: data.text, language: data.language };
  };

  const chat = async (body: Record<string, unknown>, signal?: AbortSignal) => {
    const data = await request(
      '/chat/completions',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal,
      },
      ChatCompletionResponseSchema
    );
    return data.choices[0].message.content ?? '';
  };

  const complete = async (completion: CompletionRequest) => {
    const messages: ChatMessage[] = [
      { role: 'system', content: completion.system },
      ...completion.history.map((turn) => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: completion.user },
    ];
    const body: Record<string, unknown> = {
      model: completion.model,
      messages,
    };
    if (completion.webSearch) {
      body.web_search_options = {};
    } else {
      body.temperature = completion.temperature ?? 0.7;
    }
    return chat(body, completion.signal);
  };

  const completeWithImage = async (completion: ImageCompletionRequest) => {
    const encoded = Buffer.from(completion.image).toString('base64');
    const messages: ChatMessage[] = [
      { role: 'system', content: completion.system },
      {
        role: 'user',
        content: [
          { type: 'text', text: completion.user },
          { type: 'image_url', image_url: { url: `data:image/png;base64,${encoded}` } },
        ],
      },
    ];
    return chat({ model: completion.model, messages, max_tokens: 4096 }, completion.signal);
  };

  return { transcribe, complete, completeWithImage };
};
