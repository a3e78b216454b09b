import { vi } from 'vitest';
import type { AudioHandle, ClipboardSnapshot } from '@vocalis/platform';
import {
  createSessionStateMachine,
  SettingsSchema,
  type CompletionRequest,
  type ImageCompletionRequest,
  type SessionEvent,
  type Settings,
  type TranscriptionOptions,
  type TranscriptionResult,
} from '@vocalis/core';
import {
  type CallLog,
  type FakeAudioOptions,
  createFakeAudio,
  createFakeClipboard,
  createFakeCredentials,
  createFakeFocus,
  createFakeSurface,
} from './platform';

export interface HarnessOptions {
  settings?: Partial<Settings>;
  audio?: FakeAudioOptions;
  clipboard?: ClipboardSnapshot;
  apiKey?: string | null;
  transcript?: TranscriptionResult;
}

export const createSessionHarness = (options: HarnessOptions = {}) => {
  const log: CallLog = [];
  const events: SessionEvent[] = [];
  let settings = SettingsSchema.parse({ pasteSettleDelayMs: 0, ...options.settings });

  const audio = createFakeAudio(log, options.audio);
  const clipboard = createFakeClipboard(log, options.clipboard);
  const focus = createFakeFocus(log);
  const surface = createFakeSurface(log);
  const credentials = createFakeCredentials(
    options.apiKey === undefined ? 'test-secret' : options.apiKey
  );
  const transcription = {
    transcribe: vi.fn(
      async (_audio: AudioHandle, _options?: TranscriptionOptions): Promise<TranscriptionResult> => {
        log.push('transcribe');
        return options.transcript ?? { text: 'hello world' };
      }
    ),
  };
  const completion = {
    complete: vi.fn(async (request: CompletionRequest) => {
      log.push('complete');
      return `processed: ${request.user}`;
    }),
    completeWithImage: vi.fn(async (request: ImageCompletionRequest) => {
      log.push('completeWithImage');
      return `image: ${request.user}`;
    }),
  };
  const releaseAudio = vi.fn(async (handle: AudioHandle) => {
    log.push(`release:${handle.filePath}`);
  });
  const sleep = vi.fn(async (ms: number) => {
    log.push(`sleep:${ms}`);
  });

  const controller = createSessionStateMachine({
    audio,
    transcription,
    completion,
    clipboard,
    focus,
    credentials,
    surface,
    settings: () => settings,
    releaseAudio,
    sleep,
  });
  controller.onEvent((event) => {
    events.push(event);
  });

  return {
    controller,
    log,
    events,
    audio,
    clipboard,
    focus,
    surface,
    transcription,
    completion,
    releaseAudio,
    sleep,
    setApiKey: credentials.setApiKey,
    updateSettings: (patch: Partial<Settings>) => {
      settings = SettingsSchema.parse({ ...settings, ...patch });
    },
    states: () =>
      events.flatMap((event) => (event.type === 'state' ? [event.state] : [])),
    results: () => events.flatMap((event) => (event.type === 'result' ? [event] : [])),
  };
};
