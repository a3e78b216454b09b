import { vi } from 'vitest';
import type {
  AppHandle,
  AudioHandle,
  ClipboardSnapshot,
  CredentialStore,
  SessionSurface,
} from '@vocalis/platform';

/** Shared, ordered record of side effects across fakes. */
export type CallLog = string[];

export const makeAudioHandle = (overrides: Partial<AudioHandle> = {}): AudioHandle => ({
  filePath: '/tmp/recording-1.m4a',
  byteLength: 2048,
  durationMs: 1200,
  mimeType: 'audio/m4a',
  ...overrides,
});

export interface FakeAudioOptions {
  handle?: AudioHandle | null;
  levels?: number[];
  startError?: Error;
}

export const createFakeAudio = (log: CallLog, options: FakeAudioOptions = {}) => {
  let capturing = false;
  let handle = options.handle === undefined ? makeAudioHandle() : options.handle;
  const levels = options.levels ?? [];
  return {
    start: vi.fn(async () => {
      log.push('audio:start');
      if (options.startError) throw options.startError;
      capturing = true;
    }),
    stop: vi.fn(async () => {
      log.push('audio:stop');
      capturing = false;
      return handle;
    }),
    async *levelStream() {
      for (const level of levels) {
        if (!capturing) return;
        yield level;
      }
    },
    setHandle: (next: AudioHandle | null) => {
      handle = next;
    },
  };
};

export const createFakeClipboard = (log: CallLog, initial: ClipboardSnapshot = { kind: 'empty' }) => {
  let contents: ClipboardSnapshot = initial;
  const written: string[] = [];
  return {
    written,
    set: (next: ClipboardSnapshot) => {
      contents = next;
    },
    snapshot: vi.fn(async (): Promise<ClipboardSnapshot> => {
      log.push('clipboard:snapshot');
      return contents;
    }),
    writeText: vi.fn(async (text: string) => {
      log.push(`clipboard:write:${text}`);
      written.push(text);
      contents = { kind: 'text', text };
    }),
  };
};

export const createFakeFocus = (
  log: CallLog,
  current: AppHandle | null = { id: 'com.example.editor', name: 'Editor' }
) => ({
  captureCurrent: vi.fn(async () => {
    log.push('focus:capture');
    return current;
  }),
  reactivate: vi.fn(async (app: AppHandle) => {
    log.push(`focus:reactivate:${app.id}`);
  }),
  simulatePaste: vi.fn(async () => {
    log.push('focus:paste');
  }),
});

export const createFakeCredentials = (initial: string | null = 'test-secret') => {
  let apiKey = initial;
  const store: CredentialStore = {
    hasCredential: async () => apiKey !== null,
    getApiKey: async () => apiKey,
  };
  return {
    ...store,
    setApiKey: (next: string | null) => {
      apiKey = next;
    },
  };
};

export const createFakeSurface = (log: CallLog): SessionSurface => ({
  show: vi.fn(async () => {
    log.push('surface:show');
  }),
  hide: vi.fn(async () => {
    log.push('surface:hide');
  }),
});

/** A promise whose settlement the test controls. */
export const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

/** Lets every queued microtask run. Not usable under fake timers. */
export const flushAsync = () => new Promise<void>((resolve) => setImmediate(resolve));
