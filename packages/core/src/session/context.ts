import type { ClipboardSnapshot } from '@vocalis/platform';
import {
  type CodeLanguage,
  type ConversationTurn,
  type FormattingStyle,
  type Language,
  type OutputRouting,
  type SessionMode,
  type Settings,
  usesClipboard,
} from '../domain/schemas';

export interface SessionOptions {
  mode: SessionMode;
  language: Language;
  formattingStyle: FormattingStyle;
  codeLanguage: CodeLanguage;
  useClipboardContext: boolean;
  outputRouting: OutputRouting;
  terminologyCorrection: boolean;
}

export interface FrozenSessionContext extends Readonly<SessionOptions> {
  readonly clipboardSnapshot: ClipboardSnapshot;
  readonly conversationHistory: readonly ConversationTurn[];
}

export const EMPTY_CLIPBOARD: ClipboardSnapshot = Object.freeze({ kind: 'empty' });

export const defaultSessionOptions = (settings: Settings): SessionOptions => ({
  mode: 'transcribe',
  language: settings.language,
  formattingStyle: 'standard',
  codeLanguage: 'auto',
  useClipboardContext: true,
  outputRouting: settings.outputRouting,
  terminologyCorrection: true,
});

/**
 * Mutable per-recording context. Every mutator is a no-op returning `false`
 * once `freeze()` has been called; a clipboard read that was started before
 * the freeze may still land, and `settle()` waits for it.
 */
export interface SessionContext {
  readonly options: Readonly<SessionOptions>;
  readonly clipboardSnapshot: ClipboardSnapshot;
  isFrozen(): boolean;
  /** Returns true when the mode changed. */
  setMode(mode: SessionMode): boolean;
  setLanguage(language: Language): boolean;
  setFormattingStyle(style: FormattingStyle): boolean;
  setCodeLanguage(language: CodeLanguage): boolean;
  toggleClipboardContext(): boolean;
  toggleOutputRouting(): boolean;
  toggleTerminology(): boolean;
  /** Tracks a clipboard read for the current mode entry; a newer read supersedes an older one. */
  trackSnapshot(read: Promise<ClipboardSnapshot>): Promise<void>;
  freeze(): void;
  settle(history: readonly ConversationTurn[]): Promise<FrozenSessionContext>;
}

export const createSessionContext = (initial: SessionOptions): SessionContext => {
  const options: SessionOptions = { ...initial };
  let frozen = false;
  let snapshot: ClipboardSnapshot = EMPTY_CLIPBOARD;
  let snapshotGeneration = 0;
  let pendingSnapshot: Promise<void> | null = null;

  const mutate = (apply: () => void) => {
    if (frozen) return false;
    apply();
    return true;
  };

  const trackSnapshot = (read: Promise<ClipboardSnapshot>) => {
    snapshotGeneration += 1;
    const generation = snapshotGeneration;
    const tracked = read.then(
      (value) => {
        if (generation === snapshotGeneration) snapshot = value;
      },
      (error: unknown) => {
        if (generation === snapshotGeneration) snapshot = EMPTY_CLIPBOARD;
        throw error;
      }
    );
    pendingSnapshot = tracked;
    return tracked;
  };

  return {
    get options() {
      return options;
    },
    get clipboardSnapshot() {
      return snapshot;
    },
    isFrozen: () => frozen,
    setMode: (mode) => {
      if (frozen || options.mode === mode) return false;
      options.mode = mode;
      if (!usesClipboard(mode)) {
        // A read for a mode we already left must not overwrite anything.
        snapshotGeneration += 1;
        pendingSnapshot = null;
      }
      return true;
    },
    setLanguage: (language) => mutate(() => (options.language = language)),
    setFormattingStyle: (style) => mutate(() => (options.formattingStyle = style)),
    setCodeLanguage: (language) => mutate(() => (options.codeLanguage = language)),
    toggleClipboardContext: () =>
      mutate(() => (options.useClipboardContext = !options.useClipboardContext)),
    toggleOutputRouting: () =>
      mutate(
        () =>
          (options.outputRouting =
            options.outputRouting === 'autoPaste' ? 'showInChat' : 'autoPaste')
      ),
    toggleTerminology: () =>
      mutate(() => (options.terminologyCorrection = !options.terminologyCorrection)),
    trackSnapshot,
    freeze: () => {
      frozen = true;
    },
    settle: async (history) => {
      if (!frozen) {
        throw new Error('Session context must be frozen before it is settled');
      }
      if (pendingSnapshot) {
        try {
          await pendingSnapshot;
        } catch {
          // The failed read already reset the snapshot to empty.
        }
      }
      return Object.freeze({
        ...options,
        clipboardSnapshot: usesClipboard(options.mode) ? snapshot : EMPTY_CLIPBOARD,
        conversationHistory: Object.freeze(history.map((turn) => ({ ...turn }))),
      });
    },
  };
};
