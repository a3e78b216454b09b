import type {
  AudioCaptureAdapter,
  ClipboardGateway,
  ClipboardSnapshot,
  CredentialStore,
  FocusGateway,
  SessionSurface,
} from '@vocalis/platform';
import type { CompletionClient, TranscriptionClient } from '../clients/types';
import type { DeliveryOutcome } from '../delivery/autoPaste';
import type {
  CodeLanguage,
  ConversationTurn,
  FormattingStyle,
  Language,
  SessionMode,
  SessionState,
  Settings,
} from '../domain/schemas';
import type { SessionErrorCode } from '../errors';
import type { DeliveryKind, PipelineDispatcher } from '../pipeline/types';
import type { AudioRelease } from './audioScope';
import type { SessionOptions } from './context';

export interface SessionDependencies {
  audio: AudioCaptureAdapter;
  transcription: TranscriptionClient;
  completion: CompletionClient;
  clipboard: ClipboardGateway;
  focus: FocusGateway;
  credentials: CredentialStore;
  surface: SessionSurface;
  settings: () => Settings;
  /** Defaults to the mode dispatcher built on `completion`. */
  dispatcher?: PipelineDispatcher;
  /** Defaults to deleting the recorded file. */
  releaseAudio?: AudioRelease;
  sleep?: (ms: number) => Promise<void>;
}

export type SessionEvent =
  | { type: 'state'; state: SessionState; message?: string }
  | { type: 'level'; level: number }
  | { type: 'transcript'; text: string; language?: string }
  | {
      type: 'result';
      text: string;
      delivery: DeliveryKind;
      routedTo: 'chat' | 'paste';
      outcome?: DeliveryOutcome;
      stepsApplied: string[];
    }
  | { type: 'error'; code: SessionErrorCode; message: string }
  | { type: 'startRejected'; reason: 'busy' };

export interface SessionSnapshot {
  state: SessionState;
  /** Options of the open recording, or of the session being shown. */
  options: Readonly<SessionOptions> | null;
  clipboardSnapshot: ClipboardSnapshot;
  history: readonly ConversationTurn[];
  lastTranscription: string;
  lastResult: string;
  errorCode: SessionErrorCode | null;
  errorMessage: string | null;
  hasPreviousApp: boolean;
}

export interface SessionController {
  getState(): SessionState;
  getSnapshot(): SessionSnapshot;
  start(): Promise<void>;
  stop(): Promise<void>;
  toggle(): Promise<void>;
  cancel(): Promise<void>;
  dismiss(options?: { copyToClipboard?: boolean }): Promise<void>;
  copyLastResult(): Promise<boolean>;
  setMode(mode: SessionMode): boolean;
  setLanguage(language: Language): boolean;
  setFormattingStyle(style: FormattingStyle): boolean;
  setCodeLanguage(language: CodeLanguage): boolean;
  toggleClipboardContext(): boolean;
  toggleOutputRouting(): boolean;
  toggleTerminology(): boolean;
  onEvent(listener: (event: SessionEvent) => void): () => void;
  /** Aborts whatever is in flight and returns to idle; late results are dropped. */
  dispose(): Promise<void>;
}
