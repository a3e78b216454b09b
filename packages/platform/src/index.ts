export interface AudioHandle {
  filePath: string;
  byteLength: number;
  durationMs: number;
  mimeType: string;
}

export type CaptureFailureReason = 'permission_pending' | 'permission_denied' | 'device_unavailable';

export class CaptureError extends Error {
  readonly reason: CaptureFailureReason;

  constructor(reason: CaptureFailureReason, message: string) {
    super(message);
    this.name = 'CaptureError';
    this.reason = reason;
  }
}

export interface AudioCaptureAdapter {
  /** Rejects with a CaptureError when the microphone cannot be opened. */
  start(): Promise<void>;
  stop(): Promise<AudioHandle | null>;
  /** Normalized input levels in [0, 1]; ends once capture stops. */
  levelStream(): AsyncIterable<number>;
}

export type ClipboardSnapshot =
  | { kind: 'empty' }
  | { kind: 'text'; text: string }
  | { kind: 'image'; data: Uint8Array };

export interface ClipboardGateway {
  snapshot(): Promise<ClipboardSnapshot>;
  writeText(text: string): Promise<void>;
}

export interface AppHandle {
  id: string;
  name?: string;
}

export interface FocusGateway {
  captureCurrent(): Promise<AppHandle | null>;
  reactivate(app: AppHandle): Promise<void>;
  simulatePaste(): Promise<void>;
}

export interface CredentialStore {
  hasCredential(): Promise<boolean>;
  getApiKey(): Promise<string | null>;
}

export interface SessionSurface {
  show(): Promise<void>;
  hide(): Promise<void>;
}

export interface PlatformAdapter {
  audioCapture: AudioCaptureAdapter;
  clipboard: ClipboardGateway;
  focus: FocusGateway;
  credentials: CredentialStore;
  surface: SessionSurface;
}
