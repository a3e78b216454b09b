import { CaptureError } from '@vocalis/platform';
import { redactSecrets } from './security/redact';

export type SessionErrorCode =
  | 'no_credential'
  | 'capture_unavailable'
  | 'empty_capture'
  | 'service_failure'
  | 'empty_clipboard';

export class SessionError extends Error {
  readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionError';
    this.code = code;
  }
}

/** Failure reported by a transcription or completion backend. */
export class ServiceError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'ServiceError';
    this.status = status;
  }
}

const messageOf = (error: unknown) => (error instanceof Error ? error.message : String(error));

export const toSessionError = (
  error: unknown,
  fallback: SessionErrorCode = 'service_failure'
): SessionError => {
  if (error instanceof SessionError) return error;
  if (error instanceof CaptureError) {
    return new SessionError('capture_unavailable', error.message, { cause: error });
  }
  return new SessionError(fallback, redactSecrets(messageOf(error)), { cause: error });
};

export const noCredentialError = () =>
  new SessionError(
    'no_credential',
    'No API key configured. Please add your OpenAI API key in Settings.'
  );

export const emptyCaptureError = () => new SessionError('empty_capture', 'No audio recorded');

export const emptyClipboardError = () =>
  new SessionError('empty_clipboard', 'Clipboard is empty. Copy some text or an image first.');
