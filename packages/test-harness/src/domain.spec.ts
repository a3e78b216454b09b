import { describe, expect, it } from 'vitest';
import { CaptureError } from '@vocalis/platform';
import {
  LanguageSchema,
  SCHEMA_VERSION,
  SessionError,
  SettingsEnvelopeSchema,
  SettingsSchema,
  migrateToCurrent,
  redactSecrets,
  toSessionError,
  usesClipboard,
} from '@vocalis/core';

describe('domain schemas', () => {
  it('accepts auto or a two-letter language code', () => {
    expect(LanguageSchema.safeParse('auto').success).toBe(true);
    expect(LanguageSchema.safeParse('en').success).toBe(true);
    expect(LanguageSchema.safeParse('english').success).toBe(false);
  });

  it('trims and rejects empty terminology entries', () => {
    expect(SettingsSchema.parse({ customTerminology: ['  Vitest '] }).customTerminology).toEqual([
      'Vitest',
    ]);
    expect(SettingsSchema.safeParse({ customTerminology: ['  '] }).success).toBe(false);
  });

  it('marks the clipboard modes', () => {
    expect(usesClipboard('respond')).toBe(true);
    expect(usesClipboard('process')).toBe(true);
    expect(usesClipboard('ask')).toBe(false);
  });

  it('migrates current and unversioned envelopes', () => {
    const parse = (payload: unknown) => SettingsSchema.parse(payload);
    const envelope = SettingsEnvelopeSchema.parse({ payload: { webSearch: true } });
    expect(migrateToCurrent(envelope, parse).webSearch).toBe(true);
    expect(() =>
      migrateToCurrent({ version: SCHEMA_VERSION + 1, payload: {} }, parse)
    ).toThrow(`Unsupported schema version: ${SCHEMA_VERSION + 1}`);
  });
});

describe('session errors', () => {
  it('maps capture failures to capture_unavailable', () => {
    const error = toSessionError(new CaptureError('permission_pending', 'Waiting for permission'));
    expect(error.code).toBe('capture_unavailable');
    expect(error.message).toBe('Waiting for permission');
  });

  it('keeps a session error as it is', () => {
    const original = new SessionError('empty_capture', 'No audio recorded');
    expect(toSessionError(original)).toBe(original);
  });

  it('treats anything else as a service failure', () => {
    const error = toSessionError('socket hang up');
    expect(error.code).toBe('service_failure');
    expect(error.message).toBe('socket hang up');
  });

  it('redacts keys and bearer tokens', () => {
    expect(redactSecrets('key sk-abcdefghijklmnopqrstuvwx failed')).toBe('key sk-REDACTED failed');
    expect(redactSecrets('Authorization: Bearer test-secret')).toBe(
      'Authorization: Bearer REDACTED'
    );
  });
});
