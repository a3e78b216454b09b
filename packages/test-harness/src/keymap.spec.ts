import { afterEach, describe, expect, it } from 'vitest';
import {
  RecordingCommandSchema,
  handleSessionKey,
  resolveKeyCommand,
  runRecordingCommand,
  type SessionController,
} from '@vocalis/core';
import { createSessionHarness } from './fakes/session';

const recording = { state: 'recording' as const, mode: 'transcribe' as const };

const controllers: SessionController[] = [];

afterEach(async () => {
  await Promise.all(controllers.splice(0).map((controller) => controller.dispose()));
});

describe('key map', () => {
  it('maps recording keys to commands', () => {
    expect(resolveKeyCommand('Escape', recording)).toEqual({ kind: 'cancel' });
    expect(resolveKeyCommand('q', recording)).toEqual({ kind: 'cancel' });
    expect(resolveKeyCommand('0', recording)).toEqual({ kind: 'setLanguage', language: 'auto' });
    expect(resolveKeyCommand('1', recording)).toEqual({ kind: 'setLanguage', language: 'en' });
    expect(resolveKeyCommand('2', recording)).toEqual({ kind: 'setLanguage', language: 'ru' });
    expect(resolveKeyCommand('A', recording)).toEqual({ kind: 'setMode', mode: 'ask' });
    expect(resolveKeyCommand('p', recording)).toEqual({ kind: 'setMode', mode: 'process' });
    expect(resolveKeyCommand('v', recording)).toEqual({ kind: 'toggleClipboardContext' });
    expect(resolveKeyCommand('o', recording)).toEqual({ kind: 'toggleOutputRouting' });
    expect(resolveKeyCommand('x', recording)).toEqual({ kind: 'toggleTerminology' });
  });

  it('ignores keys that name object properties', () => {
    expect(resolveKeyCommand('constructor', recording)).toBeNull();
    expect(resolveKeyCommand('__proto__', recording)).toBeNull();
    expect(resolveKeyCommand('__proto__', { state: 'recording', mode: 'code' })).toBeNull();
  });

  it('scopes option keys to their mode', () => {
    expect(resolveKeyCommand('n', recording)).toEqual({
      kind: 'setFormattingStyle',
      style: 'structured',
    });
    expect(resolveKeyCommand('y', recording)).toBeNull();

    const code = { state: 'recording' as const, mode: 'code' as const };
    expect(resolveKeyCommand('b', code)).toEqual({ kind: 'setCodeLanguage', language: 'bash' });
    expect(resolveKeyCommand('s', code)).toBeNull();
    expect(resolveKeyCommand('c', code)).toEqual({ kind: 'setMode', mode: 'code' });
  });

  it('maps result keys to dismiss', () => {
    const showing = { state: 'showingResult' as const, mode: 'ask' as const };
    expect(resolveKeyCommand('escape', showing)).toEqual({ kind: 'dismiss', copyToClipboard: false });
    expect(resolveKeyCommand('c', showing)).toEqual({ kind: 'dismiss', copyToClipboard: true });
    expect(resolveKeyCommand('a', showing)).toBeNull();
  });

  it('ignores keys while idle or busy', () => {
    expect(resolveKeyCommand('escape', { state: 'idle', mode: null })).toBeNull();
    expect(resolveKeyCommand('t', { state: 'transcribing', mode: 'ask' })).toBeNull();
  });

  it('applies keys to a live session', async () => {
    const h = createSessionHarness({ transcript: { text: 'what time is it' } });
    controllers.push(h.controller);
    await h.controller.start();

    expect(await handleSessionKey(h.controller, 'a')).toBe(true);
    expect(await handleSessionKey(h.controller, '2')).toBe(true);
    expect(await handleSessionKey(h.controller, 'z')).toBe(false);
    expect(h.controller.getSnapshot().options).toMatchObject({ mode: 'ask', language: 'ru' });

    await h.controller.stop();
    expect(await handleSessionKey(h.controller, 'c')).toBe(true);
    expect(h.controller.getState()).toBe('idle');
    expect(h.clipboard.written).toEqual(['processed: what time is it']);
  });

  it('cancels through the escape key', async () => {
    const h = createSessionHarness();
    controllers.push(h.controller);
    await h.controller.start();
    expect(await handleSessionKey(h.controller, 'Escape')).toBe(true);
    expect(h.controller.getState()).toBe('idle');
    expect(h.releaseAudio).toHaveBeenCalledTimes(1);
  });
});

describe('recording commands', () => {
  it('accepts only known commands', () => {
    expect(RecordingCommandSchema.options).toEqual(['start', 'stop', 'toggle', 'cancel', 'dismiss']);
    expect(RecordingCommandSchema.safeParse('pause').success).toBe(false);
  });

  it('drives the session', async () => {
    const h = createSessionHarness();
    controllers.push(h.controller);
    await runRecordingCommand(h.controller, 'toggle');
    expect(h.controller.getState()).toBe('recording');
    await runRecordingCommand(h.controller, 'cancel');
    expect(h.controller.getState()).toBe('idle');
    await expect(runRecordingCommand(h.controller, 'restart')).rejects.toThrow();
  });
});
