import { describe, expect, it } from 'vitest';
import { SettingsSchema, createSessionContext, defaultSessionOptions } from '@vocalis/core';
import type { ClipboardSnapshot } from '@vocalis/platform';
import { deferred } from './fakes/platform';

const options = () => defaultSessionOptions(SettingsSchema.parse({ language: 'en' }));

describe('session context', () => {
  it('starts from the settings defaults', () => {
    expect(options()).toEqual({
      mode: 'transcribe',
      language: 'en',
      formattingStyle: 'standard',
      codeLanguage: 'auto',
      useClipboardContext: true,
      outputRouting: 'autoPaste',
      terminologyCorrection: true,
    });
  });

  it('rejects every change after freeze', () => {
    const context = createSessionContext(options());
    context.freeze();
    expect(context.isFrozen()).toBe(true);
    expect(context.setMode('ask')).toBe(false);
    expect(context.setLanguage('ru')).toBe(false);
    expect(context.setFormattingStyle('structured')).toBe(false);
    expect(context.setCodeLanguage('python')).toBe(false);
    expect(context.toggleClipboardContext()).toBe(false);
    expect(context.toggleOutputRouting()).toBe(false);
    expect(context.toggleTerminology()).toBe(false);
    expect(context.options).toEqual(options());
  });

  it('refuses to settle before freezing', async () => {
    const context = createSessionContext(options());
    await expect(context.settle([])).rejects.toThrow(
      'Session context must be frozen before it is settled'
    );
  });

  it('returns an immutable copy of options and history', async () => {
    const context = createSessionContext(options());
    const history = [{ role: 'user' as const, content: 'hi' }];
    context.freeze();
    const frozen = await context.settle(history);
    history.push({ role: 'user', content: 'later' });

    expect(Object.isFrozen(frozen)).toBe(true);
    expect(frozen.conversationHistory).toEqual([{ role: 'user', content: 'hi' }]);
    expect(frozen.mode).toBe('transcribe');
  });

  it('keeps only the newest clipboard read', async () => {
    const context = createSessionContext(options());
    const first = deferred<ClipboardSnapshot>();
    context.setMode('respond');
    const older = context.trackSnapshot(first.promise);
    context.setMode('transcribe');
    context.setMode('process');
    await context.trackSnapshot(Promise.resolve({ kind: 'text', text: 'new' }));
    first.resolve({ kind: 'text', text: 'old' });
    await older;

    context.freeze();
    const frozen = await context.settle([]);
    expect(frozen.clipboardSnapshot).toEqual({ kind: 'text', text: 'new' });
  });

  it('drops the clipboard for modes that do not use it', async () => {
    const context = createSessionContext(options());
    context.setMode('respond');
    await context.trackSnapshot(Promise.resolve({ kind: 'text', text: 'copied' }));
    context.setMode('ask');
    context.freeze();
    const frozen = await context.settle([]);
    expect(frozen.clipboardSnapshot).toEqual({ kind: 'empty' });
  });

  it('falls back to an empty snapshot when the read fails', async () => {
    const context = createSessionContext(options());
    context.setMode('process');
    await expect(context.trackSnapshot(Promise.reject(new Error('denied')))).rejects.toThrow(
      'denied'
    );
    context.freeze();
    const frozen = await context.settle([]);
    expect(frozen.clipboardSnapshot).toEqual({ kind: 'empty' });
  });

  it('toggles output routing both ways', () => {
    const context = createSessionContext(options());
    context.toggleOutputRouting();
    expect(context.options.outputRouting).toBe('showInChat');
    context.toggleOutputRouting();
    expect(context.options.outputRouting).toBe('autoPaste');
  });
});
