import { describe, expect, it, vi } from 'vitest';
import {
  ASK_SYSTEM_PROMPT,
  PROCESS_IMAGE_SYSTEM_PROMPT,
  RESPOND_SYSTEM_PROMPT,
  SettingsSchema,
  buildCleanupPrompt,
  buildCodeSystemPrompt,
  buildRespondMessage,
  createPipelineDispatcher,
  createSessionContext,
  defaultSessionOptions,
  type CompletionRequest,
  type ImageCompletionRequest,
  type SessionMode,
} from '@vocalis/core';
import type { ClipboardSnapshot } from '@vocalis/platform';

const settings = SettingsSchema.parse({});

const makeCompletion = () => ({
  complete: vi.fn(async (_request: CompletionRequest) => 'completed'),
  completeWithImage: vi.fn(async (_request: ImageCompletionRequest) => 'described'),
});

const frozenContext = async (
  mode: SessionMode,
  clipboard: ClipboardSnapshot = { kind: 'empty' },
  history: { role: 'user' | 'assistant'; content: string }[] = []
) => {
  const context = createSessionContext({ ...defaultSessionOptions(settings), mode });
  if (mode === 'respond' || mode === 'process') {
    await context.trackSnapshot(Promise.resolve(clipboard));
  }
  context.freeze();
  return context.settle(history);
};

describe('pipeline dispatcher', () => {
  it('routes transcribe results by the output setting', async () => {
    const completion = makeCompletion();
    const dispatch = createPipelineDispatcher({ completion });
    const result = await dispatch({
      context: await frozenContext('transcribe'),
      settings,
      transcription: 'um so hello',
    });

    expect(result).toEqual({
      text: 'completed',
      delivery: 'routeByOutput',
      turn: [
        { role: 'user', content: 'um so hello' },
        { role: 'assistant', content: 'completed' },
      ],
      stepsApplied: ['cleanup:standard'],
    });
  });

  it('always delivers ask answers to chat with the full history', async () => {
    const completion = makeCompletion();
    const dispatch = createPipelineDispatcher({ completion });
    const history = [
      { role: 'user' as const, content: 'hi' },
      { role: 'assistant' as const, content: 'hello' },
    ];
    const result = await dispatch({
      context: await frozenContext('ask', undefined, history),
      settings,
      transcription: 'how are you',
    });

    expect(result.delivery).toBe('alwaysChat');
    expect(completion.complete).toHaveBeenCalledWith(
      expect.objectContaining({
        system: ASK_SYSTEM_PROMPT,
        user: 'how are you',
        history,
        model: 'gpt-4o-mini',
        webSearch: false,
      })
    );
  });

  it('asks the configured search model when web search is on', async () => {
    const completion = makeCompletion();
    const dispatch = createPipelineDispatcher({ completion });
    await dispatch({
      context: await frozenContext('ask'),
      settings: SettingsSchema.parse({ webSearch: true, searchModel: 'search-model-test' }),
      transcription: 'latest news',
    });

    expect(completion.complete.mock.calls[0][0]).toMatchObject({
      model: 'search-model-test',
      webSearch: true,
    });
  });

  it('drafts replies without prior history', async () => {
    const completion = makeCompletion();
    const dispatch = createPipelineDispatcher({ completion });
    await dispatch({
      context: await frozenContext('respond', { kind: 'text', text: 'Lunch?' }, [
        { role: 'user', content: 'older' },
        { role: 'assistant', content: 'turn' },
      ]),
      settings,
      transcription: 'decline',
    });

    expect(completion.complete).toHaveBeenCalledWith(
      expect.objectContaining({
        system: RESPOND_SYSTEM_PROMPT,
        user: buildRespondMessage('decline', 'Lunch?'),
        history: [],
      })
    );
  });

  it('ignores an image snapshot in respond mode', async () => {
    const completion = makeCompletion();
    const dispatch = createPipelineDispatcher({ completion });
    const result = await dispatch({
      context: await frozenContext('respond', { kind: 'image', data: new Uint8Array([1]) }),
      settings,
      transcription: 'say thanks',
    });

    expect(completion.complete.mock.calls[0][0].user).toBe('How to respond:\nsay thanks');
    expect(result.stepsApplied).toEqual(['respond']);
  });

  it('asks for code only in the selected language', async () => {
    const completion = makeCompletion();
    const dispatch = createPipelineDispatcher({ completion });
    await dispatch({
      context: await frozenContext('code'),
      settings,
      transcription: 'reverse a list',
    });

    expect(completion.complete.mock.calls[0][0].system).toBe(buildCodeSystemPrompt('auto'));
    expect(completion.complete.mock.calls[0][0].user).toBe('Generate code: reverse a list');
  });

  it('uses the image variant for images in process mode', async () => {
    const completion = makeCompletion();
    const dispatch = createPipelineDispatcher({ completion });
    const data = new Uint8Array([9, 9]);
    const result = await dispatch({
      context: await frozenContext('process', { kind: 'image', data }),
      settings,
      transcription: 'read the text',
    });

    expect(completion.completeWithImage).toHaveBeenCalledWith(
      expect.objectContaining({
        system: PROCESS_IMAGE_SYSTEM_PROMPT,
        user: 'read the text',
        image: data,
        model: 'gpt-4o',
      })
    );
    expect(completion.complete).not.toHaveBeenCalled();
    expect(result).toMatchObject({ text: 'described', stepsApplied: ['process:image'] });
  });

  it('fails process mode on an empty clipboard without calling the service', async () => {
    const completion = makeCompletion();
    const dispatch = createPipelineDispatcher({ completion });
    await expect(
      dispatch({ context: await frozenContext('process'), settings, transcription: 'sum it up' })
    ).rejects.toMatchObject({ code: 'empty_clipboard' });
    expect(completion.complete).not.toHaveBeenCalled();
    expect(completion.completeWithImage).not.toHaveBeenCalled();
  });

  it('skips cleanup when post-processing is disabled', async () => {
    const completion = makeCompletion();
    const dispatch = createPipelineDispatcher({ completion });
    const result = await dispatch({
      context: await frozenContext('transcribe'),
      settings: SettingsSchema.parse({ postProcessing: false }),
      transcription: 'raw words',
    });
    expect(result.text).toBe('raw words');
    expect(result.stepsApplied).toEqual([]);
    expect(completion.complete).not.toHaveBeenCalled();
  });

  it('prefers an explicit language over the detected one', async () => {
    const completion = makeCompletion();
    const dispatch = createPipelineDispatcher({ completion });
    const context = createSessionContext({ ...defaultSessionOptions(settings), language: 'en' });
    context.freeze();
    await dispatch({
      context: await context.settle([]),
      settings,
      transcription: 'hello',
      detectedLanguage: 'de',
    });
    expect(completion.complete.mock.calls[0][0].system).toBe(
      buildCleanupPrompt({
        style: 'standard',
        standardPrompt: settings.cleanupPrompt,
        language: 'en',
      })
    );
  });
});

describe('cleanup prompts', () => {
  it('keeps the source language when none is known', () => {
    expect(buildCleanupPrompt({ style: 'standard', standardPrompt: 'Fix it.' })).toBe(
      'Fix it.\n\nKeep the text in its original language and never translate it.'
    );
  });

  it('names a known language', () => {
    const prompt = buildCleanupPrompt({ style: 'standard', standardPrompt: 'Fix it.', language: 'ru' });
    expect(prompt).toBe(
      'Fix it.\n\nThe text is in Russian. Keep it in Russian and never translate it.'
    );
  });

  it('does not use the standard prompt for other styles', () => {
    const structured = buildCleanupPrompt({ style: 'structured', standardPrompt: 'Fix it.' });
    const condensed = buildCleanupPrompt({ style: 'condensed', standardPrompt: 'Fix it.' });
    expect(structured.startsWith('Fix it.')).toBe(false);
    expect(condensed).toContain('do not end the message with punctuation');
    expect(structured).not.toBe(condensed);
  });

  it('lists custom terms', () => {
    const prompt = buildCleanupPrompt({
      style: 'standard',
      standardPrompt: 'Fix it.',
      terminology: ['Vitest', 'zod'],
    });
    expect(prompt.split('\n\n')[2]).toBe(
      'The speaker uses these terms; when a word sounds like one of them, spell it exactly as listed: Vitest, zod.'
    );
  });
});
