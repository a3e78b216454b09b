import type { SessionMode } from '../domain/schemas';
import { emptyClipboardError } from '../errors';
import { createLogger } from '../logging/logger';
import {
  ASK_SYSTEM_PROMPT,
  PROCESS_IMAGE_SYSTEM_PROMPT,
  PROCESS_SYSTEM_PROMPT,
  RESPOND_SYSTEM_PROMPT,
  buildCleanupPrompt,
  buildCodeMessage,
  buildCodeSystemPrompt,
  buildProcessMessage,
  buildRespondMessage,
} from './prompts';
import type {
  DeliveryKind,
  PipelineDependencies,
  PipelineDispatcher,
  PipelineInput,
} from './types';

const logger = createLogger('pipeline');

const CLEANUP_TEMPERATURE = 0.3;

interface ModeHandler {
  id: string;
  delivery: DeliveryKind;
  run: (input: PipelineInput, deps: PipelineDependencies) => Promise<{ text: string; steps: string[] }>;
}

const transcribeHandler: ModeHandler = {
  id: 'transcribe',
  delivery: 'routeByOutput',
  run: async ({ context, settings, transcription, detectedLanguage, signal }, deps) => {
    if (!settings.postProcessing) {
      return { text: transcription, steps: [] };
    }
    const terminology =
      context.terminologyCorrection && settings.customTerminology.length
        ? settings.customTerminology
        : undefined;
    const system = buildCleanupPrompt({
      style: context.formattingStyle,
      standardPrompt: settings.cleanupPrompt,
      language: context.language === 'auto' ? detectedLanguage : context.language,
      terminology,
    });
    const text = await deps.completion.complete({
      system,
      user: transcription,
      history: [],
      model: settings.completionModel,
      webSearch: false,
      temperature: CLEANUP_TEMPERATURE,
      signal,
    });
    const steps = [`cleanup:${context.formattingStyle}`];
    if (terminology) steps.push('terminology');
    return { text, steps };
  },
};

const askHandler: ModeHandler = {
  id: 'ask',
  delivery: 'alwaysChat',
  run: async ({ context, settings, transcription, signal }, deps) => {
    const text = await deps.completion.complete({
      system: ASK_SYSTEM_PROMPT,
      user: transcription,
      history: context.conversationHistory,
      model: settings.webSearch ? settings.searchModel : settings.completionModel,
      webSearch: settings.webSearch,
      signal,
    });
    return { text, steps: settings.webSearch ? ['ask', 'web-search'] : ['ask'] };
  },
};

const respondHandler: ModeHandler = {
  id: 'respond',
  delivery: 'routeByOutput',
  run: async ({ context, settings, transcription, signal }, deps) => {
    const snapshot = context.clipboardSnapshot;
    const message =
      context.useClipboardContext && snapshot.kind === 'text' ? snapshot.text : undefined;
    const text = await deps.completion.complete({
      system: RESPOND_SYSTEM_PROMPT,
      user: buildRespondMessage(transcription, message),
      history: [],
      model: settings.completionModel,
      webSearch: false,
      signal,
    });
    return { text, steps: message === undefined ? ['respond'] : ['respond', 'clipboard-context'] };
  },
};

const codeHandler: ModeHandler = {
  id: 'code',
  delivery: 'routeByOutput',
  run: async ({ context, settings, transcription, signal }, deps) => {
    const text = await deps.completion.complete({
      system: buildCodeSystemPrompt(context.codeLanguage),
      user: buildCodeMessage(transcription),
      history: [],
      model: settings.completionModel,
      webSearch: false,
      signal,
    });
    return { text, steps: [`code:${context.codeLanguage}`] };
  },
};

const processHandler: ModeHandler = {
  id: 'process',
  delivery: 'routeByOutput',
  run: async ({ context, settings, transcription, signal }, deps) => {
    const snapshot = context.clipboardSnapshot;
    if (snapshot.kind === 'image') {
      const text = await deps.completion.completeWithImage({
        system: PROCESS_IMAGE_SYSTEM_PROMPT,
        user: transcription,
        image: snapshot.data,
        model: settings.visionModel,
        signal,
      });
      return { text, steps: ['process:image'] };
    }
    if (snapshot.kind === 'text') {
      const text = await deps.completion.complete({
        system: PROCESS_SYSTEM_PROMPT,
        user: buildProcessMessage(snapshot.text, transcription),
        history: [],
        model: settings.completionModel,
        webSearch: false,
        signal,
      });
      return { text, steps: ['process:text'] };
    }
    throw emptyClipboardError();
  },
};

export const MODE_HANDLERS: Record<SessionMode, ModeHandler> = {
  transcribe: transcribeHandler,
  ask: askHandler,
  respond: respondHandler,
  code: codeHandler,
  process: processHandler,
};

export const createPipelineDispatcher = (deps: PipelineDependencies): PipelineDispatcher => {
  return async (input) => {
    const handler = MODE_HANDLERS[input.context.mode];
    logger.debug(`running ${handler.id} pipeline`);
    const { text, steps } = await handler.run(input, deps);
    return {
      text,
      delivery: handler.delivery,
      turn: [
        { role: 'user', content: input.transcription },
        { role: 'assistant', content: text },
      ],
      stepsApplied: steps,
    };
  };
};
