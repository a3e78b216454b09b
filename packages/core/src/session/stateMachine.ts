import type { AppHandle, AudioHandle, ClipboardSnapshot } from '@vocalis/platform';
import { deliverByAutoPaste } from '../delivery/autoPaste';
import {
  type ConversationTurn,
  type SessionMode,
  type SessionState,
  type Settings,
  usesClipboard,
} from '../domain/schemas';
import {
  SessionError,
  emptyCaptureError,
  emptyClipboardError,
  noCredentialError,
  toSessionError,
} from '../errors';
import { createLogger } from '../logging/logger';
import { createPipelineDispatcher } from '../pipeline/dispatcher';
import type { PipelineResult } from '../pipeline/types';
import { deleteAudioFile, releaseAudio, withAudio } from './audioScope';
import {
  EMPTY_CLIPBOARD,
  type FrozenSessionContext,
  type SessionContext,
  type SessionOptions,
  createSessionContext,
  defaultSessionOptions,
} from './context';
import type { SessionController, SessionDependencies, SessionEvent, SessionSnapshot } from './types';

const logger = createLogger('session');

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

type StepOutcome<T> =
  | { status: 'success'; value: T }
  | { status: 'cancelled' }
  | { status: 'failed'; error: SessionError };

interface ActiveRun {
  token: number;
  controller: AbortController;
  done: Promise<void>;
}

export const createSessionStateMachine = (deps: SessionDependencies): SessionController => {
  const dispatch = deps.dispatcher ?? createPipelineDispatcher({ completion: deps.completion });
  const release = deps.releaseAudio ?? deleteAudioFile;
  const sleep = deps.sleep ?? delay;
  const listeners = new Set<(event: SessionEvent) => void>();

  let state: SessionState = 'idle';
  let context: SessionContext | null = null;
  // Options of the last frozen recording; a continuation picks them up again.
  let lastOptions: SessionOptions | null = null;
  let history: ConversationTurn[] = [];
  let previousApp: AppHandle | null = null;
  let lastTranscription = '';
  let lastResult = '';
  let lastError: SessionError | null = null;
  let activity = 0;
  let errorTimer: ReturnType<typeof setTimeout> | null = null;
  let starting = false;
  let stopRequested = false;
  let runCounter = 0;
  let run: ActiveRun | null = null;
  let stopLevels: (() => void) | null = null;

  const emit = (event: SessionEvent) => {
    listeners.forEach((listener) => listener(event));
  };

  const setState = (next: SessionState, message?: string) => {
    activity += 1;
    if (state === next) return;
    logger.debug(`${state} -> ${next}`);
    state = next;
    emit({ type: 'state', state: next, message });
  };

  const clearErrorTimer = () => {
    if (!errorTimer) return;
    clearTimeout(errorTimer);
    errorTimer = null;
  };

  const showSurface = async () => {
    try {
      await deps.surface.show();
    } catch (error) {
      logger.warn('Failed to show session surface', error);
    }
  };

  const hideSurface = async () => {
    try {
      await deps.surface.hide();
    } catch (error) {
      logger.warn('Failed to hide session surface', error);
    }
  };

  const restoreFocus = async (app: AppHandle | null) => {
    if (!app) return;
    try {
      await deps.focus.reactivate(app);
    } catch (error) {
      logger.warn('Failed to restore focus to the previous app', error);
    }
  };

  const stopLevelPump = () => {
    stopLevels?.();
    stopLevels = null;
  };

  const startLevelPump = () => {
    let active = true;
    stopLevels = () => {
      active = false;
    };
    const pump = async () => {
      for await (const level of deps.audio.levelStream()) {
        if (!active) break;
        emit({ type: 'level', level });
      }
    };
    pump().catch((error: unknown) => logger.warn('Audio level stream failed', error));
  };

  const refreshClipboard = (target: SessionContext) => {
    target
      .trackSnapshot(deps.clipboard.snapshot())
      .catch((error: unknown) => logger.warn('Failed to read clipboard', error));
  };

  const enterError = (error: SessionError) => {
    logger.error(`session failed (${error.code}): ${error.message}`);
    stopLevelPump();
    context = null;
    previousApp = null;
    lastError = error;
    setState('error', error.message);
    emit({ type: 'error', code: error.code, message: error.message });

    clearErrorTimer();
    const marker = activity;
    errorTimer = setTimeout(() => {
      errorTimer = null;
      if (state !== 'error' || activity !== marker) return;
      lastError = null;
      setState('idle');
      void hideSurface();
    }, deps.settings().errorDisplayMs);
  };

  const isCurrent = (token: number, signal: AbortSignal) =>
    run?.token === token && !signal.aborted;

  const runStep = async <T>(
    token: number,
    signal: AbortSignal,
    task: () => Promise<T>
  ): Promise<StepOutcome<T>> => {
    try {
      const value = await task();
      if (!isCurrent(token, signal)) return { status: 'cancelled' };
      return { status: 'success', value };
    } catch (error) {
      // Only an abandoned run counts as cancelled; a client timeout is a failure.
      if (!isCurrent(token, signal)) return { status: 'cancelled' };
      return { status: 'failed', error: toSessionError(error) };
    }
  };

  const deliver = async (
    frozen: FrozenSessionContext,
    result: PipelineResult,
    settings: Settings,
    token: number,
    signal: AbortSignal
  ) => {
    lastResult = result.text;
    const toChat = result.delivery === 'alwaysChat' || frozen.outputRouting === 'showInChat';
    if (toChat) {
      history.push(...result.turn.map((turn) => ({ ...turn })));
      setState('showingResult');
      emit({
        type: 'result',
        text: result.text,
        delivery: result.delivery,
        routedTo: 'chat',
        stepsApplied: result.stepsApplied,
      });
      return;
    }

    const app = previousApp;
    try {
      const outcome = await deliverByAutoPaste(
        { focus: deps.focus, clipboard: deps.clipboard, surface: deps.surface, sleep },
        {
          text: result.text,
          previousApp: app,
          settleDelayMs: settings.pasteSettleDelayMs,
          signal,
          onSurfaceHidden: () => {
            context = null;
            setState('idle');
          },
        }
      );
      if (outcome === 'discarded' || !isCurrent(token, signal)) return;
      previousApp = null;
      emit({
        type: 'result',
        text: result.text,
        delivery: result.delivery,
        routedTo: 'paste',
        outcome,
        stepsApplied: result.stepsApplied,
      });
    } catch (error) {
      if (!isCurrent(token, signal)) return;
      enterError(toSessionError(error));
    }
  };

  const execute = async (target: SessionContext, token: number, signal: AbortSignal) => {
    const settings = deps.settings();
    const frozen = await target.settle(history);
    if (!isCurrent(token, signal)) return;

    let audio: AudioHandle | null;
    try {
      audio = await deps.audio.stop();
    } catch (error) {
      if (isCurrent(token, signal)) enterError(toSessionError(error, 'capture_unavailable'));
      return;
    }
    if (!audio || audio.byteLength === 0) {
      if (audio) await releaseAudio(audio, release);
      if (isCurrent(token, signal)) enterError(emptyCaptureError());
      return;
    }
    if (!isCurrent(token, signal)) {
      await releaseAudio(audio, release);
      return;
    }
    if (frozen.mode === 'process' && frozen.clipboardSnapshot.kind === 'empty') {
      await releaseAudio(audio, release);
      enterError(emptyClipboardError());
      return;
    }

    const language = frozen.language === 'auto' ? undefined : frozen.language;
    const transcribed = await withAudio(audio, release, (recorded) =>
      runStep(token, signal, () =>
        deps.transcription.transcribe(recorded, {
          language,
          model: settings.transcriptionModel,
          signal,
        })
      )
    );
    if (transcribed.status === 'cancelled') return;
    if (transcribed.status === 'failed') {
      enterError(transcribed.error);
      return;
    }

    // Empty text still goes through the pipeline; the mode decides what to make of it.
    const { text, language: detectedLanguage } = transcribed.value;
    lastTranscription = text;
    emit({ type: 'transcript', text, language: detectedLanguage });

    setState('processing');
    const processed = await runStep(token, signal, () =>
      dispatch({ context: frozen, settings, transcription: text, detectedLanguage, signal })
    );
    if (processed.status === 'cancelled') return;
    if (processed.status === 'failed') {
      enterError(processed.error);
      return;
    }

    await deliver(frozen, processed.value, settings, token, signal);
  };

  const begin = async () => {
    try {
      if (!(await deps.credentials.hasCredential())) {
        await showSurface();
        enterError(noCredentialError());
        return;
      }

      const continuation = state === 'showingResult' && lastOptions !== null;
      let options: SessionOptions;
      if (continuation && lastOptions) {
        options = { ...lastOptions };
      } else {
        options = defaultSessionOptions(deps.settings());
        history = [];
        lastOptions = null;
        try {
          previousApp = await deps.focus.captureCurrent();
        } catch (error) {
          logger.warn('Failed to capture the focused app', error);
          previousApp = null;
        }
      }

      const next = createSessionContext(options);
      await deps.audio.start();

      clearErrorTimer();
      lastError = null;
      context = next;
      setState('recording');
      logger.info(`recording started (${continuation ? 'continuation' : 'fresh'}, ${options.mode})`);
      await showSurface();
      if (usesClipboard(options.mode)) refreshClipboard(next);
      startLevelPump();
    } catch (error) {
      await showSurface();
      enterError(toSessionError(error, 'capture_unavailable'));
    }
  };

  const start = async () => {
    if (starting) {
      logger.debug('start ignored: already starting');
      return;
    }
    if (run) {
      logger.info('start rejected: previous session is still in flight');
      emit({ type: 'startRejected', reason: 'busy' });
      return;
    }
    if (state === 'recording') return;

    starting = true;
    stopRequested = false;
    activity += 1;
    try {
      await begin();
    } finally {
      starting = false;
    }
    if (stopRequested) {
      stopRequested = false;
      if (state === 'recording') await stop();
    }
  };

  const stop = async (): Promise<void> => {
    if (starting) {
      // Applied once capture is up.
      stopRequested = true;
      return;
    }
    if (state !== 'recording' || !context) return;
    const target = context;
    target.freeze();
    lastOptions = { ...target.options };
    stopLevelPump();

    runCounter += 1;
    const token = runCounter;
    const controller = new AbortController();
    const current: ActiveRun = { token, controller, done: Promise.resolve() };
    run = current;
    setState('transcribing');
    current.done = execute(target, token, controller.signal);
    try {
      await current.done;
    } finally {
      if (run === current) run = null;
    }
  };

  const cancel = async () => {
    if (state !== 'recording' || !context) return;
    const app = previousApp;
    stopLevelPump();
    context = null;
    lastOptions = null;
    previousApp = null;
    setState('idle');
    logger.info('recording cancelled');

    try {
      const audio = await deps.audio.stop();
      if (audio) await releaseAudio(audio, release);
    } catch (error) {
      logger.warn('Failed to stop capture on cancel', error);
    }
    await hideSurface();
    await restoreFocus(app);
  };

  const dismiss = async (options: { copyToClipboard?: boolean } = {}) => {
    if (state !== 'showingResult' || starting) return;
    const text = lastResult;
    const app = previousApp;
    history = [];
    lastOptions = null;
    previousApp = null;
    context = null;
    setState('idle');

    if (options.copyToClipboard && text) {
      try {
        await deps.clipboard.writeText(text);
      } catch (error) {
        logger.error('Failed to copy result to clipboard', error);
      }
    }
    await hideSurface();
    await restoreFocus(app);
  };

  const whileRecording = <T>(apply: (target: SessionContext) => T, fallback: T): T => {
    if (state !== 'recording' || !context) return fallback;
    return apply(context);
  };

  const setMode = (mode: SessionMode) =>
    whileRecording((target) => {
      const changed = target.setMode(mode);
      if (changed && usesClipboard(mode)) refreshClipboard(target);
      return changed;
    }, false);

  const snapshotOptions = (): Readonly<SessionOptions> | null => {
    if (context) return { ...context.options };
    if (state === 'showingResult' && lastOptions) return { ...lastOptions };
    return null;
  };

  const clipboardView = (): ClipboardSnapshot => {
    const snapshot = context?.clipboardSnapshot ?? EMPTY_CLIPBOARD;
    return snapshot.kind === 'image' ? { kind: 'image', data: snapshot.data.slice() } : snapshot;
  };

  return {
    getState: () => state,
    getSnapshot: (): SessionSnapshot =>
      Object.freeze({
        state,
        options: snapshotOptions(),
        clipboardSnapshot: clipboardView(),
        history: history.map((turn) => ({ ...turn })),
        lastTranscription,
        lastResult,
        errorCode: lastError?.code ?? null,
        errorMessage: lastError?.message ?? null,
        hasPreviousApp: previousApp !== null,
      }),
    start,
    stop,
    toggle: () => (state === 'recording' || starting ? stop() : start()),
    cancel,
    dismiss,
    copyLastResult: async () => {
      const text = lastResult || lastTranscription;
      if (!text) return false;
      await deps.clipboard.writeText(text);
      return true;
    },
    setMode,
    setLanguage: (language) => whileRecording((target) => target.setLanguage(language), false),
    setFormattingStyle: (style) =>
      whileRecording((target) => target.setFormattingStyle(style), false),
    setCodeLanguage: (language) =>
      whileRecording((target) => target.setCodeLanguage(language), false),
    toggleClipboardContext: () =>
      whileRecording((target) => target.toggleClipboardContext(), false),
    toggleOutputRouting: () => whileRecording((target) => target.toggleOutputRouting(), false),
    toggleTerminology: () =>
      whileRecording(
        (target) =>
          deps.settings().customTerminology.length > 0 ? target.toggleTerminology() : false,
        false
      ),
    onEvent: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    dispose: async () => {
      stopRequested = false;
      const pending = run;
      run = null;
      pending?.controller.abort();
      stopLevelPump();
      clearErrorTimer();
      const wasRecording = state === 'recording';
      context = null;
      lastOptions = null;
      previousApp = null;
      lastError = null;
      history = [];
      setState('idle');
      if (wasRecording) {
        try {
          const audio = await deps.audio.stop();
          if (audio) await releaseAudio(audio, release);
        } catch (error) {
          logger.warn('Failed to stop capture on dispose', error);
        }
      }
    },
  };
};
