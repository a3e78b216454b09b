import type {
  CodeLanguage,
  FormattingStyle,
  Language,
  SessionMode,
  SessionState,
} from '../domain/schemas';
import type { SessionController } from './types';

export type KeyCommand =
  | { kind: 'cancel' }
  | { kind: 'dismiss'; copyToClipboard: boolean }
  | { kind: 'setLanguage'; language: Language }
  | { kind: 'setMode'; mode: SessionMode }
  | { kind: 'setFormattingStyle'; style: FormattingStyle }
  | { kind: 'setCodeLanguage'; language: CodeLanguage }
  | { kind: 'toggleClipboardContext' }
  | { kind: 'toggleOutputRouting' }
  | { kind: 'toggleTerminology' };

export interface KeymapView {
  state: SessionState;
  mode: SessionMode | null;
}

const LANGUAGE_KEYS: Record<string, Language> = { '0': 'auto', '1': 'en', '2': 'ru' };

const MODE_KEYS: Record<string, SessionMode> = {
  t: 'transcribe',
  a: 'ask',
  r: 'respond',
  c: 'code',
  p: 'process',
};

const FORMATTING_KEYS: Record<string, FormattingStyle> = {
  d: 'standard',
  n: 'structured',
  s: 'condensed',
};

const CODE_LANGUAGE_KEYS: Record<string, CodeLanguage> = { u: 'auto', y: 'python', b: 'bash' };

const lookup = <T>(table: Record<string, T>, key: string): T | undefined =>
  Object.hasOwn(table, key) ? table[key] : undefined;

export const resolveKeyCommand = (key: string, view: KeymapView): KeyCommand | null => {
  const normalized = key.length === 1 ? key.toLowerCase() : key.toLowerCase().trim();

  if (view.state === 'showingResult') {
    if (normalized === 'escape') return { kind: 'dismiss', copyToClipboard: false };
    if (normalized === 'c') return { kind: 'dismiss', copyToClipboard: true };
    return null;
  }
  if (view.state !== 'recording') return null;

  if (normalized === 'escape' || normalized === 'q') return { kind: 'cancel' };
  const language = lookup(LANGUAGE_KEYS, normalized);
  if (language) return { kind: 'setLanguage', language };
  const mode = lookup(MODE_KEYS, normalized);
  if (mode) return { kind: 'setMode', mode };
  if (normalized === 'v') return { kind: 'toggleClipboardContext' };
  if (normalized === 'o') return { kind: 'toggleOutputRouting' };
  if (normalized === 'x') return { kind: 'toggleTerminology' };
  // Mode keys win over option keys, so 'c' always selects Code while recording.
  const style = view.mode === 'transcribe' ? lookup(FORMATTING_KEYS, normalized) : undefined;
  if (style) return { kind: 'setFormattingStyle', style };
  const codeLanguage = view.mode === 'code' ? lookup(CODE_LANGUAGE_KEYS, normalized) : undefined;
  if (codeLanguage) return { kind: 'setCodeLanguage', language: codeLanguage };
  return null;
};

/** Resolves `key` against the controller's current state and applies it. */
export const handleSessionKey = async (controller: SessionController, key: string) => {
  const snapshot = controller.getSnapshot();
  const command = resolveKeyCommand(key, {
    state: snapshot.state,
    mode: snapshot.options?.mode ?? null,
  });
  if (!command) return false;

  switch (command.kind) {
    case 'cancel':
      await controller.cancel();
      return true;
    case 'dismiss':
      await controller.dismiss({ copyToClipboard: command.copyToClipboard });
      return true;
    case 'setLanguage':
      return controller.setLanguage(command.language);
    case 'setMode':
      return controller.setMode(command.mode);
    case 'setFormattingStyle':
      return controller.setFormattingStyle(command.style);
    case 'setCodeLanguage':
      return controller.setCodeLanguage(command.language);
    case 'toggleClipboardContext':
      return controller.toggleClipboardContext();
    case 'toggleOutputRouting':
      return controller.toggleOutputRouting();
    case 'toggleTerminology':
      return controller.toggleTerminology();
  }
};
