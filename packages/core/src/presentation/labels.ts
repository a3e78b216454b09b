import type { SessionMode } from '../domain/schemas';
import type { SessionSnapshot } from '../session/types';

export interface ModeLabel {
  name: string;
  /** Key that selects the mode while recording. */
  hotkey: string;
  tooltip: string;
}

export const MODE_LABELS: Record<SessionMode, ModeLabel> = {
  transcribe: {
    name: 'Transcribe',
    hotkey: 'T',
    tooltip: 'Transcribe speech and clean up the text',
  },
  ask: {
    name: 'Ask',
    hotkey: 'A',
    tooltip: 'Ask a question and get the answer in chat',
  },
  respond: {
    name: 'Respond',
    hotkey: 'R',
    tooltip: 'Draft a reply to the message on the clipboard',
  },
  code: {
    name: 'Code',
    hotkey: 'C',
    tooltip: 'Generate code from a spoken request',
  },
  process: {
    name: 'Process',
    hotkey: 'P',
    tooltip: 'Apply a spoken command to the clipboard text or image',
  },
};

export const describeStatus = (snapshot: Pick<SessionSnapshot, 'state' | 'errorMessage'>) => {
  switch (snapshot.state) {
    case 'idle':
      return 'Ready';
    case 'recording':
      return 'Recording...';
    case 'transcribing':
      return 'Transcribing...';
    case 'processing':
      return 'Processing...';
    case 'showingResult':
      return 'Done';
    case 'error':
      return `Error: ${snapshot.errorMessage ?? 'Unknown error'}`;
  }
};
