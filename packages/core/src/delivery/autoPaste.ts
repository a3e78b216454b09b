import type { AppHandle, ClipboardGateway, FocusGateway, SessionSurface } from '@vocalis/platform';
import { createLogger } from '../logging/logger';

const logger = createLogger('delivery');

export type DeliveryOutcome = 'pasted' | 'clipboard';

/** `discarded` means the run was aborted before anything was written. */
export type AutoPasteOutcome = DeliveryOutcome | 'discarded';

export interface AutoPasteDependencies {
  focus: FocusGateway;
  clipboard: ClipboardGateway;
  surface: SessionSurface;
  sleep: (ms: number) => Promise<void>;
}

export interface AutoPasteRequest {
  text: string;
  previousApp: AppHandle | null;
  settleDelayMs: number;
  signal?: AbortSignal;
  /** Called once the surface is hidden, before focus moves back. */
  onSurfaceHidden: () => void;
}

/**
 * Pastes into the app that was focused when recording started. Focus has to be
 * back on that app before the clipboard is written or the paste key is sent.
 */
export const deliverByAutoPaste = async (
  deps: AutoPasteDependencies,
  request: AutoPasteRequest
): Promise<AutoPasteOutcome> => {
  try {
    await deps.surface.hide();
  } catch (error) {
    logger.warn('Failed to hide session surface before paste', error);
  }
  request.onSurfaceHidden();

  if (request.previousApp) {
    logger.debug(`restoring focus to ${request.previousApp.name ?? request.previousApp.id}`);
    try {
      await deps.focus.reactivate(request.previousApp);
    } catch (error) {
      logger.warn('Failed to restore focus to the previous app', error);
    }
  } else {
    logger.debug('no previous app captured; pasting into the current focus');
  }

  await deps.sleep(request.settleDelayMs);
  if (request.signal?.aborted) {
    logger.debug('paste abandoned during settle delay');
    return 'discarded';
  }
  await deps.clipboard.writeText(request.text);
  if (request.signal?.aborted) return 'discarded';

  try {
    await deps.focus.simulatePaste();
    return 'pasted';
  } catch (error) {
    logger.error('Paste simulation failed; result left on the clipboard', error);
    return 'clipboard';
  }
};
