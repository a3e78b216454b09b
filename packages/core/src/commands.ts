import { z } from 'zod';
import type { SessionController } from './session/types';

export const RecordingCommandSchema = z.enum(['start', 'stop', 'toggle', 'cancel', 'dismiss']);
export type RecordingCommand = z.infer<typeof RecordingCommandSchema>;

/** Validates a command coming from a hotkey or tray action and runs it. */
export const runRecordingCommand = async (controller: SessionController, input: unknown) => {
  const command = RecordingCommandSchema.parse(input);
  switch (command) {
    case 'start':
      return controller.start();
    case 'stop':
      return controller.stop();
    case 'toggle':
      return controller.toggle();
    case 'cancel':
      return controller.cancel();
    case 'dismiss':
      return controller.dismiss();
  }
};
