import { rm } from 'fs/promises';
import type { AudioHandle } from '@vocalis/platform';
import { createLogger } from '../logging/logger';

const logger = createLogger('session');

export type AudioRelease = (audio: AudioHandle) => Promise<void>;

export const deleteAudioFile: AudioRelease = (audio) => rm(audio.filePath, { force: true });

/**
 * Runs `use` with the recorded audio and releases it afterwards, whatever the
 * outcome. Release failures are logged and never replace the result.
 */
export const withAudio = async <T>(
  audio: AudioHandle,
  release: AudioRelease,
  use: (audio: AudioHandle) => Promise<T>
): Promise<T> => {
  try {
    return await use(audio);
  } finally {
    await releaseAudio(audio, release);
  }
};

export const releaseAudio = async (audio: AudioHandle, release: AudioRelease) => {
  try {
    await release(audio);
  } catch (error) {
    logger.warn(`Failed to delete recording ${audio.filePath}`, error);
  }
};
