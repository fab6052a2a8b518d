import { parseFile } from 'music-metadata';
import type { AudioDurationProbe } from '@/ports/SpeechSynthesisPort';

/**
 * Reads the decoded duration from the MP3 headers.
 */
export const probeMp3Duration: AudioDurationProbe = async (filePath) => {
  const meta = await parseFile(filePath, { duration: true });
  const duration = meta.format.duration;
  return typeof duration === 'number' && Number.isFinite(duration) && duration > 0
    ? duration
    : undefined;
};
