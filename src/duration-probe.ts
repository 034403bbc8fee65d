/**
 * Duration Probe
 *
 * Sums source durations so ffmpeg's out_time can be turned into a percentage.
 * Any file without a known duration makes the total unknown.
 */

import { parseFile } from 'music-metadata';
import { getLogger, Logger } from './rolling-logger.js';

export type DurationProbe = (filePaths: readonly string[]) => Promise<number | null>;

export async function probeFileDuration(filePath: string): Promise<number | null> {
  const mm = await parseFile(filePath, { duration: true, skipCovers: true });
  const duration = mm.format.duration;
  return typeof duration === 'number' && Number.isFinite(duration) && duration > 0 ? duration : null;
}

export function createDurationProbe(logger: Logger = getLogger()): DurationProbe {
  return async (filePaths) => {
    let total = 0;
    for (const filePath of filePaths) {
      try {
        const duration = await probeFileDuration(filePath);
        if (duration === null) {
          logger.debug('[PROBE] No duration for file', { filePath });
          return null;
        }
        total += duration;
      } catch (err) {
        logger.warn('[PROBE] Failed to read file metadata', {
          filePath,
          error: err instanceof Error ? err.message : String(err),
        });
        return null;
      }
    }
    return total;
  };
}
