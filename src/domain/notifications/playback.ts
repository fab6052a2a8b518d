import type { PlaybackObservation } from '@/domain/notifications/types';

/**
 * Position as a percentage of the reported duration, or null when either is
 * unknown or the duration is zero.
 */
export function playbackPercent(observation: PlaybackObservation): number | null {
  const { reportedDuration, reportedPosition } = observation;
  if (reportedDuration === undefined || reportedPosition === undefined) {
    return null;
  }
  if (!Number.isFinite(reportedDuration) || reportedDuration <= 0 || !Number.isFinite(reportedPosition)) {
    return null;
  }
  const percent = (reportedPosition / reportedDuration) * 100;
  return Math.min(100, Math.max(0, Math.round(percent)));
}

export function estimateDurationSeconds(sizeBytes: number, bitrateBps: number): number {
  if (sizeBytes <= 0 || bitrateBps <= 0) {
    return 0;
  }
  return (sizeBytes * 8) / bitrateBps;
}

export function isStarted(observation: PlaybackObservation): boolean {
  return observation.isPlaying || observation.isPaused;
}
