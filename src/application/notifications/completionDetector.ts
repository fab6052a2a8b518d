import type { PlaybackTimingConfig } from '@/domain/config/types';
import { isStarted, playbackPercent } from '@/domain/notifications/playback';
import type { CompletionReport, PlaybackObservation } from '@/domain/notifications/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { MediaSessionPort } from '@/ports/TargetPort';
import { bestEffort } from '@/shared/bestEffort';
import type { CancellationSignal } from '@/shared/cancellation';
import { createLogger, type Logger } from '@/shared/logging/logger';

export type DetectorTimings = Omit<PlaybackTimingConfig, 'bitrateBps'>;

export type PlayRequest = {
  url: string;
  mimeType: string;
  estimatedDurationSeconds: number;
};

/**
 * Decides when a play request has really finished.
 *
 * Receivers report idle while still buffering and only learn the duration
 * once streaming starts, so idle only counts after playing or paused was
 * seen, and the deadline moves once when the reported duration appears.
 */
export class PlaybackCompletionDetector {
  constructor(
    private readonly timings: DetectorTimings,
    private readonly clock: ClockPort,
    private readonly log: Logger = createLogger('Notify', 'Detector'),
  ) {}

  public async run(
    media: MediaSessionPort,
    request: PlayRequest,
    signal: CancellationSignal,
  ): Promise<CompletionReport> {
    const { timings } = this;
    await media.play(request.url, request.mimeType);

    const active = await media.waitUntilActive(timings.activeTimeoutMs, signal);
    if (!active && !signal.isCancelled) {
      this.log.warn('media session not active after play', { timeoutMs: timings.activeTimeoutMs });
    }

    if (await signal.wait(timings.settleMs)) {
      return { completed: false, sawPlaying: false, cancelled: true };
    }

    let deadline =
      this.clock.now() +
      Math.max(
        timings.minDeadlineMs,
        request.estimatedDurationSeconds * 1000 + timings.deadlinePaddingMs,
      );
    let sawPlaying = false;
    let durationSet = false;
    let completed = false;

    while (this.clock.now() < deadline) {
      if (await signal.wait(timings.pollIntervalMs)) {
        break;
      }
      const observation = await bestEffort<PlaybackObservation | undefined>(
        () => media.getStatus(),
        {
          fallback: undefined,
          onError: 'debug',
          label: 'media status refresh failed',
          log: this.log,
        },
      );
      if (!observation) {
        continue;
      }
      if (isStarted(observation)) {
        sawPlaying = true;
      }
      if (sawPlaying && !durationSet && observation.reportedDuration !== undefined) {
        deadline =
          this.clock.now() +
          observation.reportedDuration * 1000 +
          timings.reportedDurationPaddingMs;
        durationSet = true;
      }
      if (sawPlaying && observation.isIdle) {
        completed = true;
        break;
      }
      this.log.debug(sawPlaying ? 'playing' : 'waiting for player to start', {
        percent: playbackPercent(observation),
        remainingMs: deadline - this.clock.now(),
      });
    }

    if (!signal.isCancelled) {
      await signal.wait(timings.flushGraceMs);
    }
    return { completed, sawPlaying, cancelled: signal.isCancelled };
  }
}
