import path from 'node:path';
import type { NotificationsConfig, RestoreConfig } from '@/domain/config/types';
import { NotificationError, isNotificationError } from '@/domain/notifications/errors';
import type {
  CompletionReport,
  NotificationRequest,
  RestoreOutcome,
  SessionOutcome,
  TargetStateSnapshot,
} from '@/domain/notifications/types';
import type { TargetPort } from '@/ports/TargetPort';
import type { AssetGenerator } from '@/application/notifications/assetGenerator';
import type { PlaybackCompletionDetector } from '@/application/notifications/completionDetector';
import { NotificationQueue, QUEUE_SHUTDOWN } from '@/application/notifications/notificationQueue';
import { restoreTargetState, snapshotTargetState } from '@/application/notifications/stateSnapshot';
import type { TargetLookup } from '@/application/targets/targetRegistry';
import { bestEffortSync } from '@/shared/bestEffort';
import type { CancellationSignal } from '@/shared/cancellation';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';

export const NOTIFICATION_MIME_TYPE = 'audio/mpeg';

export type NotificationWorkerOptions = {
  queue: NotificationQueue;
  targets: TargetLookup;
  assets: AssetGenerator;
  detector: PlaybackCompletionDetector;
  signal: CancellationSignal;
  /** Builds the URL the target fetches the asset from. */
  mediaUrl: (fileName: string) => string;
  /** Read once per request so config edits apply to the next notification. */
  settings: () => Pick<NotificationsConfig, 'language' | 'languageOverrides' | 'volume'>;
  restore: RestoreConfig;
  dequeueTimeoutMs?: number;
  onSessionComplete?: (request: NotificationRequest, outcome: SessionOutcome) => void;
  log?: Logger;
};

export function resolveLanguage(
  settings: Pick<NotificationsConfig, 'language' | 'languageOverrides'>,
): string {
  const language = settings.language.trim() || 'en';
  return settings.languageOverrides[language] ?? language;
}

/**
 * Single consumer of the notification queue. Handles one session at a time:
 * resolve target, skip when muted, synthesize, snapshot, play and detect
 * completion, restore, then delete the asset when playback completed.
 */
export class NotificationWorker {
  private readonly log: Logger;

  constructor(private readonly options: NotificationWorkerOptions) {
    this.log = options.log ?? createLogger('Notify', 'Worker');
  }

  /**
   * Runs until the shutdown marker is dequeued or the signal fires. Never rejects.
   */
  public async run(): Promise<void> {
    const { queue, signal } = this.options;
    const timeoutMs = this.options.dequeueTimeoutMs ?? 1000;
    this.log.debug('entering notification handler');

    while (!signal.isCancelled) {
      const entry = await queue.dequeue(timeoutMs);
      if (entry === null) {
        continue;
      }
      if (entry === QUEUE_SHUTDOWN) {
        queue.markProcessed();
        break;
      }
      try {
        const outcome = await this.handle(entry);
        this.report(entry, outcome);
      } finally {
        queue.markProcessed();
      }
    }

    const discarded = queue.discardPending();
    if (discarded.length > 0) {
      this.log.warn('pending notifications discarded at shutdown', { count: discarded.length });
    }
    for (const request of discarded) {
      this.report(request, {
        kind: 'failed',
        target: request.target,
        code: 'cancelled',
        message: 'discarded at shutdown',
      });
    }
    this.log.debug('exiting notification handler');
  }

  /**
   * Processes one request and converts every failure into an outcome.
   */
  public async handle(request: NotificationRequest): Promise<SessionOutcome> {
    try {
      return await this.process(request);
    } catch (error) {
      const failure = isNotificationError(error)
        ? error
        : new NotificationError('playback-failed', errorMessage(error), request.target);
      this.log.error(failure.message, { target: request.target, code: failure.code });
      return {
        kind: 'failed',
        target: request.target,
        code: failure.code,
        message: failure.message,
      };
    }
  }

  private async process(request: NotificationRequest): Promise<SessionOutcome> {
    const { assets, signal } = this.options;
    this.log.debug('handling notification', { target: request.target, text: request.text });

    const target = this.options.targets.findByName(request.target);
    if (!target) {
      throw new NotificationError('target-not-found', `target '${request.target}' not found`, request.target);
    }
    if (target.getStatus()?.muted) {
      this.log.info('target is muted, notification skipped', { target: target.name });
      return { kind: 'skipped', target: request.target, reason: 'muted' };
    }
    if (!target.isReady()) {
      throw new NotificationError('target-unavailable', `target '${target.name}' is not connected`, target.name);
    }
    if (signal.isCancelled) {
      throw new NotificationError('cancelled', 'shutdown requested', target.name);
    }

    const settings = this.options.settings();
    const language = resolveLanguage(settings);
    this.log.debug('synthesizing', { target: target.name, language });
    const asset = await assets.generate(target.id, request.text, language);
    if (!(await assets.exists(asset))) {
      throw new NotificationError('asset-missing', `${asset.path} not found`, target.name);
    }

    const snapshot = await snapshotTargetState(target, settings.volume, this.log);
    let report: CompletionReport;
    try {
      report = await this.options.detector.run(
        target.media,
        {
          url: this.options.mediaUrl(path.basename(asset.path)),
          mimeType: NOTIFICATION_MIME_TYPE,
          estimatedDurationSeconds: asset.estimatedDurationSeconds,
        },
        signal,
      );
    } catch (error) {
      await this.restore(target, snapshot);
      throw new NotificationError(
        'playback-failed',
        `playback on '${target.name}' failed: ${errorMessage(error)}`,
        target.name,
      );
    }
    const restore = await this.restore(target, snapshot);

    if (report.completed) {
      await assets.remove(asset);
      if (restore === 'timeout') {
        throw new NotificationError(
          'restore-timeout',
          `notification to '${target.name}' completed but state was not restored`,
          target.name,
        );
      }
      this.log.info('notification completed', { target: target.name });
      return { kind: 'done', target: request.target, restore };
    }
    if (report.cancelled) {
      throw new NotificationError('cancelled', `notification to '${target.name}' cancelled`, target.name);
    }
    throw new NotificationError(
      'playback-timeout',
      `notification sent to '${target.name}' timed out`,
      target.name,
    );
  }

  private restore(target: TargetPort, snapshot: TargetStateSnapshot): Promise<RestoreOutcome> {
    return restoreTargetState(target, snapshot, this.options.signal, this.options.restore, this.log);
  }

  private report(request: NotificationRequest, outcome: SessionOutcome): void {
    const { onSessionComplete } = this.options;
    if (!onSessionComplete) {
      return;
    }
    bestEffortSync(() => onSessionComplete(request, outcome), {
      fallback: undefined,
      onError: 'warn',
      label: 'session listener failed',
      log: this.log,
    });
  }
}
