import type { ShutdownConfig } from '@/domain/config/types';
import type { NotificationQueue } from '@/application/notifications/notificationQueue';
import type { NotificationWorker } from '@/application/notifications/notificationWorker';
import type { CancellationSignal } from '@/shared/cancellation';
import { createLogger, type Logger } from '@/shared/logging/logger';
import { stopWithTimeout, type StopResult } from '@/runtime/stopWithTimeout';

/**
 * Anything with a start/stop lifecycle the pipeline brings up before the worker.
 */
export type PipelineService = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

export type ShutdownReport = {
  worker: StopResult;
  drain: StopResult;
  mediaServer: StopResult;
};

export type NotificationPipelineOptions = {
  queue: NotificationQueue;
  worker: NotificationWorker;
  mediaServer: PipelineService;
  signal: CancellationSignal;
  shutdown: ShutdownConfig;
  defaultTarget: () => string;
  log?: Logger;
};

/**
 * Trigger surface plus the shutdown coordinator for the notification worker
 * and the media server.
 */
export class NotificationPipeline {
  private readonly log: Logger;
  private workerDone: Promise<void> | null = null;
  private stopping: Promise<ShutdownReport> | null = null;

  constructor(private readonly options: NotificationPipelineOptions) {
    this.log = options.log ?? createLogger('Notify', 'Pipeline');
  }

  public get isRunning(): boolean {
    return this.workerDone !== null && this.stopping === null;
  }

  public async start(): Promise<void> {
    if (this.workerDone) {
      return;
    }
    await this.options.mediaServer.start();
    this.workerDone = this.options.worker.run();
    this.log.info('notification pipeline started');
  }

  /**
   * Fire-and-forget. Returns false when the request was refused.
   */
  public notify(target: string, text: string): boolean {
    const name = target.trim();
    const message = text.trim();
    if (!name || !message) {
      this.log.warn('notification ignored, target and text are required', { target: name });
      return false;
    }
    return this.options.queue.enqueue({ target: name, text: message });
  }

  public notifyDefault(text: string): boolean {
    const target = this.options.defaultTarget().trim();
    if (!target) {
      this.log.warn('notification ignored, no default target configured');
      return false;
    }
    return this.notify(target, text);
  }

  /**
   * Signals cancellation, wakes the worker, waits (bounded) for it to exit and
   * for the queue to drain, then stops the media server. Safe to call twice.
   */
  public stop(): Promise<ShutdownReport> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<ShutdownReport> {
    const { queue, signal, shutdown } = this.options;
    this.log.info('clearing notification queue', { pending: queue.pending });
    signal.cancel();
    queue.close();
    queue.pushShutdown();

    const workerDone = this.workerDone;
    const worker = await stopWithTimeout(
      'notification worker',
      async () => {
        if (workerDone) {
          await workerDone;
        }
      },
      shutdown.workerTimeoutMs,
      this.log,
    );
    if (!workerDone) {
      // The worker never ran, so nothing will acknowledge what is queued.
      queue.discardPending();
    }
    const drain = await stopWithTimeout(
      'notification queue',
      () => queue.drain(),
      shutdown.drainTimeoutMs,
      this.log,
    );
    const mediaServer = await stopWithTimeout(
      'media server',
      () => this.options.mediaServer.stop(),
      shutdown.serviceTimeoutMs,
      this.log,
    );
    return { worker, drain, mediaServer };
  }
}
