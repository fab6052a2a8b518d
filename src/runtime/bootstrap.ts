import { loadConfig } from '@/config';
import { loadEnvironment } from '@/config/environment';
import { createLogger, logManager } from '@/shared/logging/logger';
import { CancellationSignal } from '@/shared/cancellation';
import { systemClock } from '@/infrastructure/time/systemClock';
import { AssetGenerator } from '@/application/notifications/assetGenerator';
import { PlaybackCompletionDetector } from '@/application/notifications/completionDetector';
import { NotificationQueue } from '@/application/notifications/notificationQueue';
import { NotificationWorker } from '@/application/notifications/notificationWorker';
import { TargetRegistry } from '@/application/targets/targetRegistry';
import { CastDiscovery } from '@/adapters/cast/castDiscovery';
import { createCastTarget } from '@/adapters/cast/castTarget';
import { ControlApiServer } from '@/adapters/http/controlApi/controlApiServer';
import { MediaServer } from '@/adapters/http/mediaServer';
import { probeMp3Duration } from '@/adapters/tts/durationProbe';
import { GoogleTtsSynthesizer } from '@/adapters/tts/googleTtsSynthesizer';
import { createRuntimePorts } from '@/runtime/ports';
import { NotificationPipeline } from '@/runtime/notificationPipeline';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
  /** Upper bound for `stop()`, used by the force-exit watchdog. */
  shutdownTimeoutMs: () => number;
};

export function createRuntime(cwd: string = process.cwd()): Runtime {
  const env = loadEnvironment(cwd);
  const ports = createRuntimePorts(env.configPath);
  const configPort = ports.config;
  const log = createLogger('Server');
  let pipeline: NotificationPipeline | null = null;
  let registry: TargetRegistry | null = null;
  let discovery: CastDiscovery | null = null;
  let controlApi: ControlApiServer | null = null;

  async function startServices(): Promise<void> {
    const storedConfig = await configPort.load();
    logManager.configure({
      level: storedConfig.logging.consoleLevel,
      json: storedConfig.logging.json,
    });
    const config = loadConfig(storedConfig, cwd);

    const signal = new CancellationSignal();
    const queue = new NotificationQueue();
    const targets = new TargetRegistry(createCastTarget, {
      audioOnly: storedConfig.discovery.audioOnly,
    });
    registry = targets;
    const mediaServer = new MediaServer(config.mediaServer);
    const worker = new NotificationWorker({
      queue,
      targets,
      assets: new AssetGenerator({
        assetDir: config.env.assetDir,
        bitrateBps: storedConfig.playback.bitrateBps,
        synthesizer: new GoogleTtsSynthesizer(fetch, storedConfig.notifications.synthesisTimeoutMs),
        probeDuration: probeMp3Duration,
      }),
      detector: new PlaybackCompletionDetector(storedConfig.playback, systemClock),
      signal,
      mediaUrl: (fileName) => mediaServer.assetUrl(fileName),
      settings: () => configPort.getConfig().notifications,
      restore: storedConfig.restore,
    });
    const notifications = new NotificationPipeline({
      queue,
      worker,
      mediaServer,
      signal,
      shutdown: storedConfig.shutdown,
      defaultTarget: () => configPort.getConfig().notifications.defaultTarget,
    });
    pipeline = notifications;

    await notifications.start();
    log.info('notifications will serve audio media from', {
      address: `${config.mediaServer.advertisedHost}:${mediaServer.port}`,
    });

    if (storedConfig.discovery.enabled) {
      discovery = new CastDiscovery();
      discovery.start(targets);
    }

    if (storedConfig.controlApi.enabled) {
      controlApi = new ControlApiServer(config.controlApi, {
        notify: (target, text) => notifications.notify(target, text),
        notifyDefault: (text) => notifications.notifyDefault(text),
        listTargets: () => targets.list(),
      });
      await controlApi.start();
    }

    log.info('startup complete');
  }

  async function stopServices(): Promise<void> {
    const { shutdown } = configPort.getConfig();
    const first: LifecycleService[] = [];
    if (controlApi) {
      const server = controlApi;
      first.push({ name: 'control-api', stop: () => server.stop() });
    }
    await Promise.all(
      first.map((service) => stopWithTimeout(service.name, service.stop, shutdown.serviceTimeoutMs, log)),
    );

    // Targets stay connected until the worker had its chance to restore state.
    if (pipeline) {
      const report = await pipeline.stop();
      if (report.worker.kind !== 'stopped') {
        log.error('notification worker did not stop in time');
      }
    }

    const services: LifecycleService[] = [];
    if (discovery) {
      const feed = discovery;
      services.push({ name: 'discovery', stop: () => feed.stop() });
    }
    if (registry) {
      const targets = registry;
      services.push({ name: 'targets', stop: () => targets.disposeAll() });
    }
    await Promise.all(
      services.map((service) =>
        stopWithTimeout(service.name, service.stop, shutdown.serviceTimeoutMs, log),
      ),
    );

    controlApi = null;
    pipeline = null;
    discovery = null;
    registry = null;
  }

  function shutdownTimeoutMs(): number {
    const { shutdown } = configPort.getConfig();
    return (
      shutdown.workerTimeoutMs +
      shutdown.drainTimeoutMs +
      shutdown.serviceTimeoutMs * 3 +
      1000
    );
  }

  return {
    start: startServices,
    stop: stopServices,
    shutdownTimeoutMs,
  };
}
