import { createLogger, type Logger } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';

export function registerShutdownHandlers(
  runtime: Runtime,
  log: Logger = createLogger('Server'),
): void {
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('shutdown requested', { signal });

    // Force-exit watchdog so a stuck stop routine cannot hang the process.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      process.exit(1);
    }, runtime.shutdownTimeoutMs());

    await runtime.stop();

    clearTimeout(forceExit);
    process.exit(0);
  };

  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));
}
