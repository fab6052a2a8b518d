import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';

export type StopResult =
  | { name: string; kind: 'stopped' }
  | { name: string; kind: 'timeout'; timeoutMs: number }
  | { name: string; kind: 'error'; error: unknown };

/**
 * Awaits a stop routine for at most `timeoutMs`. A stuck routine is reported
 * as a timeout and left to finish (or fail) in the background.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: Logger = createLogger('Server'),
): Promise<StopResult> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const stopPromise = (async (): Promise<StopResult> => {
    try {
      await stopFn();
      return { name, kind: 'stopped' };
    } catch (error) {
      return { name, kind: 'error', error };
    }
  })();
  const timeoutPromise = new Promise<StopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ name, kind: 'timeout', timeoutMs }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });

  if (result.kind === 'stopped') {
    log.info(`service ${name} stopped`);
    return result;
  }

  if (result.kind === 'timeout') {
    log.error(`service ${name} stop timed out`, { timeoutMs });
    void stopPromise.then((finalResult) => {
      if (finalResult.kind === 'error') {
        log.error(`failed to stop ${name}`, { message: errorMessage(finalResult.error) });
      }
    });
    return result;
  }

  log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
  return result;
}
