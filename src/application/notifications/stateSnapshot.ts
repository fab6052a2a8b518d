import type { RestoreConfig } from '@/domain/config/types';
import type { RestoreOutcome, TargetStateSnapshot } from '@/domain/notifications/types';
import type { TargetPort } from '@/ports/TargetPort';
import { bestEffort } from '@/shared/bestEffort';
import type { CancellationSignal } from '@/shared/cancellation';
import { createLogger, type Logger } from '@/shared/logging/logger';

const defaultLog = createLogger('Notify', 'State');

/**
 * Captures volume, mute and running app, then forces the target into a
 * known state for the notification: no app, notification volume, unmuted.
 *
 * @param volumePercent notification volume, 0-100
 */
export async function snapshotTargetState(
  target: TargetPort,
  volumePercent: number,
  log: Logger = defaultLog,
): Promise<TargetStateSnapshot> {
  const snapshot: TargetStateSnapshot = {};
  const status = target.getStatus();
  if (status) {
    if (status.volumeLevel !== undefined) snapshot.volumeLevel = status.volumeLevel;
    if (status.muted !== undefined) snapshot.muted = status.muted;
    if (status.appId !== undefined) snapshot.runningApp = status.appId;
    if (status.supportsSeek !== undefined) snapshot.supportsSeek = status.supportsSeek;
  }
  log.debug('target state captured', { target: target.name, ...snapshot });

  const context = { target: target.name };
  await bestEffort(() => target.stopApp(), {
    fallback: undefined,
    onError: 'warn',
    label: 'failed to stop running app',
    context,
    log,
  });
  await bestEffort(() => target.setVolume(volumePercent / 100), {
    fallback: undefined,
    onError: 'warn',
    label: 'failed to set notification volume',
    context,
    log,
  });
  await bestEffort(() => target.setMute(false), {
    fallback: undefined,
    onError: 'warn',
    label: 'failed to unmute target',
    context,
    log,
  });
  return snapshot;
}

export function isEmptySnapshot(snapshot: TargetStateSnapshot): boolean {
  return snapshot.volumeLevel === undefined && snapshot.muted === undefined;
}

/**
 * Reapplies a snapshot once the target reports ready again. Gives up without
 * touching the device when readiness does not return in time, so a restore is
 * either complete or not attempted.
 */
export async function restoreTargetState(
  target: TargetPort,
  snapshot: TargetStateSnapshot,
  signal: CancellationSignal,
  options: RestoreConfig,
  log: Logger = defaultLog,
): Promise<RestoreOutcome> {
  if (isEmptySnapshot(snapshot)) {
    log.info('no device state to restore after notification', { target: target.name });
    return 'nothing-to-restore';
  }

  let attempts = 0;
  while (!target.isReady() && attempts < options.readyAttempts) {
    log.debug('waiting for target to reconnect', { target: target.name, attempt: attempts + 1 });
    if (await signal.wait(options.readyIntervalMs)) {
      log.warn('state restore cancelled', { target: target.name });
      return 'cancelled';
    }
    attempts += 1;
  }
  if (!target.isReady()) {
    log.error('target did not reconnect in time, state not restored', {
      target: target.name,
      attempts,
    });
    return 'timeout';
  }

  const context = { target: target.name };
  await bestEffort(() => target.stopApp(), {
    fallback: undefined,
    onError: 'warn',
    label: 'failed to stop app during restore',
    context,
    log,
  });
  if (snapshot.volumeLevel !== undefined) {
    const level = snapshot.volumeLevel;
    await bestEffort(() => target.setVolume(level), {
      fallback: undefined,
      onError: 'warn',
      label: 'failed to restore volume',
      context,
      log,
    });
  }
  if (snapshot.muted !== undefined) {
    const muted = snapshot.muted;
    await bestEffort(() => target.setMute(muted), {
      fallback: undefined,
      onError: 'warn',
      label: 'failed to restore mute',
      context,
      log,
    });
  }
  log.debug('target state restored', { target: target.name });
  return 'restored';
}
