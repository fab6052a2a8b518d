import assert from 'node:assert/strict';
import { test } from './testHarness';
import {
  isEmptySnapshot,
  restoreTargetState,
  snapshotTargetState,
} from '../src/application/notifications/stateSnapshot';
import { CancellationSignal } from '../src/shared/cancellation';
import { FakeTarget } from './fakes/castTarget';
import { createRecordingLogger, silentLogger } from './fakes/recordingLogger';

const restoreOptions = { readyAttempts: 5, readyIntervalMs: 1 };

test('snapshot captures device state and prepares the target', async () => {
  const target = new FakeTarget('uuid-1', 'Kitchen', { volumeLevel: 0.3, muted: true, appId: 'CC1AD845' });

  const snapshot = await snapshotTargetState(target, 40, silentLogger);
  assert.deepEqual(snapshot, { volumeLevel: 0.3, muted: true, runningApp: 'CC1AD845' });
  assert.deepEqual(target.calls, ['stop', 'volume:0.4', 'mute:false']);
});

test('snapshot keeps going when a device command fails', async () => {
  const target = new FakeTarget('uuid-1', 'Kitchen');
  target.stopApp = async () => {
    throw new Error('no session');
  };
  const { log, entries } = createRecordingLogger();

  const snapshot = await snapshotTargetState(target, 50, log);
  assert.deepEqual(snapshot, { volumeLevel: 0.3, muted: false });
  assert.deepEqual(target.calls, ['volume:0.5', 'mute:false']);
  const warn = entries.find((entry) => entry.level === 'warn');
  assert.equal(warn?.message, 'failed to stop running app');
  assert.equal(warn?.data?.message, 'no session');
});

test('restore skips targets that never reported state', async () => {
  const target = new FakeTarget('uuid-1', 'Kitchen');
  target.status = undefined;
  const { log, entries } = createRecordingLogger();

  const snapshot = await snapshotTargetState(target, 50, log);
  assert.equal(isEmptySnapshot(snapshot), true);
  target.calls.length = 0;

  const outcome = await restoreTargetState(target, snapshot, new CancellationSignal(), restoreOptions, log);
  assert.equal(outcome, 'nothing-to-restore');
  assert.deepEqual(target.calls, []);
  assert.ok(entries.some((entry) => entry.level === 'info' && entry.message === 'no device state to restore after notification'));
});

test('restore waits for the target to reconnect', async () => {
  const target = new FakeTarget('uuid-1', 'Kitchen');
  target.ready = false;
  target.readyAfterChecks = 2;

  const outcome = await restoreTargetState(
    target,
    { volumeLevel: 0.3, muted: false },
    new CancellationSignal(),
    restoreOptions,
    silentLogger,
  );
  assert.equal(outcome, 'restored');
  assert.deepEqual(target.calls, ['stop', 'volume:0.3', 'mute:false']);
});

test('restore gives up without touching a target that stays away', async () => {
  const target = new FakeTarget('uuid-1', 'Kitchen');
  target.ready = false;
  const { log, entries } = createRecordingLogger();

  const outcome = await restoreTargetState(
    target,
    { volumeLevel: 0.3 },
    new CancellationSignal(),
    { readyAttempts: 3, readyIntervalMs: 1 },
    log,
  );
  assert.equal(outcome, 'timeout');
  assert.deepEqual(target.calls, []);
  const error = entries.find((entry) => entry.level === 'error');
  assert.equal(error?.message, 'target did not reconnect in time, state not restored');
  assert.equal(error?.data?.attempts, 3);
});

test('restore stops waiting on cancellation', async () => {
  const target = new FakeTarget('uuid-1', 'Kitchen');
  target.ready = false;
  const signal = new CancellationSignal();
  signal.cancel();

  const outcome = await restoreTargetState(target, { muted: true }, signal, restoreOptions, silentLogger);
  assert.equal(outcome, 'cancelled');
  assert.deepEqual(target.calls, []);
});

test('restore still applies to a ready target after cancellation', async () => {
  const target = new FakeTarget('uuid-1', 'Kitchen');
  const signal = new CancellationSignal();
  signal.cancel();

  const outcome = await restoreTargetState(target, { volumeLevel: 0.7, muted: true }, signal, restoreOptions, silentLogger);
  assert.equal(outcome, 'restored');
  assert.deepEqual(target.calls, ['stop', 'volume:0.7', 'mute:true']);
});
