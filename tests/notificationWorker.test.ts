import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from './testHarness';
import { AssetGenerator } from '../src/application/notifications/assetGenerator';
import { PlaybackCompletionDetector } from '../src/application/notifications/completionDetector';
import { NotificationQueue } from '../src/application/notifications/notificationQueue';
import { NotificationWorker, resolveLanguage } from '../src/application/notifications/notificationWorker';
import { TargetRegistry } from '../src/application/targets/targetRegistry';
import type { SessionOutcome } from '../src/domain/notifications/types';
import { CancellationSignal } from '../src/shared/cancellation';
import { FakeTarget, ManualClock, playing, idle } from './fakes/castTarget';
import { FakeSynthesizer } from './fakes/speechSynthesizer';
import { silentLogger } from './fakes/recordingLogger';

type WorkerHarness = {
  dir: string;
  queue: NotificationQueue;
  signal: CancellationSignal;
  synthesizer: FakeSynthesizer;
  worker: NotificationWorker;
  outcomes: Array<{ target: string; outcome: SessionOutcome }>;
};

const timings = {
  activeTimeoutMs: 10,
  settleMs: 1,
  pollIntervalMs: 1,
  flushGraceMs: 1,
  minDeadlineMs: 50,
  deadlinePaddingMs: 0,
  reportedDurationPaddingMs: 0,
};

const clock = new ManualClock();

/** Plays, then goes idle on the second poll. */
function completesPlayback(target: FakeTarget): void {
  target.media.setScript([playing, idle]);
  target.media.onPoll = () => clock.advance(5);
}

async function withWorker(targets: FakeTarget[], fn: (harness: WorkerHarness) => Promise<void>): Promise<void> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'worker-'));
  const dir = path.join(root, 'messages');
  const queue = new NotificationQueue(silentLogger);
  const registry = new TargetRegistry(
    () => {
      throw new Error('discovery is not used here');
    },
    { audioOnly: true },
    silentLogger,
  );
  targets.forEach((target) => registry.add(target));
  const synthesizer = new FakeSynthesizer();
  const signal = new CancellationSignal();
  const outcomes: WorkerHarness['outcomes'] = [];
  const worker = new NotificationWorker({
    queue,
    targets: registry,
    assets: new AssetGenerator({ assetDir: dir, bitrateBps: 128000, synthesizer, log: silentLogger }),
    detector: new PlaybackCompletionDetector(timings, clock, silentLogger),
    signal,
    mediaUrl: (fileName) => `http://192.0.2.10:8093/${fileName}`,
    settings: () => ({ language: 'de', languageOverrides: {}, volume: 50 }),
    restore: { readyAttempts: 3, readyIntervalMs: 1 },
    dequeueTimeoutMs: 5,
    onSessionComplete: (request, outcome) => outcomes.push({ target: request.target, outcome }),
    log: silentLogger,
  });
  try {
    await fn({ dir, queue, signal, synthesizer, worker, outcomes });
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

test('resolveLanguage applies overrides and defaults to english', () => {
  assert.equal(resolveLanguage({ language: 'no', languageOverrides: { no: 'nb' } }), 'nb');
  assert.equal(resolveLanguage({ language: 'de', languageOverrides: { no: 'nb' } }), 'de');
  assert.equal(resolveLanguage({ language: ' ', languageOverrides: {} }), 'en');
});

test('completed notification restores state and deletes the asset', async () => {
  const kitchen = new FakeTarget('uuid-1', 'Kitchen');
  completesPlayback(kitchen);
  await withWorker([kitchen], async ({ dir, synthesizer, worker }) => {
    const outcome = await worker.handle({ target: 'Kitchen', text: 'Dinner is ready' });

    assert.deepEqual(outcome, { kind: 'done', target: 'Kitchen', restore: 'restored' });
    assert.deepEqual(synthesizer.requests, [
      { text: 'Dinner is ready', language: 'de', outputPath: path.join(dir, 'uuid-1.mp3') },
    ]);
    assert.deepEqual(kitchen.media.played, [
      { url: 'http://192.0.2.10:8093/uuid-1.mp3', mimeType: 'audio/mpeg' },
    ]);
    assert.deepEqual(kitchen.calls, ['stop', 'volume:0.5', 'mute:false', 'stop', 'volume:0.3', 'mute:false']);
    assert.equal(await fileExists(path.join(dir, 'uuid-1.mp3')), false);
  });
});

test('muted target is skipped without synthesizing', async () => {
  const kitchen = new FakeTarget('uuid-1', 'Kitchen', { volumeLevel: 0.3, muted: true });
  await withWorker([kitchen], async ({ dir, synthesizer, worker }) => {
    const outcome = await worker.handle({ target: 'Kitchen', text: 'hello' });

    assert.deepEqual(outcome, { kind: 'skipped', target: 'Kitchen', reason: 'muted' });
    assert.equal(synthesizer.requests.length, 0);
    assert.deepEqual(kitchen.calls, []);
    assert.equal(await fileExists(path.join(dir, 'uuid-1.mp3')), false);
  });
});

test('unknown target fails with target-not-found', async () => {
  await withWorker([new FakeTarget('uuid-1', 'Kitchen')], async ({ worker }) => {
    const outcome = await worker.handle({ target: 'Attic', text: 'hello' });
    assert.deepEqual(outcome, {
      kind: 'failed',
      target: 'Attic',
      code: 'target-not-found',
      message: "target 'Attic' not found",
    });
  });
});

test('disconnected target fails with target-unavailable', async () => {
  const kitchen = new FakeTarget('uuid-1', 'Kitchen');
  kitchen.ready = false;
  await withWorker([kitchen], async ({ synthesizer, worker }) => {
    const outcome = await worker.handle({ target: 'Kitchen', text: 'hello' });
    assert.equal(outcome.kind, 'failed');
    assert.equal(outcome.kind === 'failed' ? outcome.code : undefined, 'target-unavailable');
    assert.equal(synthesizer.requests.length, 0);
  });
});

test('playback that never finishes times out and keeps the asset', async () => {
  const kitchen = new FakeTarget('uuid-1', 'Kitchen');
  kitchen.media.setScript([playing]);
  kitchen.media.onPoll = () => clock.advance(20);
  await withWorker([kitchen], async ({ dir, worker }) => {
    const outcome = await worker.handle({ target: 'Kitchen', text: 'hello' });

    assert.deepEqual(outcome, {
      kind: 'failed',
      target: 'Kitchen',
      code: 'playback-timeout',
      message: "notification sent to 'Kitchen' timed out",
    });
    assert.deepEqual(kitchen.calls.slice(3), ['stop', 'volume:0.3', 'mute:false']);
    assert.equal(await fileExists(path.join(dir, 'uuid-1.mp3')), true);
  });
});

test('play errors restore state and fail with playback-failed', async () => {
  const kitchen = new FakeTarget('uuid-1', 'Kitchen');
  kitchen.media.playError = new Error('launch refused');
  await withWorker([kitchen], async ({ worker }) => {
    const outcome = await worker.handle({ target: 'Kitchen', text: 'hello' });

    assert.deepEqual(outcome, {
      kind: 'failed',
      target: 'Kitchen',
      code: 'playback-failed',
      message: "playback on 'Kitchen' failed: launch refused",
    });
    assert.deepEqual(kitchen.calls, ['stop', 'volume:0.5', 'mute:false', 'stop', 'volume:0.3', 'mute:false']);
  });
});

test('completed playback with a failed restore reports restore-timeout', async () => {
  const kitchen = new FakeTarget('uuid-1', 'Kitchen');
  kitchen.media.setScript([playing, idle]);
  kitchen.media.onPoll = () => {
    clock.advance(5);
    if (kitchen.media.statusCalls === 1) {
      kitchen.ready = false;
    }
  };
  await withWorker([kitchen], async ({ dir, worker }) => {
    const outcome = await worker.handle({ target: 'Kitchen', text: 'hello' });

    assert.equal(outcome.kind === 'failed' ? outcome.code : outcome.kind, 'restore-timeout');
    assert.deepEqual(kitchen.calls, ['stop', 'volume:0.5', 'mute:false']);
    assert.equal(await fileExists(path.join(dir, 'uuid-1.mp3')), false);
  });
});

test('worker processes requests in order and exits on the shutdown marker', async () => {
  const kitchen = new FakeTarget('uuid-1', 'Kitchen');
  const office = new FakeTarget('uuid-2', 'Office');
  completesPlayback(kitchen);
  completesPlayback(office);
  await withWorker([kitchen, office], async ({ queue, worker, outcomes }) => {
    queue.enqueue({ target: 'Kitchen', text: 'first' });
    queue.enqueue({ target: 'Attic', text: 'second' });
    queue.enqueue({ target: 'Office', text: 'third' });
    queue.pushShutdown();

    await worker.run();

    assert.deepEqual(
      outcomes.map(({ target, outcome }) => `${target}:${outcome.kind}`),
      ['Kitchen:done', 'Attic:failed', 'Office:done'],
    );
    assert.equal(queue.pending, 0);
  });
});

test('second request is synthesized only after the first target is restored', async () => {
  const kitchen = new FakeTarget('uuid-1', 'Kitchen');
  const office = new FakeTarget('uuid-2', 'Office');
  completesPlayback(kitchen);
  completesPlayback(office);
  await withWorker([kitchen, office], async ({ queue, synthesizer, worker }) => {
    const journal: string[] = [];
    kitchen.journal = journal;
    office.journal = journal;
    synthesizer.journal = journal;

    const running = worker.run();
    const producers = [
      Promise.resolve().then(() => queue.enqueue({ target: 'Kitchen', text: 'first' })),
      new Promise<void>((resolve) =>
        setImmediate(() => {
          queue.enqueue({ target: 'Office', text: 'second' });
          resolve();
        }),
      ),
    ];
    await Promise.all(producers);
    queue.pushShutdown();
    await running;

    assert.deepEqual(journal, [
      'synthesize:first',
      'Kitchen:stop',
      'Kitchen:volume:0.5',
      'Kitchen:mute:false',
      'Kitchen:stop',
      'Kitchen:volume:0.3',
      'Kitchen:mute:false',
      'synthesize:second',
      'Office:stop',
      'Office:volume:0.5',
      'Office:mute:false',
      'Office:stop',
      'Office:volume:0.3',
      'Office:mute:false',
    ]);
  });
});

test('worker reports leftovers as cancelled when the signal fires', async () => {
  await withWorker([new FakeTarget('uuid-1', 'Kitchen')], async ({ queue, signal, worker, outcomes }) => {
    signal.cancel();
    queue.enqueue({ target: 'Kitchen', text: 'one' });
    queue.enqueue({ target: 'Kitchen', text: 'two' });

    await worker.run();

    assert.deepEqual(outcomes, [
      {
        target: 'Kitchen',
        outcome: { kind: 'failed', target: 'Kitchen', code: 'cancelled', message: 'discarded at shutdown' },
      },
      {
        target: 'Kitchen',
        outcome: { kind: 'failed', target: 'Kitchen', code: 'cancelled', message: 'discarded at shutdown' },
      },
    ]);
    assert.equal(queue.pending, 0);
  });
});
