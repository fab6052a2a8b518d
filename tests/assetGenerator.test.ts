import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from './testHarness';
import { AssetGenerator } from '../src/application/notifications/assetGenerator';
import { isNotificationError } from '../src/domain/notifications/errors';
import { FakeSynthesizer } from './fakes/speechSynthesizer';
import { silentLogger } from './fakes/recordingLogger';

async function withAssetDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'assets-'));
  try {
    await fn(path.join(root, 'messages'));
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
}

async function expectCode(promise: Promise<unknown>, code: string): Promise<void> {
  await assert.rejects(promise, (error: unknown) => isNotificationError(error) && error.code === code);
}

test('generator writes one file per target and estimates duration from size', async () => {
  await withAssetDir(async (dir) => {
    const synthesizer = new FakeSynthesizer(16000);
    const assets = new AssetGenerator({ assetDir: dir, bitrateBps: 128000, synthesizer, log: silentLogger });

    const asset = await assets.generate('uuid-1', 'Dinner is ready', 'de');
    assert.deepEqual(asset, {
      path: path.join(dir, 'uuid-1.mp3'),
      sizeBytes: 16000,
      estimatedDurationSeconds: 1,
    });
    assert.deepEqual(synthesizer.requests, [
      { text: 'Dinner is ready', language: 'de', outputPath: path.join(dir, 'uuid-1.mp3') },
    ]);
    assert.equal(await assets.exists(asset), true);
  });
});

test('generator prefers the probed duration', async () => {
  await withAssetDir(async (dir) => {
    const assets = new AssetGenerator({
      assetDir: dir,
      bitrateBps: 128000,
      synthesizer: new FakeSynthesizer(16000),
      probeDuration: async () => 2.5,
      log: silentLogger,
    });

    const asset = await assets.generate('uuid-1', 'hello', 'en');
    assert.equal(asset.estimatedDurationSeconds, 2.5);
  });
});

test('generator falls back to the estimate when probing fails', async () => {
  await withAssetDir(async (dir) => {
    const assets = new AssetGenerator({
      assetDir: dir,
      bitrateBps: 32000,
      synthesizer: new FakeSynthesizer(8000),
      probeDuration: async () => {
        throw new Error('not an mp3');
      },
      log: silentLogger,
    });

    const asset = await assets.generate('uuid-1', 'hello', 'en');
    assert.equal(asset.estimatedDurationSeconds, 2);
  });
});

test('synthesis errors become synthesis-failed', async () => {
  await withAssetDir(async (dir) => {
    const synthesizer = new FakeSynthesizer();
    synthesizer.error = new Error('service unavailable');
    const assets = new AssetGenerator({ assetDir: dir, bitrateBps: 128000, synthesizer, log: silentLogger });

    await expectCode(assets.generate('uuid-1', 'hello', 'en'), 'synthesis-failed');
  });
});

test('a missing output file becomes asset-missing', async () => {
  await withAssetDir(async (dir) => {
    const synthesizer = new FakeSynthesizer();
    synthesizer.writeFile = false;
    const assets = new AssetGenerator({ assetDir: dir, bitrateBps: 128000, synthesizer, log: silentLogger });

    await expectCode(assets.generate('uuid-1', 'hello', 'en'), 'asset-missing');
  });
});

test('an empty output file becomes synthesis-failed', async () => {
  await withAssetDir(async (dir) => {
    const assets = new AssetGenerator({
      assetDir: dir,
      bitrateBps: 128000,
      synthesizer: new FakeSynthesizer(0),
      log: silentLogger,
    });

    await expectCode(assets.generate('uuid-1', 'hello', 'en'), 'synthesis-failed');
  });
});

test('remove deletes the asset and tolerates a second call', async () => {
  await withAssetDir(async (dir) => {
    const assets = new AssetGenerator({
      assetDir: dir,
      bitrateBps: 128000,
      synthesizer: new FakeSynthesizer(),
      log: silentLogger,
    });
    const asset = await assets.generate('uuid-1', 'hello', 'en');

    await assets.remove(asset);
    assert.equal(await assets.exists(asset), false);
    await assets.remove(asset);
    assert.deepEqual(await fs.readdir(dir), []);
  });
});
