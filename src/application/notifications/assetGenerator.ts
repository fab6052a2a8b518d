import path from 'node:path';
import { NotificationError } from '@/domain/notifications/errors';
import { estimateDurationSeconds } from '@/domain/notifications/playback';
import type { AudioAsset } from '@/domain/notifications/types';
import type { AudioDurationProbe, SpeechSynthesisPort } from '@/ports/SpeechSynthesisPort';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';
import { ensureDir, removeFile, statFileSize } from '@/shared/utils/file';

export type AssetGeneratorOptions = {
  assetDir: string;
  bitrateBps: number;
  synthesizer: SpeechSynthesisPort;
  probeDuration?: AudioDurationProbe;
  log?: Logger;
};

/**
 * Renders notification text into `<assetDir>/<targetId>.mp3`.
 *
 * One file per target: the worker handles a single request at a time, so a
 * new notification for the same target may overwrite a stale file.
 */
export class AssetGenerator {
  private readonly log: Logger;

  constructor(private readonly options: AssetGeneratorOptions) {
    this.log = options.log ?? createLogger('Notify', 'Asset');
  }

  public get assetDir(): string {
    return this.options.assetDir;
  }

  public assetPath(targetId: string): string {
    return path.join(this.options.assetDir, `${targetId}.mp3`);
  }

  public async generate(targetId: string, text: string, language: string): Promise<AudioAsset> {
    await ensureDir(this.options.assetDir);
    const filePath = this.assetPath(targetId);

    try {
      await this.options.synthesizer.synthesize(text, language, filePath);
    } catch (error) {
      throw new NotificationError('synthesis-failed', `speech synthesis failed: ${errorMessage(error)}`);
    }

    const sizeBytes = await statFileSize(filePath);
    if (sizeBytes === undefined) {
      throw new NotificationError('asset-missing', `${filePath} not found, synthesis must have failed`);
    }
    if (sizeBytes === 0) {
      throw new NotificationError('synthesis-failed', `${filePath} is empty`);
    }

    const probed = await this.probe(filePath);
    const estimatedDurationSeconds =
      probed !== undefined && probed > 0
        ? probed
        : estimateDurationSeconds(sizeBytes, this.options.bitrateBps);
    this.log.debug('asset created', { filePath, sizeBytes, estimatedDurationSeconds });
    return { path: filePath, sizeBytes, estimatedDurationSeconds };
  }

  /** True when the asset file is still on disk. */
  public async exists(asset: AudioAsset): Promise<boolean> {
    return (await statFileSize(asset.path)) !== undefined;
  }

  public async remove(asset: AudioAsset): Promise<void> {
    await bestEffort(() => removeFile(asset.path), {
      fallback: false,
      onError: 'warn',
      label: 'failed to delete asset',
      context: { filePath: asset.path },
      log: this.log,
    });
  }

  private async probe(filePath: string): Promise<number | undefined> {
    const { probeDuration } = this.options;
    if (!probeDuration) {
      return undefined;
    }
    return bestEffort(() => probeDuration(filePath), {
      fallback: undefined,
      onError: 'debug',
      label: 'duration probe failed',
      context: { filePath },
      log: this.log,
    });
  }
}
