import type { PlaybackObservation } from '@/domain/notifications/types';
import type { CancellationSignal } from '@/shared/cancellation';

/**
 * Last status the device pushed. Any field may be missing before the first
 * status message arrives.
 */
export type TargetDeviceStatus = {
  /** 0..1 */
  volumeLevel?: number;
  muted?: boolean;
  appId?: string;
  supportsSeek?: boolean;
};

export interface MediaSessionPort {
  play(url: string, mimeType: string): Promise<void>;
  /** Resolves true once the receiver reports an active media session. */
  waitUntilActive(timeoutMs: number, signal: CancellationSignal): Promise<boolean>;
  /** Requests fresh transport status from the receiver. */
  getStatus(): Promise<PlaybackObservation | undefined>;
}

/**
 * A cast endpoint able to fetch a media URL and report transport status.
 */
export interface TargetPort {
  readonly id: string;
  readonly name: string;
  readonly model: string;
  readonly media: MediaSessionPort;
  isReady(): boolean;
  getStatus(): TargetDeviceStatus | undefined;
  setVolume(level: number): Promise<void>;
  setMute(muted: boolean): Promise<void>;
  stopApp(): Promise<void>;
  dispose(): Promise<void>;
}
