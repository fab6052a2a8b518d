import type { PlaybackObservation } from '../../src/domain/notifications/types';
import type { MediaSessionPort, TargetDeviceStatus, TargetPort } from '../../src/ports/TargetPort';
import type { CancellationSignal } from '../../src/shared/cancellation';

export const idle: PlaybackObservation = { isPlaying: false, isPaused: false, isIdle: true };
export const playing: PlaybackObservation = { isPlaying: true, isPaused: false, isIdle: false };

/**
 * Media session that replays a scripted list of observations. The last one
 * repeats once the script runs out.
 */
export class FakeMediaSession implements MediaSessionPort {
  public readonly played: Array<{ url: string; mimeType: string }> = [];
  public statusCalls = 0;
  public active = true;
  public playError: Error | null = null;
  /** Runs before each scripted observation is returned. */
  public onPoll: (() => void) | null = null;

  constructor(private script: PlaybackObservation[] = [idle]) {}

  public setScript(script: PlaybackObservation[]): void {
    this.script = script;
    this.statusCalls = 0;
  }

  public async play(url: string, mimeType: string): Promise<void> {
    if (this.playError) {
      throw this.playError;
    }
    this.played.push({ url, mimeType });
  }

  public async waitUntilActive(_timeoutMs: number, _signal: CancellationSignal): Promise<boolean> {
    return this.active;
  }

  public async getStatus(): Promise<PlaybackObservation | undefined> {
    this.onPoll?.();
    const index = Math.min(this.statusCalls, this.script.length - 1);
    this.statusCalls += 1;
    return this.script[index];
  }
}

/**
 * In-memory target that records every device command it receives.
 */
export class FakeTarget implements TargetPort {
  public readonly media: FakeMediaSession;
  public readonly calls: string[] = [];
  /** Shared log other fakes also write to, entries prefixed with the name. */
  public journal: string[] | null = null;
  public ready = true;
  public status: TargetDeviceStatus | undefined;
  public disposed = false;
  /** Readiness flips back to true after this many `isReady()` calls. */
  public readyAfterChecks: number | null = null;
  private readyChecks = 0;

  constructor(
    public readonly id: string,
    public readonly name: string,
    status: TargetDeviceStatus | undefined = { volumeLevel: 0.3, muted: false },
    public readonly model = 'Google Home Mini',
  ) {
    this.status = status;
    this.media = new FakeMediaSession();
  }

  public isReady(): boolean {
    this.readyChecks += 1;
    if (this.readyAfterChecks !== null && this.readyChecks > this.readyAfterChecks) {
      this.ready = true;
    }
    return this.ready;
  }

  public getStatus(): TargetDeviceStatus | undefined {
    return this.status;
  }

  public async setVolume(level: number): Promise<void> {
    this.record(`volume:${level}`);
  }

  public async setMute(muted: boolean): Promise<void> {
    this.record(`mute:${muted}`);
  }

  public async stopApp(): Promise<void> {
    this.record('stop');
  }

  public async dispose(): Promise<void> {
    this.disposed = true;
  }

  private record(call: string): void {
    this.calls.push(call);
    this.journal?.push(`${this.name}:${call}`);
  }
}

export class ManualClock {
  constructor(public current = 0) {}

  public now(): number {
    return this.current;
  }

  public advance(ms: number): void {
    this.current += ms;
  }
}
