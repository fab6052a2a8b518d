import { EventEmitter } from 'node:events';
import {
  Client,
  DefaultMediaReceiver,
  type Callback,
  type LoadOptions,
  type MediaInformation,
  type MediaStatus,
  type ReceiverApplication,
  type ReceiverStatus,
} from 'castv2-client';
import type { PlaybackObservation } from '@/domain/notifications/types';
import type { DiscoveredEndpoint } from '@/ports/DiscoveryPort';
import type { MediaSessionPort, TargetDeviceStatus, TargetPort } from '@/ports/TargetPort';
import { bestEffort, bestEffortSync } from '@/shared/bestEffort';
import type { CancellationSignal } from '@/shared/cancellation';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';

const COMMAND_TIMEOUT_MS = 10000;
const RECONNECT_INITIAL_MS = 1000;
const RECONNECT_MAX_MS = 30000;
/** Bit of `supportedMediaCommands` advertising seek. */
const SEEK_COMMAND = 2;

/**
 * The part of the default media receiver a notification session drives.
 */
export interface MediaPlayer {
  load(media: MediaInformation, options: LoadOptions, callback: Callback<MediaStatus>): void;
  getStatus(callback: Callback<MediaStatus | undefined>): void;
  close(): void;
  on(event: 'status', listener: (status: MediaStatus) => void): this;
  on(event: 'close', listener: () => void): this;
}

export type CastTargetOptions = {
  createClient?: () => Client;
  launchPlayer?: (client: Client, timeoutMs: number) => Promise<MediaPlayer>;
  commandTimeoutMs?: number;
  log?: Logger;
};

function launchDefaultReceiver(client: Client, timeoutMs: number): Promise<MediaPlayer> {
  return call<DefaultMediaReceiver>('launch', timeoutMs, (cb) => client.launch(DefaultMediaReceiver, cb));
}

function call<T>(label: string, timeoutMs: number, fn: (callback: Callback<T>) => void): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out`)), timeoutMs);
    fn((err, result) => {
      clearTimeout(timer);
      if (err) {
        reject(err);
        return;
      }
      resolve(result);
    });
  });
}

export function toObservation(status: MediaStatus): PlaybackObservation {
  const duration = status.media?.duration;
  return {
    isPlaying: status.playerState === 'PLAYING' || status.playerState === 'BUFFERING',
    isPaused: status.playerState === 'PAUSED',
    isIdle: status.playerState === 'IDLE',
    reportedDuration: typeof duration === 'number' && duration > 0 ? duration : undefined,
    reportedPosition: status.currentTime,
  };
}

/**
 * Default media receiver session on one cast device.
 */
class CastMediaSession implements MediaSessionPort {
  private player: MediaPlayer | null = null;
  private lastStatus: MediaStatus | null = null;
  private readonly events = new EventEmitter();

  constructor(private readonly target: CastTarget) {}

  public get supportsSeek(): boolean | undefined {
    const commands = this.lastStatus?.supportedMediaCommands;
    return commands === undefined ? undefined : (commands & SEEK_COMMAND) !== 0;
  }

  public async play(url: string, mimeType: string): Promise<void> {
    const client = this.target.requireClient();
    this.reset();
    const player = await this.target.launchPlayer(client, this.target.commandTimeoutMs);
    this.player = player;
    player.on('status', (status) => this.onStatus(status));
    player.on('close', () => {
      if (this.player === player) {
        this.player = null;
      }
    });
    const status = await call<MediaStatus>('load', this.target.commandTimeoutMs, (cb) =>
      player.load({ contentId: url, contentType: mimeType, streamType: 'BUFFERED' }, { autoplay: true }, cb),
    );
    this.onStatus(status);
  }

  public waitUntilActive(timeoutMs: number, signal: CancellationSignal): Promise<boolean> {
    if (this.lastStatus) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const finish = (active: boolean): void => {
        clearTimeout(timer);
        this.events.off('active', onActive);
        disposeCancel();
        resolve(active);
      };
      const onActive = (): void => finish(true);
      const timer = setTimeout(() => finish(false), timeoutMs);
      const disposeCancel = signal.onCancel(() => finish(false));
      this.events.once('active', onActive);
    });
  }

  public async getStatus(): Promise<PlaybackObservation | undefined> {
    const player = this.player;
    if (!player) {
      return this.lastStatus ? toObservation(this.lastStatus) : undefined;
    }
    const status = await call<MediaStatus | undefined>(
      'media status',
      this.target.commandTimeoutMs,
      (cb) => player.getStatus(cb),
    );
    // The receiver answers with no status once the session has ended; the
    // last pushed status (usually IDLE/FINISHED) is the current state then.
    if (!status) {
      return this.lastStatus ? toObservation(this.lastStatus) : undefined;
    }
    this.onStatus(status);
    return toObservation(status);
  }

  public reset(): void {
    const player = this.player;
    this.player = null;
    this.lastStatus = null;
    if (player) {
      bestEffortSync(() => player.close(), { fallback: undefined });
    }
  }

  private onStatus(status: MediaStatus | undefined): void {
    if (!status) {
      return;
    }
    const first = this.lastStatus === null;
    this.lastStatus = status;
    if (first) {
      this.events.emit('active');
    }
  }
}

/**
 * Connection to one cast device. Tracks readiness, mirrors receiver status,
 * and reconnects with backoff until disposed.
 */
export class CastTarget implements TargetPort {
  public readonly media: CastMediaSession;
  public readonly commandTimeoutMs: number;
  public readonly launchPlayer: (client: Client, timeoutMs: number) => Promise<MediaPlayer>;
  private readonly log: Logger;
  private readonly createClient: () => Client;
  private client: Client | null = null;
  private ready = false;
  private status: ReceiverStatus | undefined;
  private disposed = false;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectDelayMs = RECONNECT_INITIAL_MS;

  constructor(
    private readonly endpoint: DiscoveredEndpoint,
    options: CastTargetOptions = {},
  ) {
    this.createClient = options.createClient ?? (() => new Client());
    this.launchPlayer = options.launchPlayer ?? launchDefaultReceiver;
    this.commandTimeoutMs = options.commandTimeoutMs ?? COMMAND_TIMEOUT_MS;
    this.log = options.log ?? createLogger('Cast', 'Target');
    this.media = new CastMediaSession(this);
  }

  public get id(): string {
    return this.endpoint.id;
  }

  public get name(): string {
    return this.endpoint.name;
  }

  public get model(): string {
    return this.endpoint.model;
  }

  public connect(): void {
    if (this.disposed || this.client) {
      return;
    }
    const client = this.createClient();
    this.client = client;
    client.on('status', (status) => this.applyStatus(status));
    client.on('error', (err) => this.handleDrop(client, err));
    client.on('close', () => this.handleDrop(client));
    client.connect({ host: this.endpoint.host, port: this.endpoint.port }, () => {
      if (this.client !== client) {
        return;
      }
      this.reconnectDelayMs = RECONNECT_INITIAL_MS;
      this.log.info('cast device connected', { name: this.name, host: this.endpoint.host });
      void bestEffort(() => this.refreshReceiverStatus(client), {
        fallback: undefined,
        onError: 'debug',
        label: 'initial status request failed',
        context: { name: this.name },
        log: this.log,
      });
    });
  }

  public isReady(): boolean {
    return this.ready;
  }

  public getStatus(): TargetDeviceStatus | undefined {
    if (!this.status) {
      return undefined;
    }
    const result: TargetDeviceStatus = {};
    const volume = this.status.volume;
    if (typeof volume?.level === 'number') result.volumeLevel = volume.level;
    if (typeof volume?.muted === 'boolean') result.muted = volume.muted;
    const appId = this.status.applications?.[0]?.appId;
    if (appId) result.appId = appId;
    const supportsSeek = this.media.supportsSeek;
    if (supportsSeek !== undefined) result.supportsSeek = supportsSeek;
    return result;
  }

  public async setVolume(level: number): Promise<void> {
    const client = this.requireClient();
    const clamped = Math.min(1, Math.max(0, level));
    await call('set volume', this.commandTimeoutMs, (cb) => client.setVolume({ level: clamped }, cb));
  }

  public async setMute(muted: boolean): Promise<void> {
    const client = this.requireClient();
    await call('set mute', this.commandTimeoutMs, (cb) => client.setVolume({ muted }, cb));
  }

  public async stopApp(): Promise<void> {
    const client = this.requireClient();
    this.media.reset();
    const sessions = await call<ReceiverApplication[]>('sessions', this.commandTimeoutMs, (cb) => client.getSessions(cb));
    for (const session of sessions) {
      await call('stop app', this.commandTimeoutMs, (cb) => client.receiver.stop(session.sessionId, cb));
    }
  }

  public async dispose(): Promise<void> {
    this.disposed = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.media.reset();
    const client = this.client;
    this.client = null;
    this.ready = false;
    if (client) {
      this.log.info('disconnecting', { name: this.name });
      client.close();
    }
  }

  public requireClient(): Client {
    if (!this.client || !this.ready) {
      throw new Error(`cast device '${this.name}' is not connected`);
    }
    return this.client;
  }

  private async refreshReceiverStatus(client: Client): Promise<void> {
    const status = await call<ReceiverStatus>('receiver status', this.commandTimeoutMs, (cb) =>
      client.getStatus(cb),
    );
    if (this.client === client) {
      this.applyStatus(status);
    }
  }

  private applyStatus(status: ReceiverStatus): void {
    this.status = status;
    if (!this.ready) {
      this.ready = true;
      this.log.debug('cast device ready', { name: this.name });
    }
  }

  private handleDrop(client: Client, err?: Error): void {
    if (this.client !== client) {
      return;
    }
    this.log.warn('cast device disconnected', { name: this.name, message: err ? errorMessage(err) : undefined });
    this.client = null;
    this.ready = false;
    this.media.reset();
    bestEffortSync(() => client.close(), { fallback: undefined });
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.disposed || this.reconnectTimer) {
      return;
    }
    const delayMs = this.reconnectDelayMs;
    this.reconnectDelayMs = Math.min(RECONNECT_MAX_MS, delayMs * 2);
    this.log.debug('reconnect scheduled', { name: this.name, delayMs });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delayMs);
  }
}

export function createCastTarget(endpoint: DiscoveredEndpoint): CastTarget {
  const target = new CastTarget(endpoint);
  target.connect();
  return target;
}
