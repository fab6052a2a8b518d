declare module 'castv2-client' {
  import { EventEmitter } from 'node:events';

  export type Callback<T> = (err: Error | null, result: T) => void;

  export interface ReceiverApplication {
    appId: string;
    displayName?: string;
    sessionId: string;
    transportId?: string;
    statusText?: string;
  }

  export interface ReceiverVolume {
    level?: number;
    muted?: boolean;
  }

  export interface ReceiverStatus {
    applications?: ReceiverApplication[];
    volume?: ReceiverVolume;
  }

  export interface MediaInformation {
    contentId: string;
    contentType: string;
    streamType: 'BUFFERED' | 'LIVE' | 'NONE';
    duration?: number;
    metadata?: Record<string, unknown>;
  }

  export interface MediaStatus {
    mediaSessionId: number;
    playerState: 'IDLE' | 'PLAYING' | 'PAUSED' | 'BUFFERING';
    idleReason?: 'CANCELLED' | 'INTERRUPTED' | 'FINISHED' | 'ERROR';
    currentTime?: number;
    supportedMediaCommands?: number;
    media?: Partial<MediaInformation>;
  }

  export interface LoadOptions {
    autoplay?: boolean;
    currentTime?: number;
  }

  export class ReceiverController extends EventEmitter {
    getStatus(callback: Callback<ReceiverStatus>): void;
    getSessions(callback: Callback<ReceiverApplication[]>): void;
    launch(appId: string, callback: Callback<ReceiverApplication[]>): void;
    stop(sessionId: string, callback: Callback<ReceiverApplication[]>): void;
    setVolume(volume: ReceiverVolume, callback: Callback<ReceiverVolume>): void;
  }

  export class Application extends EventEmitter {
    static APP_ID: string;
    constructor(client: Client, session: ReceiverApplication);
    close(): void;
  }

  export class DefaultMediaReceiver extends Application {
    static APP_ID: string;
    load(media: MediaInformation, options: LoadOptions, callback: Callback<MediaStatus>): void;
    getStatus(callback: Callback<MediaStatus | undefined>): void;
    play(callback: Callback<MediaStatus>): void;
    pause(callback: Callback<MediaStatus>): void;
    stop(callback: Callback<MediaStatus>): void;
    seek(currentTime: number, callback: Callback<MediaStatus>): void;
    on(event: 'status', listener: (status: MediaStatus) => void): this;
    on(event: 'close', listener: () => void): this;
  }

  export interface ApplicationType<T extends Application> {
    new (client: Client, session: ReceiverApplication): T;
    APP_ID: string;
  }

  export interface ConnectOptions {
    host: string;
    port?: number;
  }

  export class Client extends EventEmitter {
    receiver: ReceiverController;
    connect(options: string | ConnectOptions, callback: () => void): void;
    close(): void;
    getStatus(callback: Callback<ReceiverStatus>): void;
    getSessions(callback: Callback<ReceiverApplication[]>): void;
    launch<T extends Application>(app: ApplicationType<T>, callback: Callback<T>): void;
    join<T extends Application>(
      session: ReceiverApplication,
      app: ApplicationType<T>,
      callback: Callback<T>,
    ): void;
    stop(app: Application, callback: Callback<ReceiverApplication[]>): void;
    setVolume(volume: ReceiverVolume, callback: Callback<ReceiverVolume>): void;
    getVolume(callback: Callback<ReceiverVolume>): void;
    on(event: 'status', listener: (status: ReceiverStatus) => void): this;
    on(event: 'error', listener: (err: Error) => void): this;
    on(event: 'close', listener: () => void): this;
  }
}
