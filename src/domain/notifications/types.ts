/**
 * Work item handed from producers to the notification worker.
 */
export interface NotificationRequest {
  readonly target: string;
  readonly text: string;
}

export interface AudioAsset {
  path: string;
  sizeBytes: number;
  estimatedDurationSeconds: number;
}

/**
 * Pre-session device state. Fields are absent when the device had not
 * reported status yet.
 */
export interface TargetStateSnapshot {
  volumeLevel?: number;
  muted?: boolean;
  runningApp?: string;
  supportsSeek?: boolean;
}

export interface PlaybackObservation {
  isPlaying: boolean;
  isPaused: boolean;
  isIdle: boolean;
  /** Seconds; undefined until the receiver knows the stream length. */
  reportedDuration?: number;
  reportedPosition?: number;
}

export interface CompletionReport {
  completed: boolean;
  sawPlaying: boolean;
  cancelled: boolean;
}

export type RestoreOutcome = 'restored' | 'nothing-to-restore' | 'timeout' | 'cancelled';

export type SessionOutcome =
  | { kind: 'done'; target: string; restore: RestoreOutcome }
  | { kind: 'skipped'; target: string; reason: 'muted' }
  | { kind: 'failed'; target: string; code: NotificationErrorCode; message: string };

export type NotificationErrorCode =
  | 'target-not-found'
  | 'target-unavailable'
  | 'synthesis-failed'
  | 'asset-missing'
  | 'playback-timeout'
  | 'restore-timeout'
  | 'playback-failed'
  | 'cancelled';
