import type { LogLevel } from '@/types/logLevel';

export interface NotifierConfig {
  mediaServer: MediaServerConfig;
  controlApi: ControlApiConfig;
  notifications: NotificationsConfig;
  playback: PlaybackTimingConfig;
  restore: RestoreConfig;
  shutdown: ShutdownConfig;
  discovery: DiscoveryConfig;
  logging: LoggingConfig;
  updatedAt?: string;
}

export interface MediaServerConfig {
  port: number;
  host: string;
  /** Address handed to cast devices; empty means the first LAN IPv4. */
  advertisedIp: string;
}

export interface ControlApiConfig {
  enabled: boolean;
  port: number;
  host: string;
}

export interface NotificationsConfig {
  /** Target name used by `notifyDefault`. */
  defaultTarget: string;
  language: string;
  /** Maps configured languages onto the codes the speech engine accepts. */
  languageOverrides: Record<string, string>;
  /** Volume (0-100) applied for the duration of a notification. */
  volume: number;
  /** Upper bound for each request to the speech engine. */
  synthesisTimeoutMs: number;
}

/**
 * Completion-detector timings, all in milliseconds except the bitrate.
 */
export interface PlaybackTimingConfig {
  bitrateBps: number;
  activeTimeoutMs: number;
  settleMs: number;
  pollIntervalMs: number;
  flushGraceMs: number;
  minDeadlineMs: number;
  deadlinePaddingMs: number;
  reportedDurationPaddingMs: number;
}

export interface RestoreConfig {
  readyAttempts: number;
  readyIntervalMs: number;
}

export interface ShutdownConfig {
  workerTimeoutMs: number;
  drainTimeoutMs: number;
  serviceTimeoutMs: number;
}

export interface DiscoveryConfig {
  enabled: boolean;
  /** Ignore cast endpoints whose model is not a speaker. */
  audioOnly: boolean;
}

export interface LoggingConfig {
  consoleLevel: LogLevel;
  json: boolean;
}
