import path from 'node:path';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { StoragePort } from '@/ports/StoragePort';
import type {
  ControlApiConfig,
  DiscoveryConfig,
  LoggingConfig,
  MediaServerConfig,
  NotificationsConfig,
  NotifierConfig,
  PlaybackTimingConfig,
  RestoreConfig,
  ShutdownConfig,
} from '@/domain/config/types';
import { isLogLevel } from '@/types/logLevel';

export const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'data', 'config.json');

type UnknownRecord = Record<string, unknown>;

/**
 * Configuration store backed by a JSON file on disk. Unknown or malformed
 * fields fall back to their defaults; the normalized result is written back.
 */
export class ConfigRepository implements ConfigPort {
  private config: NotifierConfig | null = null;

  constructor(
    private readonly storage: StoragePort,
    private readonly configPath: string = DEFAULT_CONFIG_PATH,
  ) {}

  public async load(): Promise<NotifierConfig> {
    const raw = await this.storage.readJson(this.configPath);
    this.config = normalizeConfig(raw);
    if (serializeConfig(raw) !== serializeConfig(this.config)) {
      await this.storage.writeJson(this.configPath, this.config);
    }
    return this.config;
  }

  public getConfig(): NotifierConfig {
    if (!this.config) {
      throw new Error('configuration not loaded');
    }
    return this.config;
  }

  public async updateConfig(
    mutator: (config: NotifierConfig) => void | Promise<void>,
  ): Promise<NotifierConfig> {
    const current = this.config ?? (await this.load());
    const before = serializeConfig(current);
    await mutator(current);
    const next = normalizeConfig(current);
    if (serializeConfig(next) !== before) {
      next.updatedAt = new Date().toISOString();
    }
    this.config = next;
    await this.storage.writeJson(this.configPath, next);
    return next;
  }
}

function serializeConfig(config: unknown): string {
  return JSON.stringify(config ?? null, (key, value: unknown) =>
    key === 'updatedAt' ? undefined : value,
  );
}

export function defaultConfig(): NotifierConfig {
  return {
    mediaServer: { port: 15555, host: '0.0.0.0', advertisedIp: '' },
    controlApi: { enabled: true, port: 15556, host: '0.0.0.0' },
    notifications: {
      defaultTarget: '',
      language: 'en',
      languageOverrides: {},
      volume: 50,
      synthesisTimeoutMs: 15000,
    },
    playback: {
      bitrateBps: 64000,
      activeTimeoutMs: 10000,
      settleMs: 1500,
      pollIntervalMs: 500,
      flushGraceMs: 2000,
      minDeadlineMs: 15000,
      deadlinePaddingMs: 10000,
      reportedDurationPaddingMs: 5000,
    },
    restore: { readyAttempts: 10, readyIntervalMs: 1000 },
    shutdown: { workerTimeoutMs: 30000, drainTimeoutMs: 5000, serviceTimeoutMs: 5000 },
    discovery: { enabled: true, audioOnly: true },
    logging: { consoleLevel: 'info', json: false },
  };
}

export function normalizeConfig(raw: unknown): NotifierConfig {
  const defaults = defaultConfig();
  const source = asRecord(raw);
  const config: NotifierConfig = {
    mediaServer: normalizeMediaServer(asRecord(source.mediaServer), defaults.mediaServer),
    controlApi: normalizeControlApi(asRecord(source.controlApi), defaults.controlApi),
    notifications: normalizeNotifications(asRecord(source.notifications), defaults.notifications),
    playback: normalizePlayback(asRecord(source.playback), defaults.playback),
    restore: normalizeRestore(asRecord(source.restore), defaults.restore),
    shutdown: normalizeShutdown(asRecord(source.shutdown), defaults.shutdown),
    discovery: normalizeDiscovery(asRecord(source.discovery), defaults.discovery),
    logging: normalizeLogging(asRecord(source.logging), defaults.logging),
  };
  if (typeof source.updatedAt === 'string') {
    config.updatedAt = source.updatedAt;
  }
  return config;
}

function normalizeMediaServer(raw: UnknownRecord, fallback: MediaServerConfig): MediaServerConfig {
  return {
    port: port(raw.port, fallback.port),
    host: text(raw.host, fallback.host),
    advertisedIp: text(raw.advertisedIp, fallback.advertisedIp, true),
  };
}

function normalizeControlApi(raw: UnknownRecord, fallback: ControlApiConfig): ControlApiConfig {
  return {
    enabled: flag(raw.enabled, fallback.enabled),
    port: port(raw.port, fallback.port),
    host: text(raw.host, fallback.host),
  };
}

function normalizeNotifications(
  raw: UnknownRecord,
  fallback: NotificationsConfig,
): NotificationsConfig {
  const overrides: Record<string, string> = {};
  for (const [key, value] of Object.entries(asRecord(raw.languageOverrides))) {
    if (typeof value === 'string' && value.trim()) {
      overrides[key] = value.trim();
    }
  }
  return {
    defaultTarget: text(raw.defaultTarget, fallback.defaultTarget, true),
    language: text(raw.language, fallback.language),
    languageOverrides: overrides,
    volume: Math.min(100, count(raw.volume, fallback.volume)),
    synthesisTimeoutMs: positive(raw.synthesisTimeoutMs, fallback.synthesisTimeoutMs),
  };
}

function normalizePlayback(
  raw: UnknownRecord,
  fallback: PlaybackTimingConfig,
): PlaybackTimingConfig {
  return {
    bitrateBps: positive(raw.bitrateBps, fallback.bitrateBps),
    activeTimeoutMs: count(raw.activeTimeoutMs, fallback.activeTimeoutMs),
    settleMs: count(raw.settleMs, fallback.settleMs),
    pollIntervalMs: positive(raw.pollIntervalMs, fallback.pollIntervalMs),
    flushGraceMs: count(raw.flushGraceMs, fallback.flushGraceMs),
    minDeadlineMs: count(raw.minDeadlineMs, fallback.minDeadlineMs),
    deadlinePaddingMs: count(raw.deadlinePaddingMs, fallback.deadlinePaddingMs),
    reportedDurationPaddingMs: count(
      raw.reportedDurationPaddingMs,
      fallback.reportedDurationPaddingMs,
    ),
  };
}

function normalizeRestore(raw: UnknownRecord, fallback: RestoreConfig): RestoreConfig {
  return {
    readyAttempts: count(raw.readyAttempts, fallback.readyAttempts),
    readyIntervalMs: positive(raw.readyIntervalMs, fallback.readyIntervalMs),
  };
}

function normalizeShutdown(raw: UnknownRecord, fallback: ShutdownConfig): ShutdownConfig {
  return {
    workerTimeoutMs: positive(raw.workerTimeoutMs, fallback.workerTimeoutMs),
    drainTimeoutMs: positive(raw.drainTimeoutMs, fallback.drainTimeoutMs),
    serviceTimeoutMs: positive(raw.serviceTimeoutMs, fallback.serviceTimeoutMs),
  };
}

function normalizeDiscovery(raw: UnknownRecord, fallback: DiscoveryConfig): DiscoveryConfig {
  return {
    enabled: flag(raw.enabled, fallback.enabled),
    audioOnly: flag(raw.audioOnly, fallback.audioOnly),
  };
}

function normalizeLogging(raw: UnknownRecord, fallback: LoggingConfig): LoggingConfig {
  return {
    consoleLevel: isLogLevel(raw.consoleLevel) ? raw.consoleLevel : fallback.consoleLevel,
    json: flag(raw.json, fallback.json),
  };
}

function asRecord(value: unknown): UnknownRecord {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function text(value: unknown, fallback: string, allowEmpty = false): string {
  if (typeof value !== 'string') return fallback;
  const trimmed = value.trim();
  if (!trimmed && !allowEmpty) return fallback;
  return trimmed;
}

function flag(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function count(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
    ? Math.floor(value)
    : fallback;
}

function positive(value: unknown, fallback: number): number {
  const parsed = count(value, fallback);
  return parsed > 0 ? parsed : fallback;
}

function port(value: unknown, fallback: number): number {
  const parsed = count(value, fallback);
  return parsed <= 65535 ? parsed : fallback;
}
