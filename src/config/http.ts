import type { EnvironmentConfig } from '@/config/environment';
import type { ControlApiConfig, MediaServerConfig } from '@/domain/config/types';
import { resolveAdvertisedHost } from '@/shared/utils/net';

/**
 * Runtime options for the media server.
 */
export interface MediaServerOptions {
  port: number;
  host: string;
  /** Host part of the URLs handed to cast devices. */
  advertisedHost: string;
  assetDir: string;
}

export interface ControlApiOptions {
  port: number;
  host: string;
}

export function buildMediaServerOptions(
  env: EnvironmentConfig,
  config: MediaServerConfig,
): MediaServerOptions {
  return {
    port: config.port,
    host: config.host,
    advertisedHost: resolveAdvertisedHost(config.host, config.advertisedIp),
    assetDir: env.assetDir,
  };
}

export function buildControlApiOptions(config: ControlApiConfig): ControlApiOptions {
  return { port: config.port, host: config.host };
}
