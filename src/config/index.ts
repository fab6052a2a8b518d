import { loadEnvironment } from '@/config/environment';
import { buildControlApiOptions, buildMediaServerOptions } from '@/config/http';
import type { NotifierConfig } from '@/domain/config/types';

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 */
export const loadConfig = (config: NotifierConfig, cwd?: string) => {
  const env = loadEnvironment(cwd);
  return {
    env,
    mediaServer: buildMediaServerOptions(env, config.mediaServer),
    controlApi: buildControlApiOptions(config.controlApi),
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;
