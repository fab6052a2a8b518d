import path from 'node:path';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  dataDir: string;
  configPath: string;
  /** Generated speech assets, served by the media server. */
  assetDir: string;
}

/**
 * Returns the static environment configuration rooted at the working directory
 * (ENV overrides are not supported).
 */
export function loadEnvironment(cwd: string = process.cwd()): EnvironmentConfig {
  const dataDir = path.resolve(cwd, 'data');
  return {
    nodeEnv: 'development',
    dataDir,
    configPath: path.join(dataDir, 'config.json'),
    assetDir: path.join(dataDir, 'messages'),
  };
}
