import type { StoragePort } from '@/ports/StoragePort';
import type { ConfigPort } from '@/ports/ConfigPort';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import { ConfigRepository } from '@/application/config/configRepository';

export type RuntimePorts = {
  storage: StoragePort;
  config: ConfigPort;
};

export function createRuntimePorts(configPath: string): RuntimePorts {
  const storage = new StorageAdapter();
  return {
    storage,
    config: new ConfigRepository(storage, configPath),
  };
}
