import type { NotifierConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<NotifierConfig>;
  getConfig(): NotifierConfig;
  updateConfig(mutator: (config: NotifierConfig) => void | Promise<void>): Promise<NotifierConfig>;
}

export type { NotifierConfig };
