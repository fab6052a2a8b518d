import { promises as fs } from 'node:fs';
import type { StoragePort } from '@/ports/StoragePort';
import { readJson, writeJson } from '@/shared/utils/file';

export class StorageAdapter implements StoragePort {
  public async readJson(filePath: string): Promise<unknown> {
    return readJson(filePath);
  }

  public async writeJson(filePath: string, data: unknown): Promise<void> {
    await writeJson(filePath, data);
  }

  public async remove(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }
}
