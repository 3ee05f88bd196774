import type { StoragePort, StorageReadOptions } from '@/ports/StoragePort';
import { pathExists, readJson, writeJson } from '@/shared/utils/file';

export class StorageAdapter implements StoragePort {
  public async readJson<T>(filePath: string, fallback: T, options?: StorageReadOptions): Promise<T> {
    const data = await readJson<T>(filePath);
    if (data !== undefined) {
      return data;
    }
    if (options?.writeIfMissing && !(await pathExists(filePath))) {
      await writeJson(filePath, fallback);
    }
    return fallback;
  }
}
