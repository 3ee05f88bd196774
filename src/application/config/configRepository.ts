import type { StoragePort } from '@/ports/StoragePort';
import type { MediaStackServerConfig } from '@/domain/config/types';
import { parseServerConfig } from '@/domain/config/schema';

/**
 * Configuration store backed by a JSON file. The document always runs through
 * the schema, so callers only see validated config.
 */
export class ConfigRepository {
  constructor(
    private readonly storage: StoragePort,
    private readonly configPath: string,
  ) {}

  public async load(): Promise<MediaStackServerConfig> {
    const raw = await this.storage.readJson<unknown>(this.configPath, defaultConfig(), {
      writeIfMissing: true,
    });
    return parseServerConfig(raw);
  }
}

export function defaultConfig(): MediaStackServerConfig {
  return {
    system: {
      logging: { level: 'info', json: false },
      homeAssistant: {
        url: 'ws://homeassistant.local:8123/api/websocket',
        token: '',
      },
    },
    stacks: [],
    updatedAt: new Date().toISOString(),
  };
}
