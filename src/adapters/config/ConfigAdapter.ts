import type { ConfigPort } from '@/ports/ConfigPort';
import type { ConfigRepository } from '@/application/config/configRepository';
import type { MediaStackServerConfig } from '@/domain/config/types';

/**
 * Exposes the file-backed repository through the config port.
 */
export class ConfigAdapter implements ConfigPort {
  constructor(private readonly repository: ConfigRepository) {}

  public load(): Promise<MediaStackServerConfig> {
    return this.repository.load();
  }
}
