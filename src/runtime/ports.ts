import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import type { ConfigPort } from '@/ports/ConfigPort';
import { ConfigAdapter } from '@/adapters/config/ConfigAdapter';
import { ConfigRepository } from '@/application/config/configRepository';

export type RuntimePorts = {
  config: ConfigPort;
};

export function createRuntimePorts(deps: { configPath: string }): RuntimePorts {
  const configRepository = new ConfigRepository(new StorageAdapter(), deps.configPath);
  return {
    config: new ConfigAdapter(configRepository),
  };
}
