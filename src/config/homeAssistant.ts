import type { EnvironmentConfig } from '@/config/environment';
import type { HomeAssistantConfig } from '@/domain/config/types';

/**
 * Environment values win over the stored connection settings.
 */
export function buildHomeAssistantConfig(
  env: EnvironmentConfig,
  stored: HomeAssistantConfig,
): HomeAssistantConfig {
  return {
    url: env.homeAssistantUrl ?? stored.url,
    token: env.homeAssistantToken ?? stored.token,
  };
}
