import { loadEnvironment, type EnvironmentConfig } from '@/config/environment';
import { buildHomeAssistantConfig } from '@/config/homeAssistant';
import { buildHttpServerConfig, type HttpServerConfig } from '@/config/http';
import type { HomeAssistantConfig, SystemConfig } from '@/domain/config/types';
import type { LogLevel } from '@/types/logLevel';

export interface AppConfig {
  env: EnvironmentConfig;
  http: HttpServerConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const environment = loadEnvironment(env);
  return {
    env: environment,
    http: buildHttpServerConfig(environment),
  };
}

export interface ResolvedSettings {
  logLevel: LogLevel;
  logJson: boolean;
  homeAssistant: HomeAssistantConfig;
}

/**
 * Settings that come from the config file unless the environment overrides them.
 */
export function resolveSettings(config: AppConfig, system: SystemConfig): ResolvedSettings {
  return {
    logLevel: config.env.logLevel ?? system.logging.level,
    logJson: system.logging.json,
    homeAssistant: buildHomeAssistantConfig(config.env, system.homeAssistant),
  };
}
