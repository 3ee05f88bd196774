import path from 'node:path';
import { isLogLevel, type LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel | null;
  httpPort: number;
  httpHost: string;
  configPath: string;
  homeAssistantUrl: string | null;
  homeAssistantToken: string | null;
}

const DEFAULT_HTTP_PORT = 7190;

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  return {
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : null,
    httpPort: parsePort(env.HTTP_PORT) ?? DEFAULT_HTTP_PORT,
    httpHost: env.HTTP_HOST?.trim() || '0.0.0.0',
    configPath: path.resolve(process.cwd(), env.MEDIA_STACK_CONFIG?.trim() || path.join('data', 'config.json')),
    homeAssistantUrl: env.HA_URL?.trim() || null,
    homeAssistantToken: env.HA_TOKEN?.trim() || null,
  };
}

function parseNodeEnv(value: string | undefined): EnvironmentConfig['nodeEnv'] {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
}

function parsePort(value: string | undefined): number | null {
  if (!value) {
    return null;
  }
  const port = Number(value);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : null;
}
