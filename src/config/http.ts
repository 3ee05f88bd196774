import type { EnvironmentConfig } from '@/config/environment';

/**
 * Runtime options for the HTTP gateway.
 */
export interface HttpServerConfig {
  port: number;
  host: string;
}

export function buildHttpServerConfig(env: EnvironmentConfig): HttpServerConfig {
  return {
    port: env.httpPort,
    host: env.httpHost,
  };
}
