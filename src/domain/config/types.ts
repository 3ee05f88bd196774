import type { LogLevel } from '@/types/logLevel';
import type { RawWiringMap } from '@/domain/stack/wiringMap';

export interface StackConfig {
  /** Slug of `name` when omitted. */
  id: string;
  name: string;
  mapping: RawWiringMap;
}

export interface HomeAssistantConfig {
  /** WebSocket endpoint, e.g. `ws://homeassistant.local:8123/api/websocket`. */
  url: string;
  token: string;
}

export interface SystemConfig {
  logging: {
    level: LogLevel;
    json: boolean;
  };
  homeAssistant: HomeAssistantConfig;
}

export interface MediaStackServerConfig {
  system: SystemConfig;
  stacks: StackConfig[];
  updatedAt?: string;
}
