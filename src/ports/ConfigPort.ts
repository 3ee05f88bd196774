import type { MediaStackServerConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<MediaStackServerConfig>;
}

export type { MediaStackServerConfig };
