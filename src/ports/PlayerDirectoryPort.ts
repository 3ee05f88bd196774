import type { BrowseNode } from '@/ports/BrowseTypes';

/**
 * Native playback endpoint of a wired child device.
 */
export interface PlayerHandle {
  deviceId: string;
  playMedia(contentType: string, contentId: string): Promise<void>;
  browseMedia(contentType?: string, contentId?: string): Promise<BrowseNode>;
}

export interface PlayerDirectoryPort {
  resolvePlayer(deviceId: string): PlayerHandle | null;
}
