import type { DeviceState } from '@/domain/stack/types';
import type { BrowseNode } from '@/ports/BrowseTypes';

/**
 * Every command the stack can send to a device, one variant per kind.
 */
export type DeviceCommand =
  | { kind: 'turn_on' }
  | { kind: 'turn_off' }
  | { kind: 'select_source'; source: string }
  | { kind: 'volume_set'; level: number }
  | { kind: 'volume_mute'; muted: boolean }
  | { kind: 'volume_up' }
  | { kind: 'volume_down' }
  | { kind: 'media_play' }
  | { kind: 'media_pause' }
  | { kind: 'media_play_pause' }
  | { kind: 'media_stop' }
  | { kind: 'media_next_track' }
  | { kind: 'media_previous_track' }
  | { kind: 'media_seek'; position: number }
  | { kind: 'play_media'; contentType: string; contentId: string }
  | { kind: 'clear_playlist' }
  | { kind: 'shuffle_set'; shuffle: boolean };

export type DeviceCommandKind = DeviceCommand['kind'];

export type StateChangeListener = (deviceId: string) => void;

export interface DevicePort {
  /** Latest known snapshot; null when the host does not know the device. */
  getState(deviceId: string): DeviceState | null;
  /** Resolves once the host acknowledged the command. */
  callCommand(deviceId: string, command: DeviceCommand): Promise<void>;
  /** Returns the unsubscribe function. */
  subscribe(deviceIds: readonly string[], onChange: StateChangeListener): () => void;
  browseNative(deviceId: string, contentType?: string, contentId?: string): Promise<BrowseNode>;
}
