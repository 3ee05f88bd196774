import type { DeviceCommand } from '@/ports/DevicePort';

export type ServiceCall = {
  service: string;
  data: Record<string, unknown>;
};

/**
 * Maps a device command onto the matching `media_player` service.
 */
export function toServiceCall(command: DeviceCommand): ServiceCall {
  switch (command.kind) {
    case 'select_source':
      return { service: 'select_source', data: { source: command.source } };
    case 'volume_set':
      return { service: 'volume_set', data: { volume_level: command.level } };
    case 'volume_mute':
      return { service: 'volume_mute', data: { is_volume_muted: command.muted } };
    case 'media_seek':
      return { service: 'media_seek', data: { seek_position: command.position } };
    case 'play_media':
      return {
        service: 'play_media',
        data: { media_content_type: command.contentType, media_content_id: command.contentId },
      };
    case 'shuffle_set':
      return { service: 'shuffle_set', data: { shuffle: command.shuffle } };
    default:
      return { service: command.kind, data: {} };
  }
}

export function domainOf(entityId: string): string {
  const index = entityId.indexOf('.');
  return index > 0 ? entityId.slice(0, index) : 'media_player';
}
