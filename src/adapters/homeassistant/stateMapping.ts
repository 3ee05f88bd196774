import { z } from 'zod';
import { DEVICE_STATUSES, type DeviceState, type DeviceStatus } from '@/domain/stack/types';
import type { BrowseNode } from '@/ports/BrowseTypes';

export const haStateSchema = z.object({
  entity_id: z.string(),
  state: z.string(),
  attributes: z.record(z.unknown()).default({}),
});

/** Attributes lifted into typed `DeviceState` fields. */
const TYPED_ATTRIBUTES = new Set([
  'friendly_name',
  'source',
  'source_list',
  'volume_level',
  'is_volume_muted',
  'supported_features',
]);

export function toDeviceStatus(state: string): DeviceStatus {
  const status = DEVICE_STATUSES.find((candidate) => candidate === state);
  return status ?? 'unavailable';
}

/** Same fallback Home Assistant uses for entities without a friendly name. */
export function displayNameFor(entityId: string): string {
  const objectId = entityId.slice(entityId.indexOf('.') + 1);
  return objectId.replace(/_/g, ' ');
}

export function toDeviceState(raw: unknown): DeviceState | null {
  const parsed = haStateSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const { entity_id: deviceId, state, attributes } = parsed.data;
  const passthrough: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (!TYPED_ATTRIBUTES.has(key)) {
      passthrough[key] = value;
    }
  }
  const friendlyName = attributes.friendly_name;
  const source = attributes.source;
  const sourceList = attributes.source_list;
  const volume = attributes.volume_level;
  const muted = attributes.is_volume_muted;
  const features = attributes.supported_features;

  return {
    deviceId,
    name: typeof friendlyName === 'string' && friendlyName ? friendlyName : displayNameFor(deviceId),
    status: toDeviceStatus(state),
    source: typeof source === 'string' && source ? source : undefined,
    sourceList: Array.isArray(sourceList)
      ? sourceList.filter((entry): entry is string => typeof entry === 'string')
      : [],
    volumeLevel: typeof volume === 'number' ? volume : undefined,
    isVolumeMuted: typeof muted === 'boolean' ? muted : undefined,
    supportedFeatures: typeof features === 'number' ? features : 0,
    attributes: passthrough,
  };
}

type RawBrowseNode = {
  title: string;
  media_class?: string;
  media_content_id: string;
  media_content_type: string;
  can_play?: boolean;
  can_expand?: boolean;
  thumbnail?: string | null;
  children?: RawBrowseNode[];
};

const browseNodeSchema: z.ZodType<RawBrowseNode> = z.lazy(() =>
  z.object({
    title: z.string(),
    media_class: z.string().optional(),
    media_content_id: z.string(),
    media_content_type: z.string(),
    can_play: z.boolean().optional(),
    can_expand: z.boolean().optional(),
    thumbnail: z.string().nullable().optional(),
    children: z.array(browseNodeSchema).optional(),
  }),
);

export function toBrowseNode(raw: unknown): BrowseNode {
  return mapBrowseNode(browseNodeSchema.parse(raw));
}

function mapBrowseNode(node: RawBrowseNode): BrowseNode {
  const mapped: BrowseNode = {
    title: node.title,
    mediaContentId: node.media_content_id,
    mediaContentType: node.media_content_type,
    canPlay: node.can_play ?? false,
    canExpand: node.can_expand ?? false,
  };
  if (node.media_class !== undefined) {
    mapped.mediaClass = node.media_class;
  }
  if (node.thumbnail !== undefined) {
    mapped.thumbnail = node.thumbnail;
  }
  if (node.children) {
    mapped.children = node.children.map(mapBrowseNode);
  }
  return mapped;
}
