import { hasFeature, MediaFeature } from '@/domain/stack/features';
import type { DeviceSnapshotReader, WiringMap } from '@/domain/stack/types';
import { allDevices } from '@/domain/stack/wiringMap';
import type { BrowseNode } from '@/ports/BrowseTypes';
import type { PlayerDirectoryPort } from '@/ports/PlayerDirectoryPort';
import { BrowseError } from '@/application/stack/stackErrors';

export type PrefixedContentId = {
  deviceId: string;
  childId: string;
};

/**
 * Splits `"<deviceId>:<childContentId>"` at the first colon.
 */
export function splitContentId(contentId: string): PrefixedContentId {
  const index = contentId.indexOf(':');
  if (index < 0) {
    return { deviceId: contentId, childId: '' };
  }
  return { deviceId: contentId.slice(0, index), childId: contentId.slice(index + 1) };
}

export function prefixBrowseNode(deviceId: string, node: BrowseNode): BrowseNode {
  const copy: BrowseNode = { ...node, mediaContentId: `${deviceId}:${node.mediaContentId}` };
  if (node.children) {
    copy.children = node.children.map((child) => prefixBrowseNode(deviceId, child));
  }
  return copy;
}

export class MediaBrowser {
  constructor(
    private readonly stack: { id: string; name: string; mapping: WiringMap },
    private readonly getState: DeviceSnapshotReader,
    private readonly players: PlayerDirectoryPort,
  ) {}

  public async browse(contentType?: string, contentId?: string): Promise<BrowseNode> {
    if (contentId === undefined || contentId === '' || contentId === this.stack.id) {
      return this.browseRoot();
    }
    const { deviceId, childId } = splitContentId(contentId);
    if (childId === '') {
      return this.browseDevice(deviceId);
    }
    return this.browseDevice(deviceId, contentType, childId);
  }

  /** Every wired device that has a library of its own. */
  public browseRoot(): BrowseNode {
    const children: BrowseNode[] = [];
    for (const deviceId of allDevices(this.stack.mapping)) {
      const state = this.getState(deviceId);
      if (!state || !hasFeature(state.supportedFeatures, MediaFeature.BROWSE_MEDIA)) {
        continue;
      }
      children.push({
        title: state.name,
        mediaContentId: deviceId,
        mediaContentType: 'library',
        canPlay: false,
        canExpand: true,
        children: [],
      });
    }
    return {
      title: this.stack.name,
      mediaContentId: this.stack.id,
      mediaContentType: 'library',
      canPlay: false,
      canExpand: true,
      children,
    };
  }

  private async browseDevice(deviceId: string, contentType?: string, contentId?: string): Promise<BrowseNode> {
    const player = this.players.resolvePlayer(deviceId);
    if (!player) {
      throw new BrowseError(`Unable to find entity_id ${deviceId}`);
    }
    const result = await player.browseMedia(contentType, contentId);
    return prefixBrowseNode(deviceId, result);
  }
}
