import { ANY_DEVICE_FEATURES, MediaFeature, SINK_FEATURES } from '@/domain/stack/features';
import { selectSink } from '@/domain/stack/sinkSelector';
import {
  findActiveLeaf,
  qualifiedLabel,
  resolveSourceTree,
  sourceEntries,
  type ResolveOptions,
  type SourceNode,
} from '@/domain/stack/sourceResolver';
import {
  isOffStatus,
  type DeviceSnapshotReader,
  type DeviceStatus,
  type WiringMap,
} from '@/domain/stack/types';
import { allDevices } from '@/domain/stack/wiringMap';

/**
 * What the virtual player reports for one snapshot set.
 */
export interface CompositeState {
  status: DeviceStatus;
  source: string | null;
  sourceList: string[];
  volumeLevel: number | null;
  isVolumeMuted: boolean | null;
  supportedFeatures: number;
  sourceDeviceId: string | null;
  sinkDeviceId: string | null;
  attributes: Record<string, unknown>;
}

export interface StackView {
  sinkId: string | null;
  tree: SourceNode | null;
  activeLeaf: SourceNode | null;
  state: CompositeState;
}

export function resolveStackView(
  map: WiringMap,
  getState: DeviceSnapshotReader,
  options: ResolveOptions = {},
): StackView {
  const sinkId = selectSink(map, getState);
  const tree = resolveSourceTree(map, getState, sinkId, options);
  const activeLeaf = findActiveLeaf(tree);
  return {
    sinkId,
    tree,
    activeLeaf,
    state: projectCompositeState(map, getState, sinkId, tree),
  };
}

export function projectCompositeState(
  map: WiringMap,
  getState: DeviceSnapshotReader,
  sinkId: string | null,
  tree: SourceNode | null,
): CompositeState {
  const sink = sinkId ? getState(sinkId) : null;
  const leaf = findActiveLeaf(tree);
  const leafState = leaf ? getState(leaf.deviceId) : null;

  return {
    status: compositeStatus(sink?.status ?? null, leaf?.status ?? null),
    source: leaf ? qualifiedLabel(leaf.displayName, leaf.currentSource) : null,
    sourceList: sourceEntries(tree)
      .map((entry) => entry.label)
      .sort(),
    volumeLevel: sink?.volumeLevel ?? null,
    isVolumeMuted: sink?.isVolumeMuted ?? null,
    supportedFeatures: compositeFeatures(map, getState, sink?.supportedFeatures ?? 0, leafState?.supportedFeatures ?? 0),
    sourceDeviceId: leaf?.deviceId ?? null,
    sinkDeviceId: sink ? sink.deviceId : null,
    attributes: leafState ? { ...leafState.attributes } : {},
  };
}

function compositeStatus(sinkStatus: DeviceStatus | null, leafStatus: DeviceStatus | null): DeviceStatus {
  if (sinkStatus === null || isOffStatus(sinkStatus)) {
    return 'standby';
  }
  if (leafStatus === null) {
    return sinkStatus;
  }
  return isOffStatus(leafStatus) ? 'standby' : leafStatus;
}

function compositeFeatures(
  map: WiringMap,
  getState: DeviceSnapshotReader,
  sinkFeatures: number,
  leafFeatures: number,
): number {
  let supported = leafFeatures | MediaFeature.SELECT_SOURCE;

  supported &= ~SINK_FEATURES;
  supported |= sinkFeatures & SINK_FEATURES;

  let anyDevice = 0;
  for (const deviceId of allDevices(map)) {
    anyDevice |= getState(deviceId)?.supportedFeatures ?? 0;
  }
  supported &= ~ANY_DEVICE_FEATURES;
  supported |= anyDevice & ANY_DEVICE_FEATURES;

  return supported;
}
