import { isOffStatus, type DeviceSnapshotReader, type WiringMap } from '@/domain/stack/types';
import { sinkCandidates } from '@/domain/stack/wiringMap';

/**
 * First configured key whose device is present and powered; otherwise the
 * first configured key even if it is off. Null only for an empty map.
 */
export function selectSink(map: WiringMap, getState: DeviceSnapshotReader): string | null {
  const candidates = sinkCandidates(map);
  for (const deviceId of candidates) {
    const state = getState(deviceId);
    if (state && !isOffStatus(state.status)) {
      return deviceId;
    }
  }
  return candidates[0] ?? null;
}
