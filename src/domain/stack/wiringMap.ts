import type { WiringMap } from '@/domain/stack/types';

export type RawWiringMap = Record<string, Record<string, string>>;

const ENTITY_ID_PATTERN = /^[a-z0-9_]+\.[a-z0-9_]+$/;

export function isValidDeviceId(value: string): boolean {
  return ENTITY_ID_PATTERN.test(value);
}

/**
 * Builds the wiring map from its configured object form, keeping key order.
 */
export function buildWiringMap(raw: RawWiringMap): WiringMap {
  const map = new Map<string, ReadonlyMap<string, string>>();
  for (const [deviceId, sources] of Object.entries(raw)) {
    map.set(deviceId, new Map(Object.entries(sources)));
  }
  return map;
}

export function wiredTarget(map: WiringMap, deviceId: string, source: string): string | null {
  return map.get(deviceId)?.get(source) ?? null;
}

/** Configured keys, in order. */
export function sinkCandidates(map: WiringMap): string[] {
  return [...map.keys()];
}

/** Every device referenced as a key or a target, first-seen order. */
export function allDevices(map: WiringMap): string[] {
  const seen = new Set<string>();
  for (const [deviceId, sources] of map) {
    seen.add(deviceId);
    for (const target of sources.values()) {
      seen.add(target);
    }
  }
  return [...seen];
}
