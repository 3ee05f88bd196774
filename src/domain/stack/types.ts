/**
 * Power/activity status reported by a media device.
 */
export type DeviceStatus =
  | 'on'
  | 'off'
  | 'standby'
  | 'unavailable'
  | 'idle'
  | 'playing'
  | 'paused'
  | 'buffering';

export const DEVICE_STATUSES: readonly DeviceStatus[] = [
  'on',
  'off',
  'standby',
  'unavailable',
  'idle',
  'playing',
  'paused',
  'buffering',
];

/** Statuses treated as "not producing output". */
export const OFF_STATUSES: ReadonlySet<DeviceStatus> = new Set<DeviceStatus>([
  'off',
  'standby',
  'unavailable',
  'idle',
]);

export function isOffStatus(status: DeviceStatus): boolean {
  return OFF_STATUSES.has(status);
}

/**
 * Read-only snapshot of one device as last reported by the host.
 */
export interface DeviceState {
  deviceId: string;
  name: string;
  status: DeviceStatus;
  source?: string;
  sourceList: string[];
  volumeLevel?: number;
  isVolumeMuted?: boolean;
  supportedFeatures: number;
  /** Everything else the device reports (media title, artwork, shuffle, ...). */
  attributes: Record<string, unknown>;
}

/**
 * deviceId -> (source name -> deviceId wired to that source).
 * Map insertion order is the configured order of sink candidates.
 */
export type WiringMap = ReadonlyMap<string, ReadonlyMap<string, string>>;

export type DeviceSnapshotReader = (deviceId: string) => DeviceState | null;
