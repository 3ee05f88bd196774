/**
 * Capability bits, numerically identical to Home Assistant's
 * `MediaPlayerEntityFeature`.
 */
export const MediaFeature = {
  PAUSE: 1,
  SEEK: 2,
  VOLUME_SET: 4,
  VOLUME_MUTE: 8,
  PREVIOUS_TRACK: 16,
  NEXT_TRACK: 32,
  TURN_ON: 128,
  TURN_OFF: 256,
  PLAY_MEDIA: 512,
  VOLUME_STEP: 1024,
  SELECT_SOURCE: 2048,
  STOP: 4096,
  CLEAR_PLAYLIST: 8192,
  PLAY: 16384,
  SHUFFLE_SET: 32768,
  SELECT_SOUND_MODE: 65536,
  BROWSE_MEDIA: 131072,
  REPEAT_SET: 262144,
} as const;

/** Bits owned by the output stage. */
export const SINK_FEATURES = MediaFeature.VOLUME_MUTE | MediaFeature.VOLUME_SET | MediaFeature.VOLUME_STEP;

/** Bits aggregated across every wired device. */
export const ANY_DEVICE_FEATURES = MediaFeature.BROWSE_MEDIA | MediaFeature.PLAY_MEDIA;

export function hasFeature(features: number, feature: number): boolean {
  return (features & feature) === feature;
}
