import type { DeviceState, DeviceStatus } from '../../src/domain/stack/types';
import type { BrowseNode } from '../../src/ports/BrowseTypes';
import type { DeviceCommand, DevicePort, StateChangeListener } from '../../src/ports/DevicePort';
import type { PlayerDirectoryPort, PlayerHandle } from '../../src/ports/PlayerDirectoryPort';

export type DeviceInit = {
  name?: string;
  status?: DeviceStatus;
  source?: string;
  sourceList?: string[];
  volumeLevel?: number;
  isVolumeMuted?: boolean;
  supportedFeatures?: number;
  attributes?: Record<string, unknown>;
};

export function device(deviceId: string, init: DeviceInit = {}): DeviceState {
  return {
    deviceId,
    name: init.name ?? deviceId.slice(deviceId.indexOf('.') + 1),
    status: init.status ?? 'on',
    source: init.source,
    sourceList: init.sourceList ?? [],
    volumeLevel: init.volumeLevel,
    isVolumeMuted: init.isVolumeMuted,
    supportedFeatures: init.supportedFeatures ?? 0,
    attributes: init.attributes ?? {},
  };
}

export type RecordedCall = {
  deviceId: string;
  command: DeviceCommand;
};

/**
 * In-memory devices that apply power, input and volume commands to their own
 * snapshots, the way a well-behaved host would.
 */
export class FakeDevices implements DevicePort, PlayerDirectoryPort {
  public readonly calls: RecordedCall[] = [];
  public readonly played: Array<{ deviceId: string; contentType: string; contentId: string }> = [];
  public readonly browsed: Array<{ deviceId: string; contentType?: string; contentId?: string }> = [];
  private readonly states = new Map<string, DeviceState>();
  private readonly listeners = new Map<string, Set<StateChangeListener>>();
  private readonly failures = new Map<string, Error>();
  private readonly libraries = new Map<string, BrowseNode>();

  constructor(states: DeviceState[] = []) {
    for (const state of states) {
      this.states.set(state.deviceId, state);
    }
  }

  public setState(state: DeviceState): void {
    this.states.set(state.deviceId, state);
    this.emit(state.deviceId);
  }

  public removeState(deviceId: string): void {
    this.states.delete(deviceId);
    this.emit(deviceId);
  }

  /** Makes `command` on `deviceId` reject. */
  public failOn(deviceId: string, kind: DeviceCommand['kind'], message = 'device unreachable'): void {
    this.failures.set(`${deviceId}/${kind}`, new Error(message));
  }

  public setLibrary(deviceId: string, node: BrowseNode): void {
    this.libraries.set(deviceId, node);
  }

  public listenerCount(): number {
    let count = 0;
    for (const set of this.listeners.values()) {
      count += set.size;
    }
    return count;
  }

  public getState(deviceId: string): DeviceState | null {
    return this.states.get(deviceId) ?? null;
  }

  public async callCommand(deviceId: string, command: DeviceCommand): Promise<void> {
    this.calls.push({ deviceId, command });
    const failure = this.failures.get(`${deviceId}/${command.kind}`);
    if (failure) {
      throw failure;
    }
    const current = this.states.get(deviceId);
    if (!current) {
      return;
    }
    switch (command.kind) {
      case 'turn_on':
        this.setState({ ...current, status: 'on' });
        return;
      case 'turn_off':
        this.setState({ ...current, status: 'off' });
        return;
      case 'select_source':
        this.setState({ ...current, source: command.source });
        return;
      case 'volume_set':
        this.setState({ ...current, volumeLevel: command.level });
        return;
      case 'volume_mute':
        this.setState({ ...current, isVolumeMuted: command.muted });
        return;
      case 'play_media':
        this.played.push({ deviceId, contentType: command.contentType, contentId: command.contentId });
        this.setState({ ...current, status: 'playing' });
        return;
      default:
        return;
    }
  }

  public subscribe(deviceIds: readonly string[], onChange: StateChangeListener): () => void {
    for (const deviceId of deviceIds) {
      const set = this.listeners.get(deviceId) ?? new Set<StateChangeListener>();
      set.add(onChange);
      this.listeners.set(deviceId, set);
    }
    return () => {
      for (const deviceId of deviceIds) {
        this.listeners.get(deviceId)?.delete(onChange);
      }
    };
  }

  public async browseNative(deviceId: string, contentType?: string, contentId?: string): Promise<BrowseNode> {
    this.browsed.push({ deviceId, contentType, contentId });
    const library = this.libraries.get(deviceId);
    if (!library) {
      throw new Error(`no library on ${deviceId}`);
    }
    return library;
  }

  public resolvePlayer(deviceId: string): PlayerHandle | null {
    if (!this.states.has(deviceId)) {
      return null;
    }
    return {
      deviceId,
      playMedia: (contentType, contentId) =>
        this.callCommand(deviceId, { kind: 'play_media', contentType, contentId }),
      browseMedia: (contentType, contentId) => this.browseNative(deviceId, contentType, contentId),
    };
  }

  private emit(deviceId: string): void {
    for (const listener of this.listeners.get(deviceId) ?? []) {
      listener(deviceId);
    }
  }
}
