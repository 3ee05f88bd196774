import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { resolveStackView, type CompositeState, type StackView } from '@/domain/stack/compositeState';
import { findNode, type SourceNode } from '@/domain/stack/sourceResolver';
import type { WiringMap } from '@/domain/stack/types';
import { allDevices, buildWiringMap } from '@/domain/stack/wiringMap';
import type { StackConfig } from '@/domain/config/types';
import type { BrowseNode } from '@/ports/BrowseTypes';
import type { DeviceCommand, DevicePort } from '@/ports/DevicePort';
import type { NotifierPort } from '@/ports/NotifierPort';
import type { PlayerDirectoryPort } from '@/ports/PlayerDirectoryPort';
import { MediaBrowser, splitContentId } from '@/application/stack/mediaBrowser';
import {
  CommandFailedError,
  SourceNotFoundError,
  TargetNotFoundError,
} from '@/application/stack/stackErrors';
import type { StackCommand } from '@/application/stack/stackCommands';
import { executeSwitch, planRoute, selectSource, type SwitchReport } from '@/application/stack/switchExecutor';

export type MediaStackDeps = {
  devices: DevicePort;
  players: PlayerDirectoryPort;
  notifier: NotifierPort;
  log?: ComponentLogger;
};

/**
 * Composite virtual player over one wiring map. The resolved view is rebuilt
 * from live snapshots on every refresh and never patched in place.
 */
export class MediaStack {
  public readonly id: string;
  public readonly name: string;
  public readonly mapping: WiringMap;
  private readonly devices: DevicePort;
  private readonly players: PlayerDirectoryPort;
  private readonly notifier: NotifierPort;
  private readonly log: ComponentLogger;
  private readonly browser: MediaBrowser;
  private view: StackView;
  private lastPublished: string | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(config: StackConfig, deps: MediaStackDeps) {
    this.id = config.id;
    this.name = config.name;
    this.mapping = buildWiringMap(config.mapping);
    this.devices = deps.devices;
    this.players = deps.players;
    this.notifier = deps.notifier;
    this.log = deps.log ?? createLogger('Stack', config.id);
    this.browser = new MediaBrowser(
      { id: this.id, name: this.name, mapping: this.mapping },
      (deviceId) => this.devices.getState(deviceId),
      this.players,
    );
    this.view = this.resolve();
  }

  public start(): void {
    if (this.unsubscribe) {
      return;
    }
    const watched = allDevices(this.mapping);
    this.unsubscribe = this.devices.subscribe(watched, (deviceId) => {
      this.log.spam('dependency changed', { deviceId });
      this.refresh();
    });
    this.log.info('media stack started', { devices: watched.length });
    this.refresh();
  }

  public stop(): void {
    if (!this.unsubscribe) {
      return;
    }
    this.unsubscribe();
    this.unsubscribe = null;
    this.log.info('media stack stopped');
  }

  public refresh(): StackView {
    this.view = this.resolve();
    const serialized = JSON.stringify(this.view.state);
    if (serialized !== this.lastPublished) {
      this.lastPublished = serialized;
      this.log.debug('composite state changed', {
        status: this.view.state.status,
        source: this.view.state.source,
        sink: this.view.state.sinkDeviceId,
      });
      this.notifier.notifyStackStateChanged(this.id, this.view.state);
    }
    return this.view;
  }

  public getState(): CompositeState {
    return this.view.state;
  }

  public getTree(): SourceNode | null {
    return this.view.tree;
  }

  public async execute(command: StackCommand): Promise<void> {
    switch (command.command) {
      case 'turn_on':
        return this.turnOn();
      case 'turn_off':
        return this.turnOff();
      case 'volume_set':
        return this.sendToSink({ kind: 'volume_set', level: command.level });
      case 'volume_mute':
        return this.sendToSink({ kind: 'volume_mute', muted: command.muted });
      case 'volume_up':
        return this.sendToSink({ kind: 'volume_up' });
      case 'volume_down':
        return this.sendToSink({ kind: 'volume_down' });
      case 'media_play':
        return this.sendToSource({ kind: 'media_play' });
      case 'media_pause':
        return this.sendToSource({ kind: 'media_pause' });
      case 'media_play_pause':
        return this.sendToSource({ kind: 'media_play_pause' });
      case 'media_stop':
        return this.sendToSource({ kind: 'media_stop' });
      case 'media_next_track':
        return this.sendToSource({ kind: 'media_next_track' });
      case 'media_previous_track':
        return this.sendToSource({ kind: 'media_previous_track' });
      case 'media_seek':
        return this.sendToSource({ kind: 'media_seek', position: command.position });
      case 'clear_playlist':
        return this.sendToSource({ kind: 'clear_playlist' });
      case 'shuffle_set':
        return this.sendToSource({ kind: 'shuffle_set', shuffle: command.shuffle });
      case 'select_source':
        await this.selectSource(command.source);
        return;
      case 'play_media':
        return this.playMedia(command.contentType, command.contentId);
    }
  }

  /** Powers the live source, or the sink when nothing is active. */
  public async turnOn(): Promise<void> {
    const view = this.refresh();
    const target = view.activeLeaf?.deviceId ?? view.sinkId;
    if (!target) {
      throw new TargetNotFoundError(this.id);
    }
    await this.send(target, { kind: 'turn_on' });
  }

  /**
   * Powers off every wired device concurrently; waits for all of them and
   * rethrows the first failure.
   */
  public async turnOff(): Promise<void> {
    const targets = allDevices(this.mapping);
    const results = await Promise.allSettled(
      targets.map((deviceId) => this.send(deviceId, { kind: 'turn_off' })),
    );
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }
  }

  public async setVolume(level: number): Promise<void> {
    await this.sendToSink({ kind: 'volume_set', level });
  }

  public async muteVolume(muted: boolean): Promise<void> {
    await this.sendToSink({ kind: 'volume_mute', muted });
  }

  public async selectSource(label: string): Promise<SwitchReport> {
    const view = this.refresh();
    const report = await selectSource(this.devices, view.tree, label, this.log);
    this.refresh();
    return report;
  }

  /**
   * Routes the chain to the device named by the content id prefix, then hands
   * the remaining id to that device's own player.
   */
  public async playMedia(contentType: string, contentId: string): Promise<void> {
    const { deviceId, childId } = splitContentId(contentId);
    if (deviceId === this.id) {
      return;
    }
    const view = this.refresh();
    const node = findNode(view.tree, deviceId);
    if (!node) {
      throw new SourceNotFoundError(`${deviceId} in source chain`);
    }
    await executeSwitch(this.devices, planRoute(node), this.log);

    const player = this.players.resolvePlayer(deviceId);
    if (!player) {
      throw new TargetNotFoundError(deviceId);
    }
    this.log.info('delegating play media', { deviceId, contentType, contentId: childId });
    await player.playMedia(contentType, childId);
    this.refresh();
  }

  public browseMedia(contentType?: string, contentId?: string): Promise<BrowseNode> {
    return this.browser.browse(contentType, contentId);
  }

  private resolve(): StackView {
    return resolveStackView(this.mapping, (deviceId) => this.devices.getState(deviceId));
  }

  private async sendToSink(command: DeviceCommand): Promise<void> {
    const sinkId = this.refresh().sinkId;
    if (!sinkId || !this.devices.getState(sinkId)) {
      throw new TargetNotFoundError(sinkId ?? this.id);
    }
    await this.send(sinkId, command);
  }

  private async sendToSource(command: DeviceCommand): Promise<void> {
    const leaf = this.refresh().activeLeaf;
    if (!leaf) {
      throw new TargetNotFoundError(this.id);
    }
    await this.send(leaf.deviceId, command);
  }

  private async send(deviceId: string, command: DeviceCommand): Promise<void> {
    try {
      await this.devices.callCommand(deviceId, command);
    } catch (error) {
      throw new CommandFailedError(deviceId, command.kind, error);
    }
  }
}
