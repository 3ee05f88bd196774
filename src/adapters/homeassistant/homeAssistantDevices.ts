import { z } from 'zod';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { bestEffort } from '@/shared/bestEffort';
import type { DeviceState } from '@/domain/stack/types';
import type { BrowseNode } from '@/ports/BrowseTypes';
import type { DeviceCommand, DevicePort, StateChangeListener } from '@/ports/DevicePort';
import type { PlayerDirectoryPort, PlayerHandle } from '@/ports/PlayerDirectoryPort';
import type { HomeAssistantConnection, HomeAssistantEvent } from '@/adapters/homeassistant/types';
import { toBrowseNode, toDeviceState } from '@/adapters/homeassistant/stateMapping';
import { domainOf, toServiceCall } from '@/adapters/homeassistant/serviceCalls';

const stateChangedSchema = z.object({
  entity_id: z.string(),
  new_state: z.unknown().nullable().optional(),
});

/**
 * Device snapshots and commands backed by a Home Assistant connection. The
 * cache is reseeded from `get_states` after every (re)connect and kept
 * current by `state_changed` events.
 */
export class HomeAssistantDevices implements DevicePort, PlayerDirectoryPort {
  private readonly log: ComponentLogger;
  private readonly states = new Map<string, DeviceState>();
  private readonly listeners = new Map<string, Set<StateChangeListener>>();
  private unsubscribeEvents: (() => void) | null = null;
  private offConnected: (() => void) | null = null;

  constructor(
    private readonly connection: HomeAssistantConnection,
    log?: ComponentLogger,
  ) {
    this.log = log ?? createLogger('HomeAssistant', 'Devices');
  }

  public async start(): Promise<void> {
    if (this.offConnected) {
      return;
    }
    this.offConnected = this.connection.onConnected(() => {
      void bestEffort(() => this.reload(), {
        fallback: undefined,
        onError: 'warn',
        log: this.log,
        label: 'state reload failed',
      });
    });
    this.unsubscribeEvents = await this.connection.subscribeEvents('state_changed', (event) =>
      this.handleStateChanged(event),
    );
    await this.connection.connect();
    await this.reload();
  }

  public stop(): void {
    this.unsubscribeEvents?.();
    this.unsubscribeEvents = null;
    this.offConnected?.();
    this.offConnected = null;
    this.connection.close();
  }

  /** Replaces the cache with a full `get_states` dump. */
  public async reload(): Promise<void> {
    const result = await this.connection.sendCommand('get_states');
    if (!Array.isArray(result)) {
      throw new Error('get_states returned no state list');
    }
    const next = new Map<string, DeviceState>();
    for (const raw of result) {
      const state = toDeviceState(raw);
      if (state) {
        next.set(state.deviceId, state);
      }
    }
    const changed: string[] = [];
    for (const deviceId of this.listeners.keys()) {
      if (JSON.stringify(this.states.get(deviceId)) !== JSON.stringify(next.get(deviceId))) {
        changed.push(deviceId);
      }
    }
    this.states.clear();
    for (const [deviceId, state] of next) {
      this.states.set(deviceId, state);
    }
    this.log.debug('states loaded', { count: next.size, changed: changed.length });
    for (const deviceId of changed) {
      this.emit(deviceId);
    }
  }

  public getState(deviceId: string): DeviceState | null {
    return this.states.get(deviceId) ?? null;
  }

  public async callCommand(deviceId: string, command: DeviceCommand): Promise<void> {
    const { service, data } = toServiceCall(command);
    const domain = domainOf(deviceId);
    this.log.debug('call service', { deviceId, service: `${domain}.${service}` });
    await this.connection.sendCommand('call_service', {
      domain,
      service,
      service_data: data,
      target: { entity_id: deviceId },
    });
  }

  public subscribe(deviceIds: readonly string[], onChange: StateChangeListener): () => void {
    for (const deviceId of deviceIds) {
      let set = this.listeners.get(deviceId);
      if (!set) {
        set = new Set();
        this.listeners.set(deviceId, set);
      }
      set.add(onChange);
    }
    return () => {
      for (const deviceId of deviceIds) {
        const set = this.listeners.get(deviceId);
        if (!set) continue;
        set.delete(onChange);
        if (set.size === 0) {
          this.listeners.delete(deviceId);
        }
      }
    };
  }

  public async browseNative(deviceId: string, contentType?: string, contentId?: string): Promise<BrowseNode> {
    const payload: Record<string, unknown> = { entity_id: deviceId };
    if (contentType !== undefined && contentId !== undefined) {
      payload.media_content_type = contentType;
      payload.media_content_id = contentId;
    }
    const result = await this.connection.sendCommand('media_player/browse_media', payload);
    return toBrowseNode(result);
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

  private handleStateChanged(event: HomeAssistantEvent): void {
    const parsed = stateChangedSchema.safeParse(event.data);
    if (!parsed.success) {
      this.log.spam('ignored state_changed payload');
      return;
    }
    const { entity_id: deviceId, new_state: newState } = parsed.data;
    const state = newState ? toDeviceState(newState) : null;
    if (state) {
      this.states.set(deviceId, state);
    } else {
      this.states.delete(deviceId);
    }
    this.emit(deviceId);
  }

  private emit(deviceId: string): void {
    const set = this.listeners.get(deviceId);
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(deviceId);
      } catch (error) {
        this.log.warn('state listener failed', {
          deviceId,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
