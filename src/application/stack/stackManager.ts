import { createLogger } from '@/shared/logging/logger';
import type { StackConfig } from '@/domain/config/types';
import type { CompositeState } from '@/domain/stack/compositeState';
import type { DevicePort } from '@/ports/DevicePort';
import type { NotifierPort } from '@/ports/NotifierPort';
import type { PlayerDirectoryPort } from '@/ports/PlayerDirectoryPort';
import { MediaStack } from '@/application/stack/mediaStack';

export type StackSummary = {
  id: string;
  name: string;
  state: CompositeState;
};

export type StackManagerDeps = {
  devices: DevicePort;
  players: PlayerDirectoryPort;
  notifier: NotifierPort;
};

/**
 * Owns every configured media stack.
 */
export class StackManager {
  private readonly log = createLogger('Stack', 'Manager');
  private readonly stacks = new Map<string, MediaStack>();
  private started = false;

  constructor(private readonly deps: StackManagerDeps) {}

  public replaceAll(configs: StackConfig[]): void {
    const wasStarted = this.started;
    this.stopAll();
    this.stacks.clear();
    for (const config of configs) {
      this.stacks.set(config.id, new MediaStack(config, this.deps));
    }
    this.log.info('stacks configured', { count: this.stacks.size });
    if (wasStarted) {
      this.startAll();
    }
  }

  public startAll(): void {
    for (const stack of this.stacks.values()) {
      stack.start();
    }
    this.started = true;
  }

  public stopAll(): void {
    for (const stack of this.stacks.values()) {
      stack.stop();
    }
    this.started = false;
  }

  public get(stackId: string): MediaStack | null {
    return this.stacks.get(stackId) ?? null;
  }

  public list(): StackSummary[] {
    return [...this.stacks.values()].map((stack) => ({
      id: stack.id,
      name: stack.name,
      state: stack.getState(),
    }));
  }
}

export function createStackManager(deps: StackManagerDeps): StackManager {
  return new StackManager(deps);
}
