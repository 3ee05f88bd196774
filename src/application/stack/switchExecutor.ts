import type { ComponentLogger } from '@/shared/logging/logger';
import { chainTo, sourceEntries, type SourceEntry, type SourceNode } from '@/domain/stack/sourceResolver';
import type { DeviceCommand, DevicePort } from '@/ports/DevicePort';
import { CommandFailedError, SourceNotFoundError } from '@/application/stack/stackErrors';

/**
 * One device along a switch path and the input it must end up on.
 * `source` is null for a hop that only needs power.
 */
export type SwitchHop = {
  deviceId: string;
  source: string | null;
};

export type SwitchReport = {
  hops: SwitchHop[];
  commandsIssued: number;
};

export function findEntry(tree: SourceNode | null, label: string): SourceEntry | null {
  return sourceEntries(tree).find((entry) => entry.label === label) ?? null;
}

/**
 * Root-to-target hops for a source entry: every ancestor selects the input
 * leading to the next device, the target selects the entry's own source.
 */
export function planSwitch(entry: SourceEntry): SwitchHop[] {
  return planRoute(entry.node, entry.source);
}

/**
 * Root-to-node hops that make `node` the live device without touching its own
 * input unless `finalSource` is given.
 */
export function planRoute(node: SourceNode, finalSource: string | null = null): SwitchHop[] {
  const chain = chainTo(node);
  return chain.map((hop, index) => {
    const next = chain[index + 1];
    return {
      deviceId: hop.deviceId,
      source: next ? next.incomingSource : finalSource,
    };
  });
}

/**
 * Replays hops strictly in order; each hop reads the live snapshot first so
 * devices already on the right input receive no command.
 */
export async function executeSwitch(
  devices: DevicePort,
  hops: SwitchHop[],
  log: ComponentLogger,
): Promise<SwitchReport> {
  let commandsIssued = 0;
  const send = async (deviceId: string, command: DeviceCommand): Promise<void> => {
    log.debug('switch hop command', { deviceId, command: command.kind });
    try {
      await devices.callCommand(deviceId, command);
    } catch (error) {
      throw new CommandFailedError(deviceId, command.kind, error);
    }
    commandsIssued += 1;
  };

  for (const hop of hops) {
    if (devices.getState(hop.deviceId)?.status === 'off') {
      await send(hop.deviceId, { kind: 'turn_on' });
    }
    if (hop.source === null) {
      continue;
    }
    if (devices.getState(hop.deviceId)?.source !== hop.source) {
      await send(hop.deviceId, { kind: 'select_source', source: hop.source });
    }
  }

  return { hops, commandsIssued };
}

/**
 * Looks up `label` in the tree and switches every hop leading to it.
 */
export async function selectSource(
  devices: DevicePort,
  tree: SourceNode | null,
  label: string,
  log: ComponentLogger,
): Promise<SwitchReport> {
  const entry = findEntry(tree, label);
  if (!entry) {
    throw new SourceNotFoundError(label);
  }
  const hops = planSwitch(entry);
  log.info('switching source', { label, hops: hops.length });
  return executeSwitch(devices, hops, log);
}
