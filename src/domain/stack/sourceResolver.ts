import { createLogger } from '@/shared/logging/logger';
import {
  isOffStatus,
  type DeviceSnapshotReader,
  type DeviceState,
  type DeviceStatus,
  type WiringMap,
} from '@/domain/stack/types';
import { wiredTarget } from '@/domain/stack/wiringMap';

const log = createLogger('Stack', 'Resolver');

/**
 * One device's position in the resolved tree for the current snapshot set.
 * Rebuilt from scratch on every refresh; `parent` is navigation only.
 */
export interface SourceNode {
  deviceId: string;
  displayName: string;
  status: DeviceStatus;
  currentSource: string | null;
  /** Selectable sources, advertised list first, live source appended when missing. */
  sources: string[];
  /** Wired sources whose target device resolved. */
  children: Map<string, SourceNode>;
  /** Parent's source that leads here; null at the root. */
  incomingSource: string | null;
  active: boolean;
  parent: SourceNode | null;
}

/**
 * One selectable line of the composite source list.
 */
export interface SourceEntry {
  label: string;
  node: SourceNode;
  /** Terminal source on `node`, or null for a device without sources. */
  source: string | null;
  active: boolean;
}

export type CycleEvent = {
  deviceId: string;
  source: string;
  target: string;
};

export type ResolveOptions = {
  onCycle?: (event: CycleEvent) => void;
};

type ResolveContext = {
  map: WiringMap;
  getState: DeviceSnapshotReader;
  onCycle?: (event: CycleEvent) => void;
};

export function qualifiedLabel(displayName: string, source: string | null): string {
  return source ? `${displayName}: ${source}` : displayName;
}

/**
 * Advertised sources (deduplicated, order kept) plus the live source when the
 * device under-reports it.
 */
export function collectSources(state: DeviceState): string[] {
  const sources: string[] = [];
  for (const source of state.sourceList) {
    if (!sources.includes(source)) {
      sources.push(source);
    }
  }
  if (state.source && !sources.includes(state.source)) {
    sources.push(state.source);
  }
  return sources;
}

/**
 * Depth-first walk from `rootId` over live device state. Missing devices and
 * cyclic edges end their branch instead of failing the walk.
 */
export function resolveSourceTree(
  map: WiringMap,
  getState: DeviceSnapshotReader,
  rootId: string | null,
  options: ResolveOptions = {},
): SourceNode | null {
  if (!rootId) {
    return null;
  }
  const ctx: ResolveContext = { map, getState, onCycle: options.onCycle };
  return resolveNode(ctx, rootId, new Set(), null, null);
}

function resolveNode(
  ctx: ResolveContext,
  deviceId: string,
  ancestors: ReadonlySet<string>,
  parent: SourceNode | null,
  incomingSource: string | null,
): SourceNode | null {
  const state = ctx.getState(deviceId);
  if (!state) {
    log.spam('device snapshot missing', { deviceId });
    return null;
  }

  const reachesHere = parent === null || (parent.active && parent.currentSource === incomingSource);
  const node: SourceNode = {
    deviceId,
    displayName: state.name,
    status: state.status,
    currentSource: state.source ?? null,
    sources: collectSources(state),
    children: new Map(),
    incomingSource,
    active: reachesHere && !isOffStatus(state.status),
    parent,
  };

  const lineage = new Set(ancestors);
  lineage.add(deviceId);

  for (const source of node.sources) {
    const target = wiredTarget(ctx.map, deviceId, source);
    if (!target) {
      continue;
    }
    if (lineage.has(target)) {
      log.debug('cycle broken', { deviceId, source, target });
      ctx.onCycle?.({ deviceId, source, target });
      continue;
    }
    const child = resolveNode(ctx, target, lineage, node, source);
    if (child) {
      node.children.set(source, child);
    }
  }

  return node;
}

/**
 * Flattens the tree into selectable entries: every terminal source of every
 * node, or the bare node for devices without sources. A wired input that is
 * selected while its device is not active stays listed, since the active
 * chain ends on it.
 */
export function sourceEntries(tree: SourceNode | null): SourceEntry[] {
  const entries: SourceEntry[] = [];
  const visit = (node: SourceNode): void => {
    if (node.sources.length === 0) {
      entries.push({ label: qualifiedLabel(node.displayName, null), node, source: null, active: node.active });
      return;
    }
    for (const source of node.sources) {
      const selected = node.active && node.currentSource === source;
      const child = node.children.get(source);
      if (!child || (selected && !child.active)) {
        entries.push({ label: qualifiedLabel(node.displayName, source), node, source, active: selected });
      }
      if (child) {
        visit(child);
      }
    }
  };
  if (tree) {
    visit(tree);
  }
  return entries;
}

/**
 * Deepest node of the active chain, or null when the root itself is inactive.
 */
export function findActiveLeaf(tree: SourceNode | null): SourceNode | null {
  if (!tree || !tree.active) {
    return null;
  }
  let node = tree;
  while (node.currentSource !== null) {
    const child = node.children.get(node.currentSource);
    if (!child || !child.active) {
      break;
    }
    node = child;
  }
  return node;
}

export function findNode(tree: SourceNode | null, deviceId: string): SourceNode | null {
  if (!tree) {
    return null;
  }
  if (tree.deviceId === deviceId) {
    return tree;
  }
  for (const child of tree.children.values()) {
    const found = findNode(child, deviceId);
    if (found) {
      return found;
    }
  }
  return null;
}

/** Root-to-node path following `parent` references. */
export function chainTo(node: SourceNode): SourceNode[] {
  const chain: SourceNode[] = [];
  let current: SourceNode | null = node;
  while (current) {
    chain.push(current);
    current = current.parent;
  }
  return chain.reverse();
}

/**
 * JSON-friendly view of the tree (no parent references).
 */
export type SourceTreeView = {
  deviceId: string;
  name: string;
  status: DeviceStatus;
  currentSource: string | null;
  active: boolean;
  sources: Array<{ name: string; child: SourceTreeView | null }>;
};

export function toTreeView(node: SourceNode): SourceTreeView {
  return {
    deviceId: node.deviceId,
    name: node.displayName,
    status: node.status,
    currentSource: node.currentSource,
    active: node.active,
    sources: node.sources.map((source) => {
      const child = node.children.get(source);
      return { name: source, child: child ? toTreeView(child) : null };
    }),
  };
}
