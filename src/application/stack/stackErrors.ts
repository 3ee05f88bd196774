import type { DeviceCommandKind } from '@/ports/DevicePort';

/** Requested source label is not part of the current tree. */
export class SourceNotFoundError extends Error {
  constructor(public readonly target: string) {
    super(`Unable to find source ${target}`);
    this.name = 'SourceNotFoundError';
  }
}

/** A command has no device to go to (no active source, no sink, no player). */
export class TargetNotFoundError extends Error {
  constructor(public readonly target: string) {
    super(`Unknown target entity ${target}`);
    this.name = 'TargetNotFoundError';
  }
}

export class BrowseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BrowseError';
  }
}

/**
 * A device rejected a command. Hops issued before it are not rolled back.
 */
export class CommandFailedError extends Error {
  constructor(
    public readonly deviceId: string,
    public readonly command: DeviceCommandKind,
    public readonly failure: unknown,
  ) {
    super(`${command} failed on ${deviceId}: ${failure instanceof Error ? failure.message : String(failure)}`);
    this.name = 'CommandFailedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
