import type { ComponentLogger } from '@/shared/logging/logger';

export type BestEffortOptions<T> = {
  fallback: T;
  onError?: 'ignore' | 'debug' | 'warn';
  label?: string;
  context?: Record<string, unknown>;
  log?: ComponentLogger;
};

function logBestEffortFailure(error: unknown, options: BestEffortOptions<unknown>): void {
  if (!options.log || !options.onError || options.onError === 'ignore') {
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  options.log[options.onError](options.label ?? 'best-effort fallback used', {
    ...options.context,
    message,
  });
}

export async function bestEffort<T>(fn: () => Promise<T>, options: BestEffortOptions<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    logBestEffortFailure(error, options);
    return options.fallback;
  }
}

export function bestEffortSync<T>(fn: () => T, options: BestEffortOptions<T>): T {
  try {
    return fn();
  } catch (error) {
    logBestEffortFailure(error, options);
    return options.fallback;
  }
}

export function safeJsonParse<T>(
  raw: string,
  fallback: T,
  options: Omit<BestEffortOptions<T>, 'fallback'> = {},
): T {
  return bestEffortSync<T>(() => JSON.parse(raw), { ...options, fallback });
}
