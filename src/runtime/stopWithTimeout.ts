import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type StopLogger = Pick<ComponentLogger, 'info' | 'warn' | 'error'>;

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
export type LifecycleService = {
  name: string;
  stop: () => Promise<void> | void;
};

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Stops one service, giving up after `timeoutMs`. A stop that fails after the
 * timeout is still logged once it settles.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: LifecycleService['stop'],
  timeoutMs: number,
  log: StopLogger = createLogger('Server'),
): Promise<StopResult> {
  const stopPromise: Promise<StopResult> = Promise.resolve()
    .then(stopFn)
    .then(
      (): StopResult => ({ kind: 'stopped' }),
      (error: unknown): StopResult => ({ kind: 'error', error }),
    );

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<StopResult>((resolve) => {
    timer = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });
  const result = await Promise.race([stopPromise, timeout]);
  clearTimeout(timer);

  switch (result.kind) {
    case 'stopped':
      log.info(`service ${name} stopped`);
      break;
    case 'timeout':
      log.warn(`service ${name} stop timed out`, { timeoutMs });
      void stopPromise.then((late) => {
        if (late.kind === 'error') {
          log.error(`failed to stop ${name}`, { message: describe(late.error) });
        }
      });
      break;
    case 'error':
      log.error(`failed to stop ${name}`, { message: describe(result.error) });
      break;
  }
  return result;
}

/**
 * Stops services concurrently, each under its own timeout.
 */
export async function stopAll(
  services: LifecycleService[],
  timeoutMs: number,
  log: StopLogger = createLogger('Server'),
): Promise<Record<string, StopResult['kind']>> {
  const results = await Promise.all(
    services.map(async (service) => [service.name, (await stopWithTimeout(service.name, service.stop, timeoutMs, log)).kind] as const),
  );
  return Object.fromEntries(results);
}
