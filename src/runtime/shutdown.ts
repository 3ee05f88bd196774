import { createLogger } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';
import type { StopLogger } from '@/runtime/stopWithTimeout';

export type ShutdownOptions = {
  log?: StopLogger;
  /** Exit code 1 after this long if the runtime never finishes stopping. */
  forceExitMs?: number;
  signals?: NodeJS.Signals[];
  exit?: (code: number) => void;
};

export type ShutdownHandle = {
  shutdown: () => Promise<void>;
  dispose: () => void;
};

export function registerShutdownHandlers(
  runtime: Pick<Runtime, 'stop'>,
  options: ShutdownOptions = {},
): ShutdownHandle {
  const log = options.log ?? createLogger('Server');
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const signals = options.signals ?? ['SIGINT', 'SIGTERM'];
  let pending: Promise<void> | null = null;

  const shutdown = (): Promise<void> => {
    if (pending) {
      return pending;
    }
    log.info('shutdown requested');
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      exit(1);
    }, options.forceExitMs ?? 8000);

    pending = runtime.stop().then(
      () => {
        clearTimeout(forceExit);
        exit(0);
      },
      (error: unknown) => {
        clearTimeout(forceExit);
        log.error('shutdown failed', { message: error instanceof Error ? error.message : String(error) });
        exit(1);
      },
    );
    return pending;
  };

  const onSignal = () => void shutdown();
  for (const signal of signals) {
    process.on(signal, onSignal);
  }

  return {
    shutdown,
    dispose: () => {
      for (const signal of signals) {
        process.off(signal, onSignal);
      }
    },
  };
}
