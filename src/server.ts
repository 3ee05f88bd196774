import { createLogger } from '@/shared/logging/logger';
import { createRuntime } from '@/runtime/bootstrap';
import { registerShutdownHandlers } from '@/runtime/shutdown';

const log = createLogger('Server');
const runtime = createRuntime();
const { shutdown } = registerShutdownHandlers(runtime, { log });

runtime.start().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  log.error('fatal bootstrap error', { message });
  process.exitCode = 1;
  void shutdown();
});
