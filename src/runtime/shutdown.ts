import { createLogger } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';

export type ShutdownOptions = {
  forceExitAfterMs?: number;
  exit?: (code: number) => void;
};

/**
 * Stops the runtime on SIGINT/SIGTERM. A watchdog forces the exit if a
 * service never finishes stopping.
 */
export function registerShutdownHandlers(
  runtime: Runtime,
  log = createLogger('Daemon'),
  options: ShutdownOptions = {},
): () => Promise<void> {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const shutdown = async (signal?: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('stopping', { signal });

    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      exit(1);
    }, options.forceExitAfterMs ?? 8000);

    await runtime.stop();

    clearTimeout(forceExit);
    exit(0);
  };

  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));
  return () => shutdown();
}
