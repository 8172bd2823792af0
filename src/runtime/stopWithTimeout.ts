import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';

export type StopResult =
  | { kind: 'stopped'; elapsedMs: number }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

type StopLogger = Pick<ComponentLogger, 'info' | 'warn' | 'error'>;

/**
 * Runs `stopFn`, giving up after `timeoutMs`. A stop that fails after the
 * timeout is still logged once it settles.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: StopLogger = createLogger('Daemon'),
): Promise<StopResult> {
  const startedAt = Date.now();
  let timeoutHandle: NodeJS.Timeout | null = null;

  const stopPromise = stopFn().then(
    (): StopResult => ({ kind: 'stopped', elapsedMs: Date.now() - startedAt }),
    (error: unknown): StopResult => ({ kind: 'error', error }),
  );
  const timeoutPromise = new Promise<StopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });

  switch (result.kind) {
    case 'stopped':
      log.info(`service ${name} stopped`, { elapsedMs: result.elapsedMs });
      return result;
    case 'timeout':
      log.warn(`service ${name} stop timed out`, { timeoutMs });
      void stopPromise.then((late) => {
        if (late.kind === 'error') {
          log.error(`failed to stop ${name}`, { message: describeError(late.error) });
        }
      });
      return result;
    case 'error':
      log.error(`failed to stop ${name}`, { message: describeError(result.error) });
      return result;
  }
}
