import type { ComponentLogger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';

export type BestEffortOptions<T> = {
  fallback: T;
  onError?: 'ignore' | 'debug' | 'warn';
  label?: string;
  context?: Record<string, unknown>;
  log?: ComponentLogger;
};

function logBestEffortFailure(error: unknown, options: BestEffortOptions<unknown>): void {
  if (!options.log || options.onError === undefined || options.onError === 'ignore') {
    return;
  }
  const label = options.label ?? 'best-effort fallback used';
  const context = { ...options.context, message: describeError(error) };
  if (options.onError === 'warn') {
    options.log.warn(label, context);
    return;
  }
  options.log.debug(label, context);
}

/**
 * Runs `fn` and resolves to `fallback` instead of rejecting.
 */
export async function bestEffort<T>(
  fn: () => Promise<T>,
  options: BestEffortOptions<T>,
): Promise<T> {
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
