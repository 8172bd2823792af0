import { loadEnvironment, type EnvironmentConfig } from '@/config/environment';
import type { DaemonConfig } from '@/domain/config/types';

export type RuntimeSettings = {
  env: EnvironmentConfig;
  receiverName: string;
  supervisor: { pollIntervalMs: number; gracePeriodMs: number };
  discovery: { timeoutMs: number; retryDelayMs: number };
  devices: { timeoutMs: number };
};

/**
 * Combines environment defaults with the loaded daemon configuration.
 */
export const buildRuntimeSettings = (
  config: DaemonConfig,
  env: EnvironmentConfig = loadEnvironment(),
): RuntimeSettings => ({
  env,
  receiverName: config.receiver.name,
  supervisor: {
    pollIntervalMs: config.timing.pollIntervalMs,
    gracePeriodMs: config.timing.gracePeriodMs,
  },
  discovery: {
    timeoutMs: env.discoveryTimeoutMs,
    retryDelayMs: env.discoveryRetryDelayMs,
  },
  devices: { timeoutMs: env.deviceTimeoutMs },
});
