import type { LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the daemon.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  jsonLogs: boolean;
  pollIntervalMs: number;
  gracePeriodMs: number;
  discoveryTimeoutMs: number;
  discoveryRetryDelayMs: number;
  deviceTimeoutMs: number;
  stopTimeoutMs: number;
}

const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  nodeEnv: 'production',
  logLevel: 'info',
  jsonLogs: false,
  pollIntervalMs: 10_000,
  gracePeriodMs: 60_000,
  discoveryTimeoutMs: 8_000,
  discoveryRetryDelayMs: 10_000,
  deviceTimeoutMs: 5_000,
  stopTimeoutMs: 6_000,
};

/**
 * Returns the static environment configuration (ENV overrides are not supported).
 */
export function loadEnvironment(overrides: Partial<EnvironmentConfig> = {}): EnvironmentConfig {
  return { ...DEFAULT_ENVIRONMENT, ...overrides };
}
