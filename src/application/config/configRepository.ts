import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ZodIssue } from 'zod';
import { daemonConfigSchema, type ParsedDaemonConfig } from '@/application/config/configSchema';
import type { DaemonConfig, TimingConfig } from '@/domain/config/types';
import { ConfigError, describeError } from '@/shared/errors';
import { createLogger } from '@/shared/logging/logger';

const log = createLogger('Config');

/**
 * Reads and validates the daemon configuration. Every problem is fatal and
 * surfaces as {@link ConfigError}.
 */
export async function loadDaemonConfig(
  filePath: string,
  timingDefaults: TimingConfig,
): Promise<DaemonConfig> {
  const resolved = path.resolve(filePath);
  let raw: string;
  try {
    raw = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    throw new ConfigError(
      code === 'ENOENT'
        ? `configuration file not found: ${resolved}`
        : `cannot read configuration file ${resolved}: ${describeError(error)}`,
    );
  }

  const config = parseDaemonConfig(raw, timingDefaults);
  log.info('configuration loaded', {
    file: resolved,
    receiver: config.receiver.name,
    speakers: config.speakers.map((speaker) => speaker.name),
  });
  return config;
}

export function parseDaemonConfig(raw: string, timingDefaults: TimingConfig): DaemonConfig {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`configuration is not valid JSON: ${describeError(error)}`);
  }

  const result = daemonConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError('invalid configuration', result.error.issues.map(formatIssue));
  }
  return toDaemonConfig(result.data, timingDefaults);
}

function toDaemonConfig(parsed: ParsedDaemonConfig, timingDefaults: TimingConfig): DaemonConfig {
  return {
    receiver: { name: parsed.receiver.name },
    speakers: Object.entries(parsed.speakers).map(([name, speaker]) => ({
      name,
      host: speaker.address.host,
      port: speaker.address.port,
      mac: speaker.mac,
      devtype: speaker.devtype,
    })),
    timing: {
      pollIntervalMs: parsed.timing?.pollIntervalMs ?? timingDefaults.pollIntervalMs,
      gracePeriodMs: parsed.timing?.gracePeriodMs ?? timingDefaults.gracePeriodMs,
    },
  };
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}
