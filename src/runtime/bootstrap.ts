import { buildRuntimeSettings } from '@/config';
import { loadEnvironment, type EnvironmentConfig } from '@/config/environment';
import { BroadlinkAdapter } from '@/adapters/broadlink/BroadlinkAdapter';
import { GoogleCastReceiverAdapter } from '@/adapters/googleCast/GoogleCastReceiverAdapter';
import { loadDaemonConfig } from '@/application/config/configRepository';
import { PlaybackStateMachine } from '@/application/playback/playbackStateMachine';
import { ReceiverConnector } from '@/application/receiver/receiverConnector';
import { ReceiverStatusAdapter } from '@/application/receiver/receiverStatusAdapter';
import { DeviceGroup } from '@/application/speakers/deviceGroup';
import { systemClock } from '@/infrastructure/time/systemClock';
import type { ClockPort } from '@/ports/ClockPort';
import type { PowerProtocolPort } from '@/ports/PowerProtocolPort';
import type { ReceiverPort } from '@/ports/ReceiverPort';
import { createLogger } from '@/shared/logging/logger';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

export type RuntimeOptions = {
  configPath: string;
  env?: EnvironmentConfig;
  clock?: ClockPort;
  /** Overrides the Broadlink adapter. */
  protocol?: PowerProtocolPort;
  /** Overrides the Google Cast adapter. */
  receiver?: ReceiverPort;
};

export function createRuntime(options: RuntimeOptions): Runtime {
  const env = options.env ?? loadEnvironment();
  const clock = options.clock ?? systemClock;
  const services: LifecycleService[] = [];

  async function startServices(): Promise<void> {
    const log = createLogger('Daemon');
    const config = await loadDaemonConfig(options.configPath, {
      pollIntervalMs: env.pollIntervalMs,
      gracePeriodMs: env.gracePeriodMs,
    });
    const settings = buildRuntimeSettings(config, env);

    log.info('starting speaker daemon', {
      env: env.nodeEnv,
      receiver: settings.receiverName,
      speakers: config.speakers.length,
    });

    const protocol = options.protocol ?? new BroadlinkAdapter({ timeoutMs: settings.devices.timeoutMs });
    const receiver =
      options.receiver ??
      new GoogleCastReceiverAdapter({ discoveryTimeoutMs: settings.discovery.timeoutMs });

    const speakers = DeviceGroup.fromConfig(config.speakers, protocol);
    const supervisor = new PlaybackStateMachine(speakers, {
      clock,
      pollIntervalMs: settings.supervisor.pollIntervalMs,
      gracePeriodMs: settings.supervisor.gracePeriodMs,
    });
    const connector = new ReceiverConnector(
      settings.receiverName,
      receiver,
      new ReceiverStatusAdapter(supervisor),
      { retryDelayMs: settings.discovery.retryDelayMs },
    );

    // Stop order matters: the supervisor goes first so the receiver's final
    // inactive signal is not turned into a power-off broadcast.
    services.length = 0;
    services.push(
      { name: 'supervisor', stop: () => supervisor.stop() },
      { name: 'receiver', stop: () => connector.stop() },
      { name: 'speakers', stop: () => speakers.close() },
    );

    await speakers.prime();
    supervisor.start();
    connector.start();

    log.info('startup complete');
  }

  async function stopServices(): Promise<void> {
    const log = createLogger('Daemon');
    for (const service of services) {
      await stopWithTimeout(service.name, service.stop, env.stopTimeoutMs, log);
    }
    services.length = 0;
  }

  return {
    start: startServices,
    stop: stopServices,
  };
}
