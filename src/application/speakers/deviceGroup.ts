import { DeviceHandle } from '@/application/speakers/deviceHandle';
import type { SpeakerConfig } from '@/domain/config/types';
import { powerStateLabel } from '@/domain/playback/playbackState';
import type { PowerProtocolPort } from '@/ports/PowerProtocolPort';
import type { SpeakerSwitchPort } from '@/ports/SpeakerSwitchPort';
import { describeError } from '@/shared/errors';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

/**
 * Fixed set of speakers switched together.
 *
 * Broadcasts are fire-and-forget: each member gets its own command and the
 * group never waits on them. Outcomes are only visible in the logs;
 * `settle()` exists for shutdown and tests.
 */
export class DeviceGroup implements SpeakerSwitchPort {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly devices: readonly DeviceHandle[],
    private readonly log: ComponentLogger = createLogger('Speakers', 'Group'),
  ) {}

  public static fromConfig(speakers: SpeakerConfig[], protocol: PowerProtocolPort): DeviceGroup {
    const log = createLogger('Speakers');
    return new DeviceGroup(
      speakers.map((speaker) => DeviceHandle.fromConfig(speaker, protocol, log)),
      log.child('Group'),
    );
  }

  public get size(): number {
    return this.devices.length;
  }

  public members(): readonly DeviceHandle[] {
    return this.devices;
  }

  public switchOn(): void {
    this.setPowerState(true);
  }

  public switchOff(): void {
    this.setPowerState(false);
  }

  public setPowerState(on: boolean): void {
    this.log.debug('broadcasting power state', {
      state: powerStateLabel(on),
      speakers: this.devices.length,
    });
    for (const device of this.devices) {
      this.track(device.setState(on), device.name);
    }
  }

  /**
   * Authenticates every member concurrently; individual failures are logged
   * by the handles.
   */
  public async prime(): Promise<void> {
    await Promise.all(this.devices.map((device) => device.prime()));
  }

  /**
   * Resolves once every command started so far has finished.
   */
  public async settle(): Promise<void> {
    await Promise.all(Array.from(this.inFlight));
  }

  public async close(): Promise<void> {
    await this.settle();
    await Promise.all(this.devices.map((device) => device.close()));
  }

  private track(command: Promise<void>, speaker: string): void {
    const tracked = command.catch((error: unknown) => {
      this.log.error('speaker command failed unexpectedly', {
        speaker,
        message: describeError(error),
      });
    });
    this.inFlight.add(tracked);
    void tracked.then(() => {
      this.inFlight.delete(tracked);
    });
  }
}
