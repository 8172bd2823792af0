import type { SpeakerConfig } from '@/domain/config/types';
import { powerStateLabel } from '@/domain/playback/playbackState';
import type { PowerProtocolPort, PowerSession, PowerTarget } from '@/ports/PowerProtocolPort';
import { bestEffort } from '@/shared/bestEffort';
import { ConnectError, describeError } from '@/shared/errors';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { formatMacAddress } from '@/shared/utils/mac';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

/**
 * One speaker behind a power-switching plug.
 *
 * The handle owns at most one session. Any failure while opening or using it
 * drops the session and surfaces as {@link ConnectError}; the next operation
 * reconnects from scratch. Operations on the same handle run one at a time.
 */
export class DeviceHandle {
  private session: PowerSession | null = null;
  private connectionState: ConnectionState = 'disconnected';
  private tail: Promise<void> = Promise.resolve();
  private queuedState: { desired: boolean; done: Promise<void> } | null = null;
  private readonly log: ComponentLogger;

  constructor(
    private readonly target: PowerTarget,
    private readonly protocol: PowerProtocolPort,
    log: ComponentLogger = createLogger('Speakers'),
  ) {
    this.log = log.child(target.name);
  }

  public static fromConfig(
    config: SpeakerConfig,
    protocol: PowerProtocolPort,
    log?: ComponentLogger,
  ): DeviceHandle {
    return new DeviceHandle(
      {
        name: config.name,
        host: config.host,
        port: config.port,
        mac: config.mac,
        devtype: config.devtype,
      },
      protocol,
      log,
    );
  }

  public get name(): string {
    return this.target.name;
  }

  public getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  /**
   * Opens and authenticates a fresh session, replacing any existing one.
   */
  public connect(): Promise<void> {
    return this.exclusive(async () => {
      await this.openSession();
    });
  }

  /**
   * Connects once up front so the handshake is done before the first command.
   * Failures are logged; the next command retries.
   */
  public prime(): Promise<void> {
    return this.exclusive(async () => {
      try {
        await this.openSession();
      } catch (error) {
        this.log.warn('could not connect to speaker', {
          speaker: this.target.name,
          message: describeError(error),
        });
      }
    });
  }

  public currentPower(): Promise<boolean> {
    return this.exclusive(() => this.readPower());
  }

  public setPower(on: boolean): Promise<void> {
    return this.exclusive(() => this.writePower(on));
  }

  /**
   * Drives the speaker to `desired` unless it already reports it. Never
   * rejects on device trouble; the failure is logged and the next call
   * starts with a new session.
   *
   * A call made while another `setState` is still waiting its turn only
   * updates that one's target, so at most one is queued.
   */
  public setState(desired: boolean): Promise<void> {
    const waiting = this.queuedState;
    if (waiting) {
      waiting.desired = desired;
      return waiting.done;
    }
    const queued = { desired, done: Promise.resolve() };
    queued.done = this.exclusive(() => {
      this.queuedState = null;
      return this.applyState(queued.desired);
    });
    this.queuedState = queued;
    return queued.done;
  }

  public close(): Promise<void> {
    return this.exclusive(() => this.dropSession());
  }

  private async applyState(desired: boolean): Promise<void> {
    const state = powerStateLabel(desired);
    try {
      const current = await this.readPower();
      if (current === desired) {
        this.log.debug('speaker already in requested state', { state });
        return;
      }
      this.log.info(`turning ${state} speaker`, { speaker: this.target.name });
      await this.writePower(desired);
    } catch (error) {
      if (!(error instanceof ConnectError)) {
        throw error;
      }
      this.log.warn(`could not turn ${state} speaker`, {
        speaker: this.target.name,
        message: describeError(error),
      });
    }
  }

  private async openSession(): Promise<PowerSession> {
    await this.dropSession();
    this.connectionState = 'connecting';
    this.log.debug('connecting to speaker', {
      host: this.target.host,
      port: this.target.port,
      mac: formatMacAddress(this.target.mac),
      protocol: this.protocol.name,
    });

    let session: PowerSession | null = null;
    try {
      session = await this.protocol.connect(this.target);
      await session.authenticate();
    } catch (error) {
      this.connectionState = 'disconnected';
      if (session) {
        await this.closeQuietly(session);
      }
      throw new ConnectError(`connection to ${this.target.name} failed`, { cause: error });
    }

    this.session = session;
    this.connectionState = 'connected';
    this.log.info('connected to speaker', { speaker: this.target.name });
    return session;
  }

  private async requireSession(): Promise<PowerSession> {
    return this.session ?? this.openSession();
  }

  private async readPower(): Promise<boolean> {
    const session = await this.requireSession();
    try {
      return await session.queryPower();
    } catch (error) {
      await this.dropSession();
      throw new ConnectError(`power query to ${this.target.name} failed`, { cause: error });
    }
  }

  private async writePower(on: boolean): Promise<void> {
    const session = await this.requireSession();
    try {
      await session.setPower(on);
    } catch (error) {
      await this.dropSession();
      throw new ConnectError(`power ${powerStateLabel(on)} command to ${this.target.name} failed`, {
        cause: error,
      });
    }
  }

  private async dropSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.connectionState = 'disconnected';
    if (session) {
      await this.closeQuietly(session);
    }
  }

  private closeQuietly(session: PowerSession): Promise<void> {
    return bestEffort(() => session.close(), {
      fallback: undefined,
      onError: 'debug',
      log: this.log,
      label: 'speaker session close failed',
    });
  }

  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.tail.then(operation, operation);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
