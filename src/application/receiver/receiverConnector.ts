import type { ReceiverStatusAdapter } from '@/application/receiver/receiverStatusAdapter';
import type { ReceiverConnection, ReceiverPort } from '@/ports/ReceiverPort';
import { WakeSignal } from '@/shared/async/wakeSignal';
import { describeError } from '@/shared/errors';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export interface ReceiverConnectorOptions {
  retryDelayMs: number;
  log?: ComponentLogger;
}

/**
 * Keeps a session with the named receiver: looks it up until it answers,
 * feeds its status into the adapter, and starts over when the connection
 * drops.
 */
export class ReceiverConnector {
  private readonly log: ComponentLogger;
  private readonly stopSignal = new WakeSignal();
  private running = false;
  private loop: Promise<void> | null = null;
  private connection: ReceiverConnection | null = null;

  constructor(
    private readonly receiverName: string,
    private readonly receiver: ReceiverPort,
    private readonly adapter: ReceiverStatusAdapter,
    private readonly options: ReceiverConnectorOptions,
  ) {
    this.log = options.log ?? createLogger('Receiver');
  }

  public isConnected(): boolean {
    return this.connection !== null;
  }

  public start(): void {
    if (this.loop) {
      return;
    }
    this.running = true;
    this.stopSignal.clear();
    this.loop = this.run();
  }

  public async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      return;
    }
    this.running = false;
    this.stopSignal.set();
    const connection = this.connection;
    if (connection) {
      await connection.close();
    }
    await loop;
    this.loop = null;
  }

  private async run(): Promise<void> {
    while (this.running) {
      const connection = await this.attempt();
      if (!this.running) {
        if (connection) {
          await connection.close();
        }
        break;
      }
      if (!connection) {
        this.log.warn('could not connect to receiver, retrying', {
          receiver: this.receiverName,
          retryInMs: this.options.retryDelayMs,
        });
        await this.stopSignal.wait(this.options.retryDelayMs);
        continue;
      }

      this.connection = connection;
      this.log.info('connected to receiver', { receiver: connection.name });
      this.adapter.refresh(connection);
      await connection.closed();
      this.connection = null;
      this.adapter.refresh(connection);
      if (this.running) {
        this.log.warn('receiver connection lost', { receiver: connection.name });
      }
    }
  }

  private async attempt(): Promise<ReceiverConnection | null> {
    this.log.info('connecting to receiver', { receiver: this.receiverName });
    try {
      return await this.receiver.connect(this.receiverName, this.adapter);
    } catch (error) {
      this.log.debug('receiver lookup failed', {
        receiver: this.receiverName,
        message: describeError(error),
      });
      return null;
    }
  }
}
