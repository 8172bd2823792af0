import dgram from 'node:dgram';
import { randomInt } from 'node:crypto';
import {
  COMMAND_AUTH,
  COMMAND_CONTROL,
  INITIAL_KEY,
  buildAuthPayload,
  buildPacket,
  buildPowerQueryPayload,
  buildPowerSetPayload,
  parseAuthPayload,
  parsePowerPayload,
  parseResponse,
} from '@/adapters/broadlink/broadlinkPacket';
import type { PowerSession, PowerTarget } from '@/ports/PowerProtocolPort';
import { DaemonError } from '@/shared/errors';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export class BroadlinkError extends DaemonError {
  constructor(
    message: string,
    public readonly errorCode?: number,
  ) {
    super('DEVICE_IO', message);
  }
}

export interface BroadlinkSessionOptions {
  timeoutMs: number;
  initialCount?: number;
}

/**
 * UDP session with one SP2-family plug. Requests are not pipelined; the
 * caller issues one at a time.
 */
export class BroadlinkSession implements PowerSession {
  private readonly log: ComponentLogger;
  private key: Buffer = INITIAL_KEY;
  private deviceId: Buffer = Buffer.alloc(4);
  private count: number;
  private closed = false;

  constructor(
    private readonly socket: dgram.Socket,
    private readonly target: PowerTarget,
    private readonly options: BroadlinkSessionOptions,
  ) {
    this.log = createLogger('Broadlink', target.name);
    this.count = options.initialCount ?? randomInt(0xffff);
    socket.on('error', (error) => {
      this.log.debug('socket error', { message: error.message });
    });
  }

  public async authenticate(): Promise<void> {
    this.key = INITIAL_KEY;
    this.deviceId = Buffer.alloc(4);
    const payload = await this.send(COMMAND_AUTH, buildAuthPayload());
    const auth = parseAuthPayload(payload);
    this.deviceId = auth.deviceId;
    this.key = auth.key;
    this.log.debug('authenticated', { deviceId: auth.deviceId });
  }

  public async queryPower(): Promise<boolean> {
    const payload = await this.send(COMMAND_CONTROL, buildPowerQueryPayload());
    return parsePowerPayload(payload);
  }

  public async setPower(on: boolean): Promise<void> {
    await this.send(COMMAND_CONTROL, buildPowerSetPayload(on));
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await new Promise<void>((resolve) => {
      this.socket.close(() => resolve());
    });
  }

  private async send(command: number, payload: Buffer): Promise<Buffer> {
    if (this.closed) {
      throw new BroadlinkError('session is closed');
    }
    this.count = (this.count + 1) & 0xffff;
    const packet = buildPacket({
      command,
      count: this.count,
      devtype: this.target.devtype,
      mac: this.target.mac,
      deviceId: this.deviceId,
      payload,
      key: this.key,
    });
    this.log.spam('sending packet', { command, count: this.count, length: packet.length });
    const response = await this.exchange(packet);
    const parsed = parseResponse(response, this.key);
    if (parsed.errorCode !== 0) {
      throw new BroadlinkError(
        `device rejected command 0x${command.toString(16)} (error 0x${parsed.errorCode.toString(16)})`,
        parsed.errorCode,
      );
    }
    return parsed.payload;
  }

  private exchange(packet: Buffer): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        this.socket.off('message', onMessage);
        this.socket.off('error', onError);
      };
      const onMessage = (message: Buffer): void => {
        cleanup();
        resolve(message);
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(error);
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(
          new BroadlinkError(
            `no response from ${this.target.host}:${this.target.port} within ${this.options.timeoutMs}ms`,
          ),
        );
      }, this.options.timeoutMs);

      this.socket.on('message', onMessage);
      this.socket.on('error', onError);
      this.socket.send(packet, this.target.port, this.target.host, (error) => {
        if (error) {
          cleanup();
          reject(error);
        }
      });
    });
  }
}
