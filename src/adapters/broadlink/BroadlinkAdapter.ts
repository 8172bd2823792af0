import dgram from 'node:dgram';
import { BroadlinkSession } from '@/adapters/broadlink/broadlinkSession';
import type { PowerProtocolPort, PowerSession, PowerTarget } from '@/ports/PowerProtocolPort';

export interface BroadlinkAdapterOptions {
  timeoutMs: number;
}

/**
 * Opens Broadlink sessions over an ephemeral UDP socket per device.
 */
export class BroadlinkAdapter implements PowerProtocolPort {
  public readonly name = 'broadlink';

  constructor(private readonly options: BroadlinkAdapterOptions) {}

  public async connect(target: PowerTarget): Promise<PowerSession> {
    const socket = dgram.createSocket('udp4');
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        socket.close();
        reject(error);
      };
      socket.once('error', onError);
      socket.bind(0, () => {
        socket.off('error', onError);
        resolve();
      });
    });
    return new BroadlinkSession(socket, target, { timeoutMs: this.options.timeoutMs });
  }
}
