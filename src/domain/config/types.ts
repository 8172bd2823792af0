/**
 * Validated daemon configuration. Built once at startup and never mutated.
 */
export interface DaemonConfig {
  receiver: ReceiverConfig;
  speakers: SpeakerConfig[];
  timing: TimingConfig;
}

export interface ReceiverConfig {
  /** Friendly name the Cast receiver advertises. */
  name: string;
}

export interface SpeakerConfig {
  name: string;
  host: string;
  port: number;
  /** Six-byte hardware address. */
  mac: Buffer;
  /** Broadlink device type discriminator. */
  devtype: number;
}

export interface TimingConfig {
  pollIntervalMs: number;
  gracePeriodMs: number;
}
