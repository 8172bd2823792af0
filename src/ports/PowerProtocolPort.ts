/**
 * Addressing data a power-switching device needs to open a session.
 */
export interface PowerTarget {
  name: string;
  host: string;
  port: number;
  mac: Buffer;
  devtype: number;
}

/**
 * One live session with a power-switching device. Every method rejects on
 * I/O failure; callers treat the session as dead after any rejection.
 */
export interface PowerSession {
  authenticate(): Promise<void>;
  queryPower(): Promise<boolean>;
  setPower(on: boolean): Promise<void>;
  close(): Promise<void>;
}

export interface PowerProtocolPort {
  readonly name: string;
  connect(target: PowerTarget): Promise<PowerSession>;
}
