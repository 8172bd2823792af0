export interface ReceiverStatusSource {
  /** True while the receiver is connected and runs an app session. */
  isActive(): boolean;
  /** True while the active session renders media. */
  isPlaying(): boolean;
}

/**
 * The receiver's status callbacks, narrowed to what the speaker supervisor
 * reacts to. Event payloads are not forwarded; observers re-read the status
 * from the receiver passed along.
 */
export interface ReceiverObserver {
  onMediaStatus(receiver: ReceiverStatusSource): void;
  onCastStatus(receiver: ReceiverStatusSource): void;
  onConnectionStatus(receiver: ReceiverStatusSource): void;
}

export interface ReceiverConnection extends ReceiverStatusSource {
  readonly name: string;
  /** Resolves once the connection is lost or closed. */
  closed(): Promise<void>;
  close(): Promise<void>;
}

export interface ReceiverPort {
  /** Resolves to null when no receiver with that friendly name answered. */
  connect(name: string, observer: ReceiverObserver): Promise<ReceiverConnection | null>;
}
