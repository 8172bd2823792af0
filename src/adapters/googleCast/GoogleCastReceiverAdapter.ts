import type { CastDevice, MediaStatusModel } from '@lox-audioserver/node-googlecast';
import {
  findGoogleCastReceiver,
  type GoogleCastDeviceDescriptor,
} from '@/adapters/googleCast/googleCastDiscovery';
import { loadGoogleCastModule } from '@/adapters/googleCast/googlecastLoader';
import type {
  ReceiverConnection,
  ReceiverObserver,
  ReceiverPort,
} from '@/ports/ReceiverPort';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

/** Apps that run while nothing has been cast (the ambient/backdrop screen). */
const IDLE_APP_IDS = new Set(['E8C28D3C']);
const DEFAULT_SESSION_POLL_MS = 1000;

export interface GoogleCastReceiverOptions {
  discoveryTimeoutMs: number;
  sessionPollMs?: number;
}

export interface CastMediaStatus {
  playing: boolean;
  playerState?: string;
}

/**
 * The slice of a Cast client a receiver connection listens to and drives.
 */
export interface CastClient {
  onMediaStatus(listener: (status: CastMediaStatus) => void): void;
  onDisconnected(listener: (error?: Error) => void): void;
  onError(listener: (error: Error) => void): void;
  /** App id of the running session as reported by the client, if any. */
  sessionAppId(): unknown;
  readMediaStatus(): Promise<CastMediaStatus | null>;
  disconnect(): Promise<void>;
}

function toMediaStatus(status: MediaStatusModel): CastMediaStatus {
  return {
    playing: Boolean(status.playerIsPlaying),
    playerState: typeof status.playerState === 'string' ? status.playerState : undefined,
  };
}

export function castClientFor(device: CastDevice): CastClient {
  return {
    onMediaStatus: (listener) => {
      device.on('mediaStatusModel', (status: MediaStatusModel) => {
        if (status) listener(toMediaStatus(status));
      });
    },
    onDisconnected: (listener) => {
      device.on('disconnected', (err?: Error) => listener(err));
    },
    onError: (listener) => {
      device.on('error', (err: Error) => listener(err));
    },
    sessionAppId: () => device.getSession()?.appId,
    readMediaStatus: async () => {
      const status = await device.media.getStatusModel();
      return status ? toMediaStatus(status) : null;
    },
    disconnect: async () => {
      await device.disconnect();
    },
  };
}

export class GoogleCastReceiverAdapter implements ReceiverPort {
  private readonly log = createLogger('Receiver', 'GoogleCast');

  constructor(private readonly options: GoogleCastReceiverOptions) {}

  public async connect(name: string, observer: ReceiverObserver): Promise<ReceiverConnection | null> {
    const descriptor = await findGoogleCastReceiver(name, this.options.discoveryTimeoutMs);
    if (!descriptor) {
      return null;
    }
    const { connect } = await loadGoogleCastModule();
    const device = await connect({
      id: descriptor.id,
      name: descriptor.name,
      host: descriptor.address ?? descriptor.host,
      port: descriptor.port,
      lastSeen: Date.now(),
    });
    const connection = new GoogleCastReceiverConnection(
      descriptor,
      castClientFor(device),
      observer,
      this.options.sessionPollMs ?? DEFAULT_SESSION_POLL_MS,
      this.log,
    );
    await connection.initialize();
    return connection;
  }
}

/**
 * Live Cast connection that reports media, app-session and connection
 * changes to the observer. App sessions have no push event on the client, so
 * they are polled.
 *
 * Once closed, by either side, the client is disconnected and anything it
 * still emits is ignored; a reconnect always gets a new connection.
 */
export class GoogleCastReceiverConnection implements ReceiverConnection {
  private connected = true;
  private playing = false;
  private appId: string | null = null;
  private pollTimer: NodeJS.Timeout | null = null;
  private resolveClosed: () => void = () => undefined;
  private readonly closedPromise = new Promise<void>((resolve) => {
    this.resolveClosed = resolve;
  });

  constructor(
    private readonly descriptor: GoogleCastDeviceDescriptor,
    private readonly client: CastClient,
    private readonly observer: ReceiverObserver,
    private readonly sessionPollMs: number = DEFAULT_SESSION_POLL_MS,
    private readonly log: ComponentLogger = createLogger('Receiver', 'GoogleCast'),
  ) {}

  public get name(): string {
    return this.descriptor.name;
  }

  public isActive(): boolean {
    return this.connected && this.appId !== null && !IDLE_APP_IDS.has(this.appId);
  }

  public isPlaying(): boolean {
    return this.isActive() && this.playing;
  }

  public closed(): Promise<void> {
    return this.closedPromise;
  }

  public async initialize(): Promise<void> {
    this.client.onMediaStatus((status) => this.handleMediaStatus(status));
    this.client.onDisconnected((err) => {
      if (!this.connected) return;
      this.log.warn('receiver disconnected', { receiver: this.name, message: err?.message });
      void this.markClosed();
    });
    this.client.onError((err) => {
      if (!this.connected) return;
      this.log.warn('receiver client error', { receiver: this.name, message: err?.message });
      void this.markClosed();
    });

    this.appId = this.readAppId();
    const status = await bestEffort(() => this.client.readMediaStatus(), {
      fallback: null,
      onError: 'debug',
      log: this.log,
      label: 'initial media status unavailable',
      context: { receiver: this.name },
    });
    if (!this.connected) {
      return;
    }
    if (status) {
      this.playing = status.playing;
    }
    this.pollTimer = setInterval(() => this.pollSession(), this.sessionPollMs);
    this.log.info('receiver session opened', {
      receiver: this.name,
      host: this.descriptor.address ?? this.descriptor.host,
      appId: this.appId,
    });
    this.observer.onConnectionStatus(this);
  }

  public close(): Promise<void> {
    return this.markClosed();
  }

  private handleMediaStatus(status: CastMediaStatus): void {
    if (!this.connected) return;
    this.playing = status.playing;
    this.log.debug('media status', { receiver: this.name, state: status.playerState });
    this.observer.onMediaStatus(this);
  }

  private pollSession(): void {
    if (!this.connected) return;
    const appId = this.readAppId();
    if (appId === this.appId) {
      return;
    }
    this.log.debug('cast session changed', { receiver: this.name, from: this.appId, to: appId });
    this.appId = appId;
    if (appId === null || IDLE_APP_IDS.has(appId)) {
      this.playing = false;
    }
    this.observer.onCastStatus(this);
  }

  private readAppId(): string | null {
    const appId = this.client.sessionAppId();
    return typeof appId === 'string' && appId.length > 0 ? appId : null;
  }

  private markClosed(): Promise<void> {
    if (!this.connected) {
      return Promise.resolve();
    }
    this.connected = false;
    this.playing = false;
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    const disconnected = bestEffort(() => this.client.disconnect(), {
      fallback: undefined,
      onError: 'debug',
      log: this.log,
      label: 'cast client close failed',
      context: { receiver: this.name },
    });
    this.resolveClosed();
    this.observer.onConnectionStatus(this);
    return disconnected;
  }
}
