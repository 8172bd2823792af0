import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import { suite, test } from './testHarness';
import {
  GoogleCastReceiverConnection,
  type CastClient,
  type CastMediaStatus,
} from '../src/adapters/googleCast/GoogleCastReceiverAdapter';
import {
  toDescriptor,
  type GoogleCastDeviceDescriptor,
} from '../src/adapters/googleCast/googleCastDiscovery';
import type { ReceiverObserver, ReceiverStatusSource } from '../src/ports/ReceiverPort';

const BACKDROP_APP = 'E8C28D3C';
const MEDIA_APP = 'CC1AD845';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

async function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await delay(2);
  }
}

const activeTimers = (): number =>
  process.getActiveResourcesInfo().filter((resource) => resource === 'Timeout').length;

class FakeCastClient implements CastClient {
  public appId: string | undefined = undefined;
  public mediaStatus: CastMediaStatus | null = null;
  public disconnects = 0;
  /** Runs while the initial media status is being read. */
  public duringStatusRead: () => void = () => undefined;
  private readonly events = new EventEmitter();

  public onMediaStatus(listener: (status: CastMediaStatus) => void): void {
    this.events.on('mediaStatusModel', listener);
  }

  public onDisconnected(listener: (error?: Error) => void): void {
    this.events.on('disconnected', listener);
  }

  public onError(listener: (error: Error) => void): void {
    this.events.on('error', listener);
  }

  public sessionAppId(): unknown {
    return this.appId;
  }

  public async readMediaStatus(): Promise<CastMediaStatus | null> {
    this.duringStatusRead();
    return this.mediaStatus;
  }

  public async disconnect(): Promise<void> {
    this.disconnects += 1;
  }

  public emitMedia(playing: boolean): void {
    this.events.emit('mediaStatusModel', { playing, playerState: playing ? 'PLAYING' : 'PAUSED' });
  }

  public emitDisconnected(): void {
    this.events.emit('disconnected');
  }

  public emitError(message: string): void {
    this.events.emit('error', new Error(message));
  }
}

type Notification = {
  kind: 'media' | 'cast' | 'connection';
  active: boolean;
  playing: boolean;
};

class RecordingObserver implements ReceiverObserver {
  public readonly seen: Notification[] = [];

  public onMediaStatus(receiver: ReceiverStatusSource): void {
    this.record('media', receiver);
  }

  public onCastStatus(receiver: ReceiverStatusSource): void {
    this.record('cast', receiver);
  }

  public onConnectionStatus(receiver: ReceiverStatusSource): void {
    this.record('connection', receiver);
  }

  private record(kind: Notification['kind'], receiver: ReceiverStatusSource): void {
    this.seen.push({ kind, active: receiver.isActive(), playing: receiver.isPlaying() });
  }
}

const livingRoom: GoogleCastDeviceDescriptor = {
  id: 'living-room',
  name: 'Living Room',
  host: 'living-room.local',
  address: '192.0.2.30',
  port: 8009,
};

function openConnection(client: FakeCastClient, sessionPollMs = 5) {
  const observer = new RecordingObserver();
  const connection = new GoogleCastReceiverConnection(livingRoom, client, observer, sessionPollMs);
  return { observer, connection };
}

suite('GoogleCastReceiverConnection', () => {
  test('reports the running session and media state once opened', async () => {
    const client = new FakeCastClient();
    client.appId = MEDIA_APP;
    client.mediaStatus = { playing: true, playerState: 'PLAYING' };
    const { observer, connection } = openConnection(client);

    await connection.initialize();
    try {
      assert.equal(connection.name, 'Living Room');
      assert.deepEqual(observer.seen, [{ kind: 'connection', active: true, playing: true }]);

      client.emitMedia(false);
      assert.deepEqual(observer.seen[1], { kind: 'media', active: true, playing: false });
    } finally {
      await connection.close();
    }
  });

  test('the ambient backdrop counts as no session', async () => {
    const client = new FakeCastClient();
    client.appId = BACKDROP_APP;
    const { observer, connection } = openConnection(client);

    await connection.initialize();
    try {
      client.emitMedia(true);
      assert.equal(connection.isActive(), false);
      assert.equal(connection.isPlaying(), false);
      assert.deepEqual(observer.seen[1], { kind: 'media', active: false, playing: false });
    } finally {
      await connection.close();
    }
  });

  test('app session changes are picked up by polling', async () => {
    const client = new FakeCastClient();
    client.appId = BACKDROP_APP;
    const { observer, connection } = openConnection(client);

    await connection.initialize();
    try {
      client.appId = MEDIA_APP;
      await waitFor(() => observer.seen.some((entry) => entry.kind === 'cast'));
      assert.deepEqual(observer.seen[1], { kind: 'cast', active: true, playing: false });
      assert.equal(connection.isActive(), true);

      client.emitMedia(true);
      client.appId = '';
      await waitFor(() => observer.seen.filter((entry) => entry.kind === 'cast').length === 2);
      assert.equal(connection.isActive(), false);
      assert.equal(connection.isPlaying(), false);
    } finally {
      await connection.close();
    }
  });

  test('a dropped connection reports inactive and resolves closed()', async () => {
    const client = new FakeCastClient();
    client.appId = MEDIA_APP;
    const { observer, connection } = openConnection(client);
    await connection.initialize();

    client.emitDisconnected();
    await connection.closed();

    assert.equal(connection.isActive(), false);
    assert.deepEqual(observer.seen[observer.seen.length - 1], {
      kind: 'connection',
      active: false,
      playing: false,
    });
    assert.equal(client.disconnects, 1);
  });

  test('after a client error the old client is released and its events are ignored', async () => {
    const client = new FakeCastClient();
    client.appId = MEDIA_APP;
    const { observer, connection } = openConnection(client);
    await connection.initialize();

    client.emitError('socket reset');
    await connection.closed();
    assert.equal(client.disconnects, 1);
    const seenAtClose = observer.seen.length;

    client.emitMedia(true);
    client.emitError('socket reset');
    client.emitDisconnected();
    await delay(20);

    assert.equal(observer.seen.length, seenAtClose);
    assert.equal(client.disconnects, 1);
    assert.equal(connection.isPlaying(), false);
  });

  test('close disconnects the client once', async () => {
    const client = new FakeCastClient();
    client.appId = MEDIA_APP;
    const { observer, connection } = openConnection(client);
    await connection.initialize();

    await connection.close();
    client.emitDisconnected();
    await connection.close();

    assert.equal(client.disconnects, 1);
    assert.deepEqual(
      observer.seen.map((entry) => entry.kind),
      ['connection', 'connection'],
    );
  });

  test('a connection lost while opening leaves no session poll running', async () => {
    const before = activeTimers();

    const healthy = openConnection(new FakeCastClient(), 60_000);
    await healthy.connection.initialize();
    assert.equal(activeTimers(), before + 1);
    await healthy.connection.close();
    assert.equal(activeTimers(), before);

    const client = new FakeCastClient();
    client.appId = MEDIA_APP;
    client.duringStatusRead = () => client.emitDisconnected();
    const { observer, connection } = openConnection(client, 60_000);

    await connection.initialize();

    assert.equal(activeTimers(), before);
    assert.equal(connection.isActive(), false);
    assert.deepEqual(observer.seen, [{ kind: 'connection', active: false, playing: false }]);
    await connection.closed();
  });
});

suite('toDescriptor', () => {
  test('prefers TXT names and ids and an IPv4 address', () => {
    const descriptor = toDescriptor({
      name: 'Chromecast-abc123',
      host: 'abc123.local.',
      port: 8010,
      addresses: ['fe80::1', '192.0.2.31'],
      txt: { fn: ' Living Room ', id: 'abc123' },
    });

    assert.deepEqual(descriptor, {
      id: 'abc123',
      name: 'Living Room',
      host: 'abc123.local',
      address: '192.0.2.31',
      port: 8010,
    });
  });

  test('falls back to the service name, a host-port id and the default port', () => {
    const descriptor = toDescriptor({
      name: 'Kitchen speaker',
      fqdn: 'kitchen._googlecast._tcp.local.',
      port: 0,
      referer: { address: '192.0.2.32' },
      txt: { fn: '   ', id: Buffer.from('') },
    });

    assert.deepEqual(descriptor, {
      id: 'kitchen._googlecast._tcp.local-8009',
      name: 'Kitchen speaker',
      host: 'kitchen._googlecast._tcp.local',
      address: '192.0.2.32',
      port: 8009,
    });
  });

  test('reads TXT values delivered as buffers', () => {
    const descriptor = toDescriptor({
      name: 'Chromecast-def456',
      txt: { fn: Buffer.from('Office'), id: Buffer.from('def456') },
    });

    assert.equal(descriptor.name, 'Office');
    assert.equal(descriptor.id, 'def456');
    assert.equal(descriptor.host, 'Chromecast-def456');
    assert.equal(descriptor.address, undefined);
    assert.equal(descriptor.port, 8009);
  });
});
