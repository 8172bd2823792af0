import Bonjour from 'bonjour-service';
import { bestEffortSync } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

export interface GoogleCastDeviceDescriptor {
  id: string;
  name: string;
  host: string;
  address?: string;
  port: number;
}

export interface GoogleCastDiscoveryOptions {
  timeoutMs: number;
  /** Stops browsing as soon as a device with this friendly name shows up. */
  stopOnName?: string;
}

type BonjourService = Parameters<NonNullable<Parameters<Bonjour['find']>[1]>>[0];

/** The fields of an mDNS service record a descriptor is built from. */
export interface CastServiceRecord {
  name: string;
  host?: string;
  fqdn?: string;
  port?: number;
  addresses?: string[];
  referer?: { address: string };
  txt?: unknown;
}

const log = createLogger('Receiver', 'Discovery');

const normalizeHost = (value: string | undefined): string | undefined =>
  value ? value.replace(/\.$/, '') : undefined;

const normalizeName = (value: string): string => value.trim().toLowerCase();

function readTxt(service: CastServiceRecord): Record<string, unknown> {
  const txt: unknown = service.txt;
  return typeof txt === 'object' && txt !== null ? { ...txt } : {};
}

function readTxtString(txt: Record<string, unknown>, key: string): string | undefined {
  const value = txt[key];
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8').trim() || undefined;
  }
  return undefined;
}

export function toDescriptor(service: CastServiceRecord): GoogleCastDeviceDescriptor {
  const addresses = Array.isArray(service.addresses) ? service.addresses : [];
  const address =
    addresses.find((candidate) => candidate.includes('.')) ??
    addresses[0] ??
    service.referer?.address;
  const txt = readTxt(service);
  const port = typeof service.port === 'number' && service.port > 0 ? service.port : 8009;
  const host =
    normalizeHost(service.host) ?? normalizeHost(service.fqdn) ?? address ?? service.name;
  const name = readTxtString(txt, 'fn') ?? service.name ?? host;
  const id = readTxtString(txt, 'id') ?? `${host}-${port}`;
  return { id, name, host, address, port };
}

/**
 * Browses `_googlecast._tcp` for up to `timeoutMs` and returns every device
 * seen, sorted by name.
 */
export async function discoverGoogleCastDevices(
  options: GoogleCastDiscoveryOptions,
): Promise<GoogleCastDeviceDescriptor[]> {
  const bonjour = new Bonjour();
  const devices = new Map<string, GoogleCastDeviceDescriptor>();
  const wanted = options.stopOnName ? normalizeName(options.stopOnName) : null;

  return new Promise<GoogleCastDeviceDescriptor[]>((resolve) => {
    let browser: ReturnType<Bonjour['find']> | null = null;
    let finished = false;

    const finish = (): void => {
      if (finished) return;
      finished = true;
      clearTimeout(timer);
      bestEffortSync(() => browser?.stop(), {
        fallback: undefined,
        onError: 'debug',
        log,
        label: 'cast browser stop failed',
      });
      bestEffortSync(() => bonjour.destroy(), {
        fallback: undefined,
        onError: 'debug',
        log,
        label: 'bonjour shutdown failed',
      });
      resolve(Array.from(devices.values()).sort((a, b) => a.name.localeCompare(b.name)));
    };

    const timer = setTimeout(finish, Math.max(500, options.timeoutMs));

    const handle = (service: BonjourService): void => {
      const descriptor = toDescriptor(service);
      log.debug('cast device seen', {
        id: descriptor.id,
        name: descriptor.name,
        host: descriptor.host,
        address: descriptor.address,
        port: descriptor.port,
      });
      const existing = devices.get(descriptor.id);
      if (!existing || (!existing.address && descriptor.address)) {
        devices.set(descriptor.id, descriptor);
      }
      if (wanted && normalizeName(descriptor.name) === wanted) {
        finish();
      }
    };

    try {
      browser = bonjour.find({ type: 'googlecast', protocol: 'tcp' }, handle);
      browser.start();
    } catch (error) {
      log.warn('cast discovery failed to start', {
        message: error instanceof Error ? error.message : String(error),
      });
      finish();
    }
  });
}

/**
 * Looks up the receiver advertising `name` (case-insensitive).
 */
export async function findGoogleCastReceiver(
  name: string,
  timeoutMs: number,
): Promise<GoogleCastDeviceDescriptor | null> {
  const devices = await discoverGoogleCastDevices({ timeoutMs, stopOnName: name });
  const match = devices.find((device) => normalizeName(device.name) === normalizeName(name));
  if (!match) {
    log.debug('receiver not among discovered devices', {
      receiver: name,
      seen: devices.map((device) => device.name),
    });
    return null;
  }
  return match;
}
