export interface HostPort {
  host: string;
  port: number;
}

/**
 * Splits `host:port` (or `[v6]:port`). Returns null when either half is
 * missing or the port is outside 1-65535.
 */
export function parseHostPort(value: string): HostPort | null {
  const trimmed = value.trim();
  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(trimmed);
  let host: string;
  let portText: string;
  if (bracketed) {
    host = bracketed[1];
    portText = bracketed[2];
  } else {
    const separator = trimmed.lastIndexOf(':');
    if (separator <= 0) {
      return null;
    }
    host = trimmed.slice(0, separator);
    portText = trimmed.slice(separator + 1);
    if (host.includes(':')) {
      return null;
    }
  }
  if (!/^\d+$/.test(portText)) {
    return null;
  }
  const port = Number(portText);
  if (port < 1 || port > 65535) {
    return null;
  }
  return { host, port };
}
