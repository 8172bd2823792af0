export type DaemonErrorCode = 'CONNECT_FAILED' | 'CONFIG_INVALID' | 'DEVICE_IO';

/**
 * Base class for errors raised by the daemon itself.
 */
export class DaemonError extends Error {
  constructor(
    public readonly code: DaemonErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A speaker session could not be established or authenticated, or an I/O
 * operation on an established session failed. The session is gone either way.
 */
export class ConnectError extends DaemonError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECT_FAILED', message, options);
  }
}

export class ConfigError extends DaemonError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super('CONFIG_INVALID', issues.length ? `${message}: ${issues.join('; ')}` : message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message && cause.message !== error.message) {
      return `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return String(error);
}
