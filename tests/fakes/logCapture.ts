import { Writable } from 'node:stream';
import { logManager } from '../../src/shared/logging/logger';

export type LogCapture = {
  lines: string[];
  restore: () => void;
};

/**
 * Routes every logger into an in-memory list until `restore()`.
 */
export function captureLogs(): LogCapture {
  const lines: string[] = [];
  const sink = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(...String(chunk).split('\n').filter((line) => line.length > 0));
      callback();
    },
  });
  const previousLevel = logManager.getLevel();
  logManager.configure({ level: 'debug', json: true, stdout: sink, stderr: sink });
  return {
    lines,
    restore: () => {
      logManager.configure({
        level: previousLevel,
        json: false,
        stdout: process.stdout,
        stderr: process.stderr,
      });
    },
  };
}

export type CapturedEntry = {
  level: string;
  scopes: string[];
  message: string;
  context: Record<string, unknown>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function parseEntry(line: string): CapturedEntry {
  const value: unknown = JSON.parse(line);
  if (!isRecord(value)) {
    throw new Error(`not a log entry: ${line}`);
  }
  return {
    level: String(value.level),
    scopes: Array.isArray(value.scopes) ? value.scopes.map(String) : [],
    message: String(value.message),
    context: isRecord(value.context) ? value.context : {},
  };
}

export function parseEntries(lines: string[]): CapturedEntry[] {
  return lines.map(parseEntry);
}
