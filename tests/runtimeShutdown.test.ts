import assert from 'node:assert/strict';
import { suite, test } from './testHarness';
import { stopWithTimeout } from '../src/runtime/stopWithTimeout';
import { registerShutdownHandlers } from '../src/runtime/shutdown';
import { createLogger } from '../src/shared/logging/logger';

type LogEntry = {
  level: 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
};

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function createTestLogger() {
  const entries: LogEntry[] = [];
  const log = {
    info: (message: string, data?: Record<string, unknown>) => {
      entries.push({ level: 'info', message, data });
    },
    warn: (message: string, data?: Record<string, unknown>) => {
      entries.push({ level: 'warn', message, data });
    },
    error: (message: string, data?: Record<string, unknown>) => {
      entries.push({ level: 'error', message, data });
    },
  };
  return { log, entries };
}

suite('stopWithTimeout', () => {
  test('logs stopped on clean shutdown', async () => {
    const { log, entries } = createTestLogger();
    const result = await stopWithTimeout('receiver', async () => {
      await delay(5);
    }, 50, log);

    assert.equal(result.kind, 'stopped');
    assert.deepEqual(
      entries.map((entry) => `${entry.level}:${entry.message}`),
      ['info:service receiver stopped'],
    );
  });

  test('logs timeout without clean stop', async () => {
    const { log, entries } = createTestLogger();
    const result = await stopWithTimeout('receiver', async () => {
      await delay(30);
    }, 5, log);

    assert.equal(result.kind, 'timeout');
    await delay(40);

    assert.deepEqual(entries, [
      { level: 'warn', message: 'service receiver stop timed out', data: { timeoutMs: 5 } },
    ]);
  });

  test('still reports a failure that arrives after the timeout', async () => {
    const { log, entries } = createTestLogger();
    const result = await stopWithTimeout('speakers', async () => {
      await delay(20);
      throw new Error('socket busy');
    }, 5, log);

    assert.equal(result.kind, 'timeout');
    await delay(40);

    assert.deepEqual(
      entries.map((entry) => `${entry.level}:${entry.message}`),
      ['warn:service speakers stop timed out', 'error:failed to stop speakers'],
    );
    assert.deepEqual(entries[1].data, { message: 'socket busy' });
  });

  test('logs errors on failure', async () => {
    const { log, entries } = createTestLogger();
    const result = await stopWithTimeout('supervisor', async () => {
      throw new Error('boom');
    }, 50, log);

    assert.equal(result.kind, 'error');
    assert.deepEqual(entries, [
      { level: 'error', message: 'failed to stop supervisor', data: { message: 'boom' } },
    ]);
  });
});

/**
 * Removes the signal listeners registered while `run` executes.
 */
async function withSignalListeners(run: () => Promise<void>): Promise<void> {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  const before = new Map(signals.map((signal) => [signal, new Set(process.listeners(signal))]));
  try {
    await run();
  } finally {
    for (const signal of signals) {
      const existing = before.get(signal) ?? new Set<NodeJS.SignalsListener>();
      process
        .listeners(signal)
        .filter((listener) => !existing.has(listener))
        .forEach((listener) => process.off(signal, listener));
    }
  }
}

suite('registerShutdownHandlers', () => {
  test('stops the runtime once and exits cleanly', async () => {
    let stops = 0;
    const exits: number[] = [];
    const runtime = {
      start: async () => undefined,
      stop: async () => {
        stops += 1;
      },
    };
    const sigint = process.listenerCount('SIGINT');

    await withSignalListeners(async () => {
      const shutdown = registerShutdownHandlers(runtime, createLogger('Test'), {
        exit: (code) => exits.push(code),
      });
      assert.equal(process.listenerCount('SIGINT'), sigint + 1);
      await Promise.all([shutdown(), shutdown()]);
    });

    assert.equal(process.listenerCount('SIGINT'), sigint);
    assert.equal(stops, 1);
    assert.deepEqual(exits, [0]);
  });

  test('forces exit when the runtime never stops', async () => {
    const exits: number[] = [];
    let release: () => void = () => undefined;
    const runtime = {
      start: async () => undefined,
      stop: () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    };

    await withSignalListeners(async () => {
      const shutdown = registerShutdownHandlers(runtime, createLogger('Test'), {
        forceExitAfterMs: 10,
        exit: (code) => exits.push(code),
      });
      const pending = shutdown();
      await delay(30);
      assert.deepEqual(exits, [1]);
      release();
      await pending;
    });

    assert.deepEqual(exits, [1, 0]);
  });
});
