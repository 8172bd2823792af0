#!/usr/bin/env node
import './paths';
import { Command } from 'commander';
import { loadEnvironment } from '@/config/environment';
import { createLogger, logManager } from '@/shared/logging/logger';
import { createRuntime } from '@/runtime/bootstrap';
import { registerShutdownHandlers } from '@/runtime/shutdown';
import { describeError } from '@/shared/errors';

type CliOptions = {
  verbose: boolean;
  jsonLogs: boolean;
};

const program = new Command();

program
  .name('castpower')
  .description('Switches speaker power plugs with the playback state of a Cast receiver')
  .argument('<config>', 'the JSON configuration file')
  .option('-v, --verbose', 'enable verbose logging (debug level)', false)
  .option('--json-logs', 'write log lines as JSON', false)
  .action(async (configPath: string, options: CliOptions) => {
    const env = loadEnvironment({
      logLevel: options.verbose ? 'debug' : 'info',
      jsonLogs: options.jsonLogs,
    });
    logManager.configure({ level: env.logLevel, json: env.jsonLogs });
    const log = createLogger('Daemon');
    log.debug('verbose mode enabled');

    const runtime = createRuntime({ configPath, env });
    await runtime.start();
    registerShutdownHandlers(runtime, log);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  const log = createLogger('Daemon');
  log.error('fatal bootstrap error', { message: describeError(error) });
  process.exit(1);
});
