#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import {
  DEFAULT_DELAY_EVERY,
  DEFAULT_DELAY_MS,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_ROUTE,
  startMockUploadServer
} from '../mockUpload/server';

function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) throw new InvalidArgumentError('Expected a non-negative integer.');
  return parsed;
}

const program = new Command();

program
  .name('pcapgen-mock-upload')
  .description('Mock upload endpoint that accepts every file and stalls every n-th request')
  .version('0.1.0')
  .option('--host <host>', 'Interface to bind', DEFAULT_HOST)
  .option('--port <port>', 'Port to listen on', parseNonNegativeInt, DEFAULT_PORT)
  .option('--route <path>', 'POST route accepting uploads', DEFAULT_ROUTE)
  .option('--delay-every <n>', 'Hold back every n-th request', parseNonNegativeInt, DEFAULT_DELAY_EVERY)
  .option('--delay-ms <ms>', 'How long a held request waits', parseNonNegativeInt, DEFAULT_DELAY_MS)
  .action(async (options: { host: string; port: number; route: string; delayEvery: number; delayMs: number }) => {
    await startMockUploadServer({
      host: options.host,
      port: options.port,
      routePath: options.route,
      delayEvery: options.delayEvery,
      delayMs: options.delayMs
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`Failed to start mock upload endpoint: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
