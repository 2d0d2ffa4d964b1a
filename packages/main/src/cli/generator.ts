#!/usr/bin/env node

import { Command } from 'commander';
import { runGenerator } from '../main';

const program = new Command();

program
  .name('pcapgen')
  .description('Write pcap fixtures and CSV ledger records for an ingestion pipeline under test')
  .version('0.1.0')
  .option('-c, --config <file>', 'INI configuration file (default: $PCAPGEN_CONFIG_PATH or ./config.ini)')
  .action(async (options: { config?: string }) => {
    const result = await runGenerator({ configPath: options.config });
    process.exitCode = result.ok ? 0 : 1;
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`pcapgen failed: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
