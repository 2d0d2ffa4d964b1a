import type { AppError, GeneratorConfig } from '../../shared/src';
import { formatAppMessage } from '../../shared/src';
import { createTtySelectorSource, type SelectorSource } from './input/selectorSource';
import { applyConfiguredLogLevel, logger } from './logger';
import { getConfigPath, loadGeneratorConfig } from './services/config';
import { prepareDirectories } from './services/directories';
import { renderMenu, runDispatchLoop, type DispatchSummary } from './services/dispatch';
import type { Clock } from './services/fixtureName';
import { createLedger } from './services/ledger';

export type GeneratorRunOptions = {
  configPath?: string;
  cwd?: string;
  /** Defaults to single keystrokes from stdin. */
  source?: SelectorSource;
  output?: NodeJS.WritableStream;
  clock?: Clock;
};

export type GeneratorRunResult =
  | { ok: true; config: GeneratorConfig; summary: DispatchSummary }
  | { ok: false; error: AppError };

function fatal(error: AppError): GeneratorRunResult {
  logger.fatal({ err: error, code: error.code }, error.message);
  return { ok: false, error };
}

/**
 * Startup then the control loop. Config, directory and terminal problems are fatal and
 * stop here before any selector is read.
 */
export async function runGenerator(options: GeneratorRunOptions = {}): Promise<GeneratorRunResult> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = getConfigPath(options.configPath, cwd);
  logger.info({ file: configPath }, `Attempting to load configuration from: ${configPath}`);

  const loaded = loadGeneratorConfig(configPath, cwd);
  if (loaded.isErr()) return fatal(loaded.error);
  const config = loaded.value;
  applyConfiguredLogLevel(config.logLevel);

  const prepared = await prepareDirectories(config);
  if (prepared.isErr()) return fatal(prepared.error);

  let source = options.source;
  if (!source) {
    const tty = createTtySelectorSource();
    if (tty.isErr()) return fatal(tty.error);
    source = tty.value;
  }

  const started = formatAppMessage('generator.started', { sourceDir: config.sourceDir, ledgerFile: config.ledgerFile });
  logger.info({ sourceDir: config.sourceDir, ledgerFile: config.ledgerFile }, started.body);
  (options.output ?? process.stdout).write(`\n${renderMenu(config)}\n`);

  try {
    const summary = await runDispatchLoop(source, { config, ledger: createLedger(config.ledgerFile), clock: options.clock });
    return { ok: true, config, summary };
  } finally {
    source.close();
  }
}
