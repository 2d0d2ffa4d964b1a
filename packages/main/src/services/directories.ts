import { promises as fsp } from 'fs';
import { ResultAsync } from 'neverthrow';
import type { AppError, GeneratorConfig } from '../../../shared/src';
import { ioError } from '../errors';
import { logger } from '../logger';

const { access, mkdir } = fsp;

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dir: string): Promise<void> {
  try {
    await access(dir);
  } catch {
    await mkdir(dir, { recursive: true });
    logger.info({ dir }, 'Created directory');
  }
}

/** Source and ledger folders must exist before the control loop starts. */
export function prepareDirectories(config: GeneratorConfig): ResultAsync<void, AppError> {
  const targets = [config.sourceDir, config.ledgerDir];
  const ensureAll = async () => {
    for (const dir of targets) {
      await ensureDir(dir);
    }
  };
  return ResultAsync.fromPromise(ensureAll(), (error) =>
    ioError('directories.prepareFailed', 'Failed to create necessary directories', error, { directories: targets })
  ).map(() => {
    logger.debug({ directories: targets }, 'Directories ensured');
  });
}
