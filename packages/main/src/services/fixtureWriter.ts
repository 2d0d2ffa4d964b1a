import { promises as fsp } from 'fs';
import { join, resolve } from 'path';
import { ResultAsync } from 'neverthrow';
import type { AppError } from '../../../shared/src';
import { ioError } from '../errors';
import { logger } from '../logger';
import { fixtureFileName, type TimeSample } from './fixtureName';
import { fixedPayload } from './payload';

const { mkdir, writeFile } = fsp;

export type FixtureFile = {
  path: string;
  epochSeconds: number;
  size: number;
};

/**
 * Writes the fixed payload to `<sourceDir>/MAH11-YYYYMMDD-HHMMSS.pcap`.
 *
 * The directory is created when missing. On failure nothing is returned that could be
 * turned into a ledger record, so callers cannot append a line for a file that is not there.
 */
export function writeFixture(sourceDir: string, sample: TimeSample): ResultAsync<FixtureFile, AppError> {
  const directory = resolve(sourceDir);
  const path = join(directory, fixtureFileName(sample));
  const content = fixedPayload();

  const write = async () => {
    await mkdir(directory, { recursive: true });
    await writeFile(path, content);
  };

  return ResultAsync.fromPromise(write(), (error) =>
    ioError('fixture.writeFailed', `Error creating file ${path}`, error, { path })
  ).map(() => {
    logger.info({ path, size: content.length }, `Created file: ${path}`);
    return { path, epochSeconds: sample.epochSeconds, size: content.length };
  });
}
