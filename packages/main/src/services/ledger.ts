import { promises as fsp } from 'fs';
import { okAsync, ResultAsync } from 'neverthrow';
import type { AppError } from '../../../shared/src';
import { ioError } from '../errors';
import { logger } from '../logger';

const { appendFile, readFile, writeFile } = fsp;

export interface Ledger {
  readonly path: string;
  /** One call per requested action; multi-line blocks go out as a single write. */
  append(text: string): ResultAsync<void, AppError>;
  /** Cuts the file to zero length in place; the directory entry is kept. */
  truncate(): ResultAsync<void, AppError>;
  read(): ResultAsync<string, AppError>;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function createLedger(path: string): Ledger {
  return {
    path,

    append(text: string) {
      if (!text) return okAsync<void, AppError>(undefined);
      return ResultAsync.fromPromise(appendFile(path, text, 'utf8'), (error) =>
        ioError('ledger.appendFailed', `Error appending to CSV file ${path}`, error, { path })
      ).map(() => {
        logger.debug({ path, bytes: Buffer.byteLength(text, 'utf8') }, 'Ledger append complete');
      });
    },

    truncate() {
      return ResultAsync.fromPromise(writeFile(path, '', { encoding: 'utf8', flag: 'w' }), (error) =>
        ioError('ledger.truncateFailed', `Error truncating CSV file ${path}`, error, { path })
      ).map(() => {
        logger.debug({ path }, 'Ledger truncated');
      });
    },

    read() {
      const load = async () => {
        try {
          return await readFile(path, 'utf8');
        } catch (error) {
          if (isMissing(error)) return '';
          throw error;
        }
      };
      return ResultAsync.fromPromise(load(), (error) =>
        ioError('ledger.readFailed', `Error reading CSV file ${path}`, error, { path })
      );
    }
  };
}

/** Physical line count; a trailing newline does not open a new line. */
export function countLedgerLines(text: string): number {
  if (!text) return 0;
  const lines = text.split('\n');
  return text.endsWith('\n') ? lines.length - 1 : lines.length;
}
