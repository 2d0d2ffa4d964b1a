import { tmpdir } from 'os';
import { basename, dirname, join, resolve } from 'path';
import { formatAppMessage, type GeneratorConfig, type InvalidPathKind, type MalformedKind } from '../../../shared/src';
import { logger } from '../logger';
import { FIXTURE_PREFIX, fixtureFileName, type TimeSample } from './fixtureName';
import type { FixtureFile } from './fixtureWriter';
import { FIXED_PAYLOAD_DIGEST } from './payload';

export const EXTRA_ROW_LINE = 'EXTRA,ROW,DATA';
export const GARBLED_BLOCK = 'garbled data, not, even close\nto csv format!\n';

export type RecordContext = {
  sourceDir: string;
  digest: string;
  outsideDir: string;
};

/**
 * Picks a directory whose fixture paths do not start with `sourceDir`. The check runs on
 * `<dir>/MAH11` because a sibling such as `/tmp` for `/tmp/MAH11` only collides once the
 * file name is appended. Only the lexical prefix is guaranteed; symlinks and `..`
 * handling stay the consumer's policy.
 */
export function resolveOutsideDir(sourceDir: string, preferred: string = tmpdir()): string {
  const source = resolve(sourceDir);
  const parent = dirname(source);
  const name = basename(source);
  const candidates = [
    resolve(preferred),
    join(parent, `outside-${name}`),
    // A sibling collides only when its name starts with the source's name, so these two
    // cannot both collide.
    join(parent, `_outside-${name}`),
    join(parent, `-outside-${name}`)
  ];
  const escapes = (dir: string) => !join(dir, FIXTURE_PREFIX).startsWith(source);
  return candidates.find(escapes) ?? join(parent, `-outside-${name}`);
}

export function createRecordContext(config: Pick<GeneratorConfig, 'sourceDir'>, outsidePreferred?: string): RecordContext {
  return {
    sourceDir: resolve(config.sourceDir),
    digest: FIXED_PAYLOAD_DIGEST,
    outsideDir: resolveOutsideDir(config.sourceDir, outsidePreferred)
  };
}

function csvLine(...fields: Array<string | number>): string {
  return `${fields.join(',')}\n`;
}

function plausiblePath(sample: TimeSample, ctx: RecordContext): string {
  return join(ctx.sourceDir, fixtureFileName(sample));
}

function warnUnknownKind(family: string, kind: string, fallback: string) {
  const { body } = formatAppMessage('record.unknownKind', { family, kind, fallback });
  logger.warn({ family, kind }, body);
}

/** `<epoch>,<abs_path>,<digest>` for a fixture that was written successfully. */
export function formatValidRecord(fixture: FixtureFile, digest: string): string {
  return csvLine(fixture.epochSeconds, fixture.path, digest);
}

export function formatMalformedRecord(kind: MalformedKind, sample: TimeSample, ctx: RecordContext): string {
  switch (kind) {
    case 'missing_field':
      return csvLine(sample.epochSeconds);
    case 'empty_path':
      return csvLine(sample.epochSeconds, '', ctx.digest);
    case 'extra_row':
      // Both physical lines go out in one write; the second is a stray row for the parser.
      return csvLine(sample.epochSeconds, plausiblePath(sample, ctx), ctx.digest) + `${EXTRA_ROW_LINE}\n`;
    case 'garbled':
      return GARBLED_BLOCK;
    default: {
      const unknownKind: string = kind;
      warnUnknownKind('malformed', unknownKind, 'valid');
      return csvLine(sample.epochSeconds, plausiblePath(sample, ctx), ctx.digest);
    }
  }
}

export function formatInvalidPathRecord(kind: InvalidPathKind, sample: TimeSample, ctx: RecordContext): string {
  const fileName = fixtureFileName(sample);
  switch (kind) {
    case 'relative':
      return csvLine(sample.epochSeconds, fileName, ctx.digest);
    case 'outside':
      return csvLine(sample.epochSeconds, join(ctx.outsideDir, fileName), ctx.digest);
    default: {
      const unknownKind: string = kind;
      warnUnknownKind('invalid-path', unknownKind, 'relative');
      return csvLine(sample.epochSeconds, fileName, ctx.digest);
    }
  }
}
