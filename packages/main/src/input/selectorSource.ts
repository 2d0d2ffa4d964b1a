import { err, ok, type Result } from 'neverthrow';
import type { AppError } from '../../../shared/src';
import { createAppError } from '../errors';

/**
 * Where the dispatch loop gets its selectors from. `next()` settles only once a
 * selector is available, and with `null` when no more will come.
 */
export interface SelectorSource {
  next(): Promise<string | null>;
  close(): void;
}

export function createScriptedSelectorSource(keys: Iterable<string>): SelectorSource {
  const queue = [...keys];
  let closed = false;
  return {
    async next() {
      if (closed) return null;
      return queue.shift() ?? null;
    },
    close() {
      closed = true;
      queue.length = 0;
    }
  };
}

/** The slice of a TTY read stream the keystroke source touches. `process.stdin` fits it. */
export interface KeystrokeInput {
  readonly isTTY?: boolean;
  readonly readableEnded: boolean;
  setRawMode(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data' | 'end', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data' | 'end', listener: (chunk: Buffer | string) => void): unknown;
}

/**
 * One keystroke per `next()` from a terminal. Raw mode is held only while a key is
 * awaited, so whatever the action prints afterwards goes out on a cooked terminal.
 */
export function createTtySelectorSource(input: KeystrokeInput = process.stdin): Result<SelectorSource, AppError> {
  if (!input.isTTY) {
    return err(createAppError('input.notTty', 'Single-keystroke input needs an interactive terminal on stdin.'));
  }

  let closed = false;
  let cancel: (() => void) | null = null;
  // Keys that arrived in the same chunk as an earlier one, e.g. a paste.
  const pending: string[] = [];

  const source: SelectorSource = {
    next() {
      if (closed) return Promise.resolve(null);
      const buffered = pending.shift();
      if (buffered !== undefined) return Promise.resolve(buffered);
      if (input.readableEnded) return Promise.resolve(null);
      return new Promise<string | null>((resolve) => {
        const finish = (value: string | null) => {
          input.off('data', onData);
          input.off('end', onEnd);
          cancel = null;
          input.setRawMode(false);
          input.pause();
          resolve(value);
        };
        const onData = (chunk: Buffer | string) => {
          const [first = '', ...rest] = Array.from(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
          pending.push(...rest);
          finish(first);
        };
        const onEnd = () => finish(null);

        cancel = () => finish(null);
        input.on('data', onData);
        input.on('end', onEnd);
        input.setRawMode(true);
        input.resume();
      });
    },
    close() {
      closed = true;
      pending.length = 0;
      cancel?.();
    }
  };
  return ok(source);
}
