import { createWriteStream, existsSync, mkdirSync, readdirSync, unlinkSync, type WriteStream } from 'fs';
import { join } from 'path';
import { Writable } from 'stream';
import pino, { multistream, type Level, type StreamEntry } from 'pino';
import type { LogLevelName } from '../../shared/src';

const FALLBACK_LOG_DIR = join(process.cwd(), 'logs');
const DEFAULT_RETENTION_DAYS = 14;
const DEFAULT_PROC = 'Generator';

function resolveLogDirectory(): string {
  const envDir = process.env.PCAPGEN_LOG_DIR?.trim();
  return envDir ? envDir : FALLBACK_LOG_DIR;
}

function resolveRetentionDays(): number {
  const fromEnv = Number.parseInt(process.env.PCAPGEN_LOG_RETENTION ?? '', 10);
  if (Number.isFinite(fromEnv) && fromEnv > 0) return fromEnv;
  return DEFAULT_RETENTION_DAYS;
}

const logDir = resolveLogDirectory();
if (!existsSync(logDir)) {
  mkdirSync(logDir, { recursive: true });
}

const retentionDays = resolveRetentionDays();
const VALID_LEVELS: readonly Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function isLevel(value: string): value is Level {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

function envLogLevel(): Level | null {
  const requested = (process.env.LOG_LEVEL ?? '').toLowerCase();
  return isLevel(requested) ? requested : null;
}

const CONFIG_LEVELS: Record<LogLevelName, Level> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal'
};

export function toPinoLevel(name: LogLevelName): Level {
  return CONFIG_LEVELS[name];
}

const LEVEL_LABELS: Record<number, string> = {
  10: 'TRACE',
  20: 'DEBUG',
  30: 'INFO',
  40: 'WARN',
  50: 'ERROR',
  60: 'FATAL'
};

type LogEntry = {
  time?: number;
  level?: number;
  msg?: string;
  err?: { message?: string } | unknown;
  proc?: string;
  [key: string]: unknown;
};

function errorSuffix(err: unknown): string {
  if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
    return ` - ${err.message}`;
  }
  return '';
}

/** Renders one pino JSON record as `LEVEL Proc | HH:MM:SS DD Mon | message`. */
export function formatLogLine(entry: LogEntry): string {
  const date = new Date(typeof entry.time === 'number' ? entry.time : Date.now());
  const hhmmss = date.toLocaleTimeString('en-GB', { hour12: false });
  const day = String(date.getDate()).padStart(2, '0');
  const mon = date.toLocaleString('en-GB', { month: 'short' });
  const levelLabel = typeof entry.level === 'number' ? (LEVEL_LABELS[entry.level] ?? 'INFO') : 'INFO';
  const proc = typeof entry.proc === 'string' ? entry.proc : DEFAULT_PROC;
  return `${levelLabel} ${proc} | ${hhmmss} ${day} ${mon} | ${entry.msg ?? ''}${errorSuffix(entry.err)}`;
}

function parseEntry(buffer: Buffer): LogEntry | null {
  try {
    const parsed: unknown = JSON.parse(buffer.toString('utf8'));
    return parsed && typeof parsed === 'object' ? (parsed as LogEntry) : null;
  } catch {
    return null;
  }
}

function toBuffer(chunk: Buffer | string, encoding: BufferEncoding): Buffer {
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, encoding);
}

class RotatingFileStream extends Writable {
  private currentDate: string | null = null;
  private stream: WriteStream | null = null;
  private cleanupScheduled = false;

  constructor(private readonly directory: string, private readonly retention: number) {
    super();
  }

  private formatDateKey(epochMs: number) {
    const date = new Date(epochMs);
    const yyyy = date.getFullYear();
    const mm = String(date.getMonth() + 1).padStart(2, '0');
    const dd = String(date.getDate()).padStart(2, '0');
    return `${yyyy}-${mm}-${dd}`;
  }

  private scheduleCleanup() {
    if (this.cleanupScheduled) return;
    this.cleanupScheduled = true;
    const timer = setTimeout(() => {
      this.cleanupScheduled = false;
      try {
        const entries = readdirSync(this.directory)
          .filter((name) => name.endsWith('.log'))
          .sort();
        const allowed = Math.max(this.retention, 1);
        for (const file of entries.slice(0, Math.max(entries.length - allowed, 0))) {
          try {
            unlinkSync(join(this.directory, file));
          } catch (err) {
            process.stderr.write(`logger: failed to prune log file ${file}${errorSuffix(err)}\n`);
          }
        }
      } catch (err) {
        process.stderr.write(`logger: failed to enumerate log directory${errorSuffix(err)}\n`);
      }
    }, 1_000);
    timer.unref();
  }

  private rotateIfNeeded(dateKey: string) {
    if (this.currentDate === dateKey && this.stream) return;
    this.stream?.end();
    const target = createWriteStream(join(this.directory, `${dateKey}.log`), { flags: 'a' });
    target.on('error', (err) => {
      process.stderr.write(`logger: file stream error; reopening on next write${errorSuffix(err)}\n`);
      this.stream = null;
    });
    this.stream = target;
    this.currentDate = dateKey;
    this.scheduleCleanup();
  }

  override _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    try {
      const buffer = toBuffer(chunk, encoding);
      const entry = parseEntry(buffer);
      const line = entry ? formatLogLine(entry) : buffer.toString('utf8');
      this.rotateIfNeeded(this.formatDateKey(typeof entry?.time === 'number' ? entry.time : Date.now()));
      const target = this.stream;
      if (!target) {
        callback();
        return;
      }
      if (target.write(line.endsWith('\n') ? line : `${line}\n`)) {
        callback();
      } else {
        target.once('drain', () => callback());
      }
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
    }
  }

  override _final(callback: (error?: Error | null) => void) {
    if (this.stream) {
      this.stream.end(callback);
    } else {
      callback();
    }
  }
}

class CleanConsoleStream extends Writable {
  override _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    const buffer = toBuffer(chunk, encoding);
    const entry = parseEntry(buffer);
    process.stdout.write(`${entry ? formatLogLine(entry) : buffer.toString('utf8').trimEnd()}\n`);
    callback();
  }
}

// Streams accept everything; the logger's own level does the filtering so it can move at runtime.
const streams: StreamEntry[] = [
  { stream: new CleanConsoleStream(), level: 'trace' },
  { stream: new RotatingFileStream(logDir, retentionDays), level: 'trace' }
];

export const logger = pino({ level: envLogLevel() ?? 'info' }, multistream(streams));

/**
 * Applies the level from the config file. `LOG_LEVEL` in the environment wins.
 */
export function applyConfiguredLogLevel(name: LogLevelName | null): Level {
  const level = envLogLevel() ?? (name ? toPinoLevel(name) : 'info');
  logger.level = level;
  return level;
}

export function getLogDirectory() {
  return logDir;
}
