export const FIXTURE_PREFIX = 'MAH11';
export const FIXTURE_EXTENSION = '.pcap';
export const FIXTURE_NAME_PATTERN = /^MAH11-(\d{8})-(\d{6})\.pcap$/;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * One clock read. The ledger epoch and the local-time filename stamp both come from
 * `at`, so they can never straddle a second boundary.
 */
export type TimeSample = {
  at: Date;
  epochSeconds: number;
  stamp: string;
};

const pad2 = (n: number) => String(n).padStart(2, '0');

/** `YYYYMMDD-HHMMSS` in local time. */
export function formatLocalStamp(d: Date): string {
  const date = `${d.getFullYear()}${pad2(d.getMonth() + 1)}${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}${pad2(d.getMinutes())}${pad2(d.getSeconds())}`;
  return `${date}-${time}`;
}

export function sampleTime(clock: Clock = systemClock): TimeSample {
  const at = clock();
  return {
    at,
    epochSeconds: Math.floor(at.getTime() / 1000),
    stamp: formatLocalStamp(at)
  };
}

export function fixtureFileName(sample: TimeSample): string {
  return `${FIXTURE_PREFIX}-${sample.stamp}${FIXTURE_EXTENSION}`;
}

/**
 * Reads the local wall-clock time back out of a fixture name, or null when the name
 * does not follow the `MAH11-YYYYMMDD-HHMMSS.pcap` layout.
 */
export function parseFixtureFileName(fileName: string): Date | null {
  const match = FIXTURE_NAME_PATTERN.exec(fileName);
  if (!match) return null;
  const [, date, time] = match;
  const parsed = new Date(
    Number(date.slice(0, 4)),
    Number(date.slice(4, 6)) - 1,
    Number(date.slice(6, 8)),
    Number(time.slice(0, 2)),
    Number(time.slice(2, 4)),
    Number(time.slice(4, 6))
  );
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
